import { AsyncChannel } from './channel.js';
import { Clock } from './clock.js';
import { pingErrorReason } from './errors.js';
import { moduleLogger } from './logger.js';
import { PingErrorReason, PingOutcome } from './types.js';

const log = moduleLogger('ping-pacer');

export interface PingSender {
    initiatePingSession(): Promise<string>;
    sendPing(token: string): Promise<number>;
}

export type PacerState =
    | { kind: 'needsInitiation' }
    | { kind: 'inProgress' }
    | { kind: 'ready'; token: string };

// Failures that count toward a forced reinitialization
const TRANSIENT_FAILURES: ReadonlySet<PingErrorReason> = new Set(['timedOut', 'networkIssue']);

/**
 * Fires one ping per interval against a `PingSender`, (re)initiating the
 * session when needed. Every tick produces exactly one outcome, stamped with
 * the instant its ping was sent (the tick start, unless the tick had to wait
 * for a token first); outcomes are delivered as they complete.
 *
 * `failureThreshold` consecutive timeouts or network errors also drop the
 * token, as an `RE01` does.
 */
export class PingPacer {
    private session: PingSender;
    private clock: Clock;
    private intervalMs: number;
    private failureThreshold: number;
    private consecutiveFailures = 0;
    private state: PacerState = { kind: 'needsInitiation' };

    constructor(session: PingSender, clock: Clock, intervalMs: number, failureThreshold = Infinity) {
        this.session = session;
        this.clock = clock;
        this.intervalMs = intervalMs;
        this.failureThreshold = failureThreshold;
    }

    public get currentState(): PacerState {
        return this.state;
    }

    public requestReinitialization() {
        if (this.state.kind === 'ready') {
            log.debug('Reinitialization requested');
            this.state = { kind: 'needsInitiation' };
        }
    }

    /**
     * Lazily starts a tick loop when iterated; the sequence only ends when
     * `signal` aborts.
     */
    public pings(signal: AbortSignal): AsyncIterable<PingOutcome> {
        return {
            [Symbol.asyncIterator]: () => {
                const channel = new AsyncChannel<PingOutcome>();
                signal.addEventListener('abort', () => channel.close(), { once: true });
                void this.tickLoop(channel, signal);
                return channel[Symbol.asyncIterator]();
            }
        };
    }

    private async tickLoop(channel: AsyncChannel<PingOutcome>, signal: AbortSignal) {
        let nextTick = this.clock.now();

        while (!signal.aborted && !channel.isClosed) {
            const tickStart = this.clock.now();
            void this.tick(tickStart, channel, signal);

            nextTick += this.intervalMs;
            const elapsed = await this.clock.sleep(nextTick - this.clock.now(), signal);
            if (!elapsed) break;
        }
        channel.close();
    }

    private async tick(tickStart: number, channel: AsyncChannel<PingOutcome>, signal: AbortSignal) {
        const outcome = await this.runTick(tickStart);
        if (!signal.aborted) {
            channel.push(outcome);
        }
    }

    private async runTick(tickStart: number): Promise<PingOutcome> {
        let token: string;
        let timestamp = tickStart;

        switch (this.state.kind) {
            case 'inProgress':
                return { timestamp, result: { kind: 'error', reason: 'initiationInProgress' } };
            case 'needsInitiation':
                this.state = { kind: 'inProgress' };
                try {
                    token = await this.session.initiatePingSession();
                } catch (err) {
                    log.debug({ err }, 'Ping session initiation failed');
                    this.state = { kind: 'needsInitiation' };
                    return { timestamp, result: { kind: 'error', reason: 'initiationFailed' } };
                }
                this.state = { kind: 'ready', token };
                this.consecutiveFailures = 0;
                timestamp = this.clock.now();
                break;
            case 'ready':
                token = this.state.token;
                break;
        }

        const readyState = this.state;
        try {
            const durationMs = await this.session.sendPing(token);
            this.consecutiveFailures = 0;
            return { timestamp, result: { kind: 'success', durationMs } };
        } catch (err) {
            const reason = pingErrorReason(err);
            // Only the session that produced this error may be torn down
            if (this.state === readyState && this.shouldReinitialize(reason)) {
                this.consecutiveFailures = 0;
                this.state = { kind: 'needsInitiation' };
            }
            return { timestamp, result: { kind: 'error', reason } };
        }
    }

    private shouldReinitialize(reason: PingErrorReason): boolean {
        if (reason === 'needsReinitialization') return true;
        if (!TRANSIENT_FAILURES.has(reason)) return false;

        this.consecutiveFailures++;
        if (this.consecutiveFailures < this.failureThreshold) return false;
        log.info({ failures: this.consecutiveFailures }, 'Too many failed pings, reinitializing');
        return true;
    }
}
