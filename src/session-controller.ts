import { AsyncChannel } from './channel.js';
import { Clock } from './clock.js';
import { CoverageRequestResult } from './control-server.js';
import { moduleLogger } from './logger.js';
import { SessionInitiating } from './ping-session.js';
import { IPVersion, SessionCredentials, SessionInitializedEvent } from './types.js';

const log = moduleLogger('session-controller');

export interface CoverageSessionRequester {
    requestCoverageSession(time: number, loopUUID?: string): Promise<CoverageRequestResult>;
}

export interface ActiveSubSession {
    testUUID: string;
    loopUUID?: string;
    anchorAt: number;
    ipVersion?: IPVersion;
}

export interface CoverageSessionControllerOptions {
    requester: CoverageSessionRequester;
    clock: Clock;
    defaultMaxSessionSeconds: number;
    defaultMaxMeasurementSeconds: number;
    // Runs before every token request; failures are logged and ignored
    beforeRequest?: () => Promise<void>;
}

/**
 * Owns the control-server side of a coverage run: every issued ping token is
 * a new sub-session chained to the previous one through `loop_uuid`.
 */
export class CoverageSessionController implements SessionInitiating {
    private requester: CoverageSessionRequester;
    private clock: Clock;
    private beforeRequest?: () => Promise<void>;
    private defaultMaxSessionSeconds: number;
    private defaultMaxMeasurementSeconds: number;

    private active?: ActiveSubSession;
    private attempted = false;
    private startedAt = 0;
    private maxSessionSeconds: number;
    private maxMeasurementSeconds: number;
    private runSignal?: AbortSignal;
    private sessionEvents?: AsyncChannel<SessionInitializedEvent>;
    private totalTimer?: AbortController;
    private subSessionTimer?: AbortController;

    // Hooks wired by the factory
    public onSubSessionExpired?: () => void;
    public onSessionLimitReached?: () => void;

    constructor(options: CoverageSessionControllerOptions) {
        this.requester = options.requester;
        this.clock = options.clock;
        this.beforeRequest = options.beforeRequest;
        this.defaultMaxSessionSeconds = options.defaultMaxSessionSeconds;
        this.defaultMaxMeasurementSeconds = options.defaultMaxMeasurementSeconds;
        this.maxSessionSeconds = options.defaultMaxSessionSeconds;
        this.maxMeasurementSeconds = options.defaultMaxMeasurementSeconds;
    }

    public get activeSession(): ActiveSubSession | undefined {
        return this.active;
    }

    public get hasAttemptedInitialization(): boolean {
        return this.attempted;
    }

    public get maxCoverageSessionSeconds(): number {
        return this.maxSessionSeconds;
    }

    public get maxCoverageMeasurementSeconds(): number {
        return this.maxMeasurementSeconds;
    }

    /**
     * Reset for a new run and return the stream of sub-session events.
     * Aborting `signal` ends the stream and cancels both timers.
     */
    public begin(signal: AbortSignal): AsyncIterable<SessionInitializedEvent> {
        this.cancelTimers();
        this.sessionEvents?.close();

        const events = new AsyncChannel<SessionInitializedEvent>();
        this.active = undefined;
        this.attempted = false;
        this.startedAt = this.clock.now();
        this.maxSessionSeconds = this.defaultMaxSessionSeconds;
        this.maxMeasurementSeconds = this.defaultMaxMeasurementSeconds;
        this.runSignal = signal;
        this.sessionEvents = events;

        signal.addEventListener('abort', () => {
            this.cancelTimers();
            events.close();
        }, { once: true });

        this.armTotalTimer();
        return events;
    }

    public async initiate(): Promise<SessionCredentials> {
        if (this.beforeRequest) {
            try {
                await this.beforeRequest();
            } catch (err) {
                log.warn({ err }, 'Pre-request resend failed');
            }
        }

        const previous = this.active?.testUUID;
        let result: CoverageRequestResult;
        try {
            result = await this.requester.requestCoverageSession(this.clock.now(), previous);
        } catch (err) {
            log.warn({ err, loopUUID: previous }, 'Coverage session request failed');
            throw err;
        } finally {
            this.attempted = true;
        }

        const anchorAt = this.clock.now();
        const { credentials } = result;
        this.active = {
            testUUID: credentials.testUUID,
            loopUUID: previous,
            anchorAt,
            ipVersion: credentials.ipVersion
        };

        if (result.maxCoverageSessionSeconds !== undefined) {
            this.maxSessionSeconds = result.maxCoverageSessionSeconds;
            this.armTotalTimer();
        }
        if (result.maxCoverageMeasurementSeconds !== undefined) {
            this.maxMeasurementSeconds = result.maxCoverageMeasurementSeconds;
        }

        log.info({ testUUID: credentials.testUUID, loopUUID: previous }, 'Coverage sub-session started');
        this.sessionEvents?.push({ timestamp: anchorAt, sessionID: credentials.testUUID, loopUUID: previous });
        this.armSubSessionTimer();

        return { ...credentials, loopUUID: previous };
    }

    private armTotalTimer() {
        const signal = this.runSignal;
        if (!signal || signal.aborted) return;

        this.totalTimer?.abort();
        const timer = new AbortController();
        this.totalTimer = timer;

        const due = this.startedAt + this.maxSessionSeconds * 1000;
        void this.clock.sleep(due - this.clock.now(), timer.signal).then((elapsed) => {
            if (!elapsed || signal.aborted) return;
            log.info({ maxSessionSeconds: this.maxSessionSeconds }, 'Coverage session limit reached');
            this.onSessionLimitReached?.();
        });
    }

    private armSubSessionTimer() {
        const signal = this.runSignal;
        if (!signal || signal.aborted) return;

        this.subSessionTimer?.abort();
        const timer = new AbortController();
        this.subSessionTimer = timer;

        void this.clock.sleep(this.maxMeasurementSeconds * 1000, timer.signal).then((elapsed) => {
            if (!elapsed || signal.aborted) return;
            log.info({ testUUID: this.active?.testUUID }, 'Sub-session expired, requesting new token');
            this.onSubSessionExpired?.();
        });
    }

    private cancelTimers() {
        this.totalTimer?.abort();
        this.subSessionTimer?.abort();
        this.totalTimer = undefined;
        this.subSessionTimer = undefined;
    }
}
