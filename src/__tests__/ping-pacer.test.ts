import { VirtualClock } from '../clock.js';
import { PingError } from '../errors.js';
import { PingPacer, PingSender } from '../ping-pacer.js';
import { PingOutcome } from '../types.js';

class FakeSender implements PingSender {
    public initiations = 0;
    public initiateDelayMs = 0;
    public failInitiation = false;
    public tokens: string[] = [];
    public results: Array<number | PingError> = [];

    constructor(private clock: VirtualClock) {}

    public async initiatePingSession(): Promise<string> {
        this.initiations++;
        const token = `token-${this.initiations}`;
        if (this.initiateDelayMs > 0) await this.clock.sleep(this.initiateDelayMs);
        if (this.failInitiation) throw new Error('control server unavailable');
        return token;
    }

    public async sendPing(token: string): Promise<number> {
        this.tokens.push(token);
        const next = this.results.shift();
        if (next instanceof PingError) throw next;
        return next ?? 5;
    }
}

function collect(pacer: PingPacer, signal: AbortSignal) {
    const outcomes: PingOutcome[] = [];
    const done = (async () => {
        for await (const outcome of pacer.pings(signal)) outcomes.push(outcome);
    })();
    return { outcomes, done };
}

describe('PingPacer', () => {
    it('initiates on the first tick, then pings once per interval', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        const pacer = new PingPacer(sender, clock, 500);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(1000);
        abort.abort();
        await done;

        expect(outcomes).toEqual([
            { timestamp: 0, result: { kind: 'success', durationMs: 5 } },
            { timestamp: 500, result: { kind: 'success', durationMs: 5 } },
            { timestamp: 1000, result: { kind: 'success', durationMs: 5 } }
        ]);
        expect(sender.initiations).toBe(1);
        expect(sender.tokens).toEqual(['token-1', 'token-1', 'token-1']);
        expect(pacer.currentState).toEqual({ kind: 'ready', token: 'token-1' });
    });

    it('reports ticks during a slow initiation as in progress', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.initiateDelayMs = 700;
        const pacer = new PingPacer(sender, clock, 500);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(1000);
        abort.abort();
        await done;

        expect(outcomes).toEqual([
            { timestamp: 500, result: { kind: 'error', reason: 'initiationInProgress' } },
            { timestamp: 700, result: { kind: 'success', durationMs: 5 } },
            { timestamp: 1000, result: { kind: 'success', durationMs: 5 } }
        ]);
    });

    it('stamps the first ping with the instant the token arrived', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.initiateDelayMs = 5000;
        const pacer = new PingPacer(sender, clock, 10000);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(5000);
        abort.abort();
        await done;

        expect(outcomes).toEqual([
            { timestamp: 5000, result: { kind: 'success', durationMs: 5 } }
        ]);
    });

    it('reinitiates after the server rejected the token', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.results = [new PingError('needsReinitialization')];
        const pacer = new PingPacer(sender, clock, 500);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(500);
        abort.abort();
        await done;

        expect(outcomes.map((o) => o.result)).toEqual([
            { kind: 'error', reason: 'needsReinitialization' },
            { kind: 'success', durationMs: 5 }
        ]);
        expect(sender.tokens).toEqual(['token-1', 'token-2']);
    });

    it('keeps the token on timeouts', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.results = [new PingError('timedOut')];
        const pacer = new PingPacer(sender, clock, 500);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(500);
        abort.abort();
        await done;

        expect(outcomes[0].result).toEqual({ kind: 'error', reason: 'timedOut' });
        expect(sender.initiations).toBe(1);
    });

    it('reinitiates after consecutive timeouts and network errors reach the threshold', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.results = [new PingError('timedOut'), new PingError('networkIssue')];
        const pacer = new PingPacer(sender, clock, 500, 2);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(1000);
        abort.abort();
        await done;

        expect(outcomes.map((o) => o.result)).toEqual([
            { kind: 'error', reason: 'timedOut' },
            { kind: 'error', reason: 'networkIssue' },
            { kind: 'success', durationMs: 5 }
        ]);
        expect(sender.initiations).toBe(2);
        expect(sender.tokens).toEqual(['token-1', 'token-1', 'token-2']);
    });

    it('restarts the failure count after a successful ping', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.results = [new PingError('timedOut'), 7, new PingError('timedOut')];
        const pacer = new PingPacer(sender, clock, 500, 2);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(1000);
        abort.abort();
        await done;

        expect(outcomes.map((o) => o.result)).toEqual([
            { kind: 'error', reason: 'timedOut' },
            { kind: 'success', durationMs: 7 },
            { kind: 'error', reason: 'timedOut' }
        ]);
        expect(sender.initiations).toBe(1);
        expect(pacer.currentState).toEqual({ kind: 'ready', token: 'token-1' });
    });

    it('reports failed initiations and retries on the next tick', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        sender.failInitiation = true;
        const pacer = new PingPacer(sender, clock, 500);
        const abort = new AbortController();
        const { outcomes, done } = collect(pacer, abort.signal);

        await clock.advance(500);
        abort.abort();
        await done;

        expect(outcomes).toEqual([
            { timestamp: 0, result: { kind: 'error', reason: 'initiationFailed' } },
            { timestamp: 500, result: { kind: 'error', reason: 'initiationFailed' } }
        ]);
        expect(sender.initiations).toBe(2);
        expect(pacer.currentState).toEqual({ kind: 'needsInitiation' });
    });

    it('requests a new token when asked to reinitialize', async () => {
        const clock = new VirtualClock(0);
        const sender = new FakeSender(clock);
        const pacer = new PingPacer(sender, clock, 500);
        const abort = new AbortController();
        const { done } = collect(pacer, abort.signal);

        await clock.advance(0);
        pacer.requestReinitialization();
        expect(pacer.currentState).toEqual({ kind: 'needsInitiation' });
        await clock.advance(500);
        abort.abort();
        await done;

        expect(sender.tokens).toEqual(['token-1', 'token-2']);
    });
});
