import { AsyncChannel } from '../channel.js';
import { mergeCoverageEvents, mergeStreams } from '../event-merger.js';
import { LocationSample, NetworkTypeSample, PingOutcome, SessionInitializedEvent } from '../types.js';

describe('mergeStreams', () => {
    it('keeps per-source order and closes after every source ended', async () => {
        const a = new AsyncChannel<string>();
        const b = new AsyncChannel<string>();
        const merged = mergeStreams([a, b], new AbortController().signal);

        a.push('a1');
        b.push('b1');
        a.push('a2');
        a.close();
        b.close();

        const seen: string[] = [];
        for await (const value of merged) seen.push(value);

        expect(seen.filter((v) => v.startsWith('a'))).toEqual(['a1', 'a2']);
        expect(seen).toHaveLength(3);
    });

    it('closes the output and the sources on abort', async () => {
        const a = new AsyncChannel<number>();
        const abort = new AbortController();
        const merged = mergeStreams([a], abort.signal);

        abort.abort();

        await expect(merged.next()).resolves.toEqual({ value: undefined, done: true });
        expect(a.isClosed).toBe(true);
    });

    it('keeps going when one source fails', async () => {
        const a = new AsyncChannel<number>();
        const b = new AsyncChannel<number>();
        const merged = mergeStreams([a, b], new AbortController().signal);

        a.fail(new Error('sensor gone'));
        b.push(1);
        b.close();

        const seen: number[] = [];
        for await (const value of merged) seen.push(value);
        expect(seen).toEqual([1]);
    });
});

describe('mergeCoverageEvents', () => {
    it('tags each source', async () => {
        const pings = new AsyncChannel<PingOutcome>();
        const locations = new AsyncChannel<LocationSample>();
        const networkTypes = new AsyncChannel<NetworkTypeSample>();
        const sessions = new AsyncChannel<SessionInitializedEvent>();
        const merged = mergeCoverageEvents({ pings, locations, networkTypes, sessions }, new AbortController().signal);

        const ping: PingOutcome = { timestamp: 1, result: { kind: 'success', durationMs: 3 } };
        const session: SessionInitializedEvent = { timestamp: 2, sessionID: 'test-1' };
        pings.push(ping);
        pings.close();
        locations.close();
        networkTypes.close();
        sessions.push(session);
        sessions.close();

        const kinds: string[] = [];
        for await (const event of merged) kinds.push(event.kind);
        expect(kinds.sort()).toEqual(['ping', 'sessionInitialized']);
    });
});
