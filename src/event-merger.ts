import { AsyncChannel } from './channel.js';
import { moduleLogger } from './logger.js';
import { CoverageEvent, LocationSample, NetworkTypeSample, PingOutcome, SessionInitializedEvent } from './types.js';

const log = moduleLogger('event-merger');

export interface CoverageEventSources {
    pings: AsyncIterable<PingOutcome>;
    locations: AsyncIterable<LocationSample>;
    networkTypes: AsyncIterable<NetworkTypeSample>;
    sessions: AsyncIterable<SessionInitializedEvent>;
}

async function* mapStream<S, T>(source: AsyncIterable<S>, transform: (value: S) => T): AsyncGenerator<T> {
    for await (const value of source) {
        yield transform(value);
    }
}

/**
 * Fan several sources into one channel. Order within a source is kept;
 * the output closes when every source ended or `signal` aborted.
 */
export function mergeStreams<T>(sources: AsyncIterable<T>[], signal: AbortSignal): AsyncChannel<T> {
    const output = new AsyncChannel<T>();
    let remaining = sources.length;

    if (signal.aborted || remaining === 0) {
        output.close();
        return output;
    }

    const iterators = sources.map((source) => source[Symbol.asyncIterator]());
    signal.addEventListener('abort', () => {
        output.close();
        for (const iterator of iterators) {
            void iterator.return?.();
        }
    }, { once: true });

    const pump = async (iterator: AsyncIterator<T>) => {
        try {
            for (;;) {
                const next = await iterator.next();
                if (next.done || signal.aborted) break;
                output.push(next.value);
            }
        } catch (err) {
            log.warn({ err }, 'Event source failed');
        } finally {
            remaining--;
            if (remaining === 0) output.close();
        }
    };

    for (const iterator of iterators) {
        void pump(iterator);
    }
    return output;
}

export function mergeCoverageEvents(sources: CoverageEventSources, signal: AbortSignal): AsyncChannel<CoverageEvent> {
    return mergeStreams<CoverageEvent>([
        mapStream(sources.pings, (ping): CoverageEvent => ({ kind: 'ping', ping })),
        mapStream(sources.locations, (location): CoverageEvent => ({ kind: 'location', location })),
        mapStream(sources.networkTypes, (sample): CoverageEvent => ({ kind: 'networkType', sample })),
        mapStream(sources.sessions, (event): CoverageEvent => ({ kind: 'sessionInitialized', event }))
    ], signal);
}
