import { calculateStats, summarizeCoverage } from '../coverage-summary.js';
import { Fence } from '../fence.js';
import { PingOutcome } from '../types.js';

function fenceWith(technology: string | undefined, pings: number[]): Fence {
    const fence = new Fence({
        startingLocation: { latitude: 0, longitude: 0, horizontalAccuracy: 5, timestamp: 0 },
        dateEntered: 0,
        technology,
        radiusMeters: 20
    });
    for (const durationMs of pings) fence.appendPing({ timestamp: 1, result: { kind: 'success', durationMs } });
    return fence;
}

describe('calculateStats', () => {
    it('computes median, iqr and minimum', () => {
        expect(calculateStats([40, 10, 30, 20])).toEqual({ median: 25, iqr: 20, min: 10 });
        expect(calculateStats([5])).toEqual({ median: 5, iqr: 0, min: 5 });
        expect(calculateStats([])).toEqual({ median: 0, iqr: 0, min: 0 });
    });
});

describe('summarizeCoverage', () => {
    it('counts pings and groups fences by generation', () => {
        const pings: PingOutcome[] = [
            { timestamp: 1, result: { kind: 'success', durationMs: 10 } },
            { timestamp: 2, result: { kind: 'error', reason: 'timedOut' } }
        ];

        const summary = summarizeCoverage({
            testUUID: 'test-1',
            stopReason: 'user',
            startedAt: 0,
            stoppedAt: 10_000,
            subSessionCount: 2,
            fences: [fenceWith('LTE', [10]), fenceWith('NRNSA', [30]), fenceWith(undefined, [])],
            pings
        });

        expect(summary).toEqual({
            testUUID: 'test-1',
            stopReason: 'user',
            startedAt: 0,
            stoppedAt: 10_000,
            subSessionCount: 2,
            fenceCount: 3,
            pings: { total: 2, succeeded: 1, failed: 1 },
            averagePing: { median: 20, iqr: 20, min: 10 },
            fencesPerGeneration: { '4G': 1, '5G NSA': 1, unknown: 1 }
        });
    });
});
