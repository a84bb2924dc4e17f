import { Fence, averagePing, distanceMeters, fenceAt } from '../fence.js';
import { resolveRadioTechnology, radioGeneration } from '../radio-technology.js';
import { LocationSample, PingOutcome } from '../types.js';

function at(latitude: number, longitude: number, timestamp: number, horizontalAccuracy = 5): LocationSample {
    return { latitude, longitude, horizontalAccuracy, timestamp };
}

function ok(timestamp: number, durationMs: number): PingOutcome {
    return { timestamp, result: { kind: 'success', durationMs } };
}

describe('Fence', () => {
    it('starts open with its starting location and technology', () => {
        const fence = new Fence({ startingLocation: at(0, 0, 1000), dateEntered: 1000, technology: 'LTE', radiusMeters: 20 });

        expect(fence.isOpen).toBe(true);
        expect(fence.locations).toHaveLength(1);
        expect(fence.significantTechnology).toBe('LTE');
        expect(fence.averagePing).toBeUndefined();
    });

    it('reports the last technology as significant', () => {
        const fence = new Fence({ startingLocation: at(0, 0, 0), dateEntered: 0, technology: 'LTE', radiusMeters: 20 });
        fence.appendTechnology('NRNSA');
        expect(fence.significantTechnology).toBe('NRNSA');
    });

    it('covers [entered, exited)', () => {
        const fence = new Fence({ startingLocation: at(0, 0, 1000), dateEntered: 1000, radiusMeters: 20 });
        expect(fence.covers(999)).toBe(false);
        expect(fence.covers(50_000)).toBe(true);

        fence.exit(2000);
        expect(fence.isOpen).toBe(false);
        expect(fence.covers(1000)).toBe(true);
        expect(fence.covers(1999)).toBe(true);
        expect(fence.covers(2000)).toBe(false);
    });
});

describe('averagePing', () => {
    it('rounds the mean of successful pings only', () => {
        const pings: PingOutcome[] = [
            ok(0, 10),
            ok(1, 11),
            { timestamp: 2, result: { kind: 'error', reason: 'timedOut' } }
        ];
        expect(averagePing(pings)).toBe(11);
    });

    it('is undefined without a successful ping', () => {
        expect(averagePing([{ timestamp: 0, result: { kind: 'error', reason: 'networkIssue' } }])).toBeUndefined();
    });
});

describe('distanceMeters', () => {
    it('is zero for the same point', () => {
        expect(distanceMeters(at(48.2, 16.37, 0), at(48.2, 16.37, 1))).toBe(0);
    });

    it('measures about 11.1 m per 0.0001 degree at the equator', () => {
        expect(distanceMeters(at(0, 0, 0), at(0, 0.0001, 0))).toBeCloseTo(11.119, 2);
    });
});

describe('fenceAt', () => {
    it('picks the fence whose range holds the instant', () => {
        const first = new Fence({ startingLocation: at(0, 0, 1000), dateEntered: 1000, dateExited: 2000, radiusMeters: 20 });
        const second = new Fence({ startingLocation: at(0, 0.001, 2000), dateEntered: 2000, radiusMeters: 20 });

        expect(fenceAt([first, second], 500)).toBeUndefined();
        expect(fenceAt([first, second], 1500)).toBe(first);
        expect(fenceAt([first, second], 2000)).toBe(second);
    });
});

describe('radio technology table', () => {
    it('resolves device names with and without prefix', () => {
        expect(resolveRadioTechnology('CTRadioAccessTechnologyLTE')?.code).toBe('4G/LTE');
        expect(resolveRadioTechnology('lte')?.id).toBe(13);
        expect(resolveRadioTechnology('NR_NSA')?.key).toBe('NRNSA');
        expect(resolveRadioTechnology('5G/NR')?.id).toBe(20);
    });

    it('maps to generations', () => {
        expect(radioGeneration('HSDPA')).toBe('3G');
        expect(radioGeneration('NRNSA')).toBe('5G NSA');
        expect(radioGeneration('Unknown')).toBeUndefined();
        expect(radioGeneration(undefined)).toBeUndefined();
    });
});
