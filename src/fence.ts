import { randomUUID } from 'crypto';
import { LocationSample, PingOutcome } from './types.js';

const EARTH_RADIUS_METERS = 6371000;

export interface FenceInit {
    id?: string;
    startingLocation: LocationSample;
    dateEntered: number;
    dateExited?: number;
    technology?: string;
    radiusMeters: number;
    sessionUUID?: string;
    pings?: PingOutcome[];
}

/**
 * One geographic cell of a coverage run. Open while `dateExited` is unset.
 */
export class Fence {
    public readonly id: string;
    public readonly startingLocation: LocationSample;
    public readonly dateEntered: number;
    public readonly radiusMeters: number;
    public readonly locations: LocationSample[];
    public readonly pings: PingOutcome[];
    public readonly technologies: string[];
    public dateExited?: number;
    public sessionUUID?: string;

    constructor(init: FenceInit) {
        this.id = init.id ?? randomUUID();
        this.startingLocation = init.startingLocation;
        this.dateEntered = init.dateEntered;
        this.dateExited = init.dateExited;
        this.radiusMeters = init.radiusMeters;
        this.sessionUUID = init.sessionUUID;
        this.locations = [init.startingLocation];
        this.pings = init.pings ? [...init.pings] : [];
        this.technologies = init.technology ? [init.technology] : [];
    }

    public get isOpen(): boolean {
        return this.dateExited === undefined;
    }

    public get averagePing(): number | undefined {
        return averagePing(this.pings);
    }

    public get significantTechnology(): string | undefined {
        return this.technologies[this.technologies.length - 1];
    }

    public appendLocation(location: LocationSample) {
        this.locations.push(location);
    }

    public appendPing(ping: PingOutcome) {
        this.pings.push(ping);
    }

    public appendTechnology(technology: string) {
        this.technologies.push(technology);
    }

    public exit(at: number) {
        this.dateExited = at;
    }

    // [dateEntered, dateExited) for closed fences, open-ended otherwise
    public covers(timestamp: number): boolean {
        if (timestamp < this.dateEntered) return false;
        return this.dateExited === undefined || timestamp < this.dateExited;
    }
}

export function averagePing(pings: PingOutcome[]): number | undefined {
    let sum = 0;
    let count = 0;
    for (const ping of pings) {
        if (ping.result.kind === 'success') {
            sum += ping.result.durationMs;
            count++;
        }
    }
    return count === 0 ? undefined : Math.round(sum / count);
}

/**
 * Great-circle distance (haversine) between two samples, in meters.
 */
export function distanceMeters(a: LocationSample, b: LocationSample): number {
    const toRad = (deg: number) => (deg * Math.PI) / 180;
    const dLat = toRad(b.latitude - a.latitude);
    const dLon = toRad(b.longitude - a.longitude);
    const h = Math.sin(dLat / 2) ** 2
        + Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
    return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Newest fence whose time range holds `timestamp`.
 */
export function fenceAt(fences: Fence[], timestamp: number): Fence | undefined {
    for (let i = fences.length - 1; i >= 0; i--) {
        if (fences[i].covers(timestamp)) return fences[i];
    }
    return undefined;
}
