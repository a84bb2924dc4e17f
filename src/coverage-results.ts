import { CoverageFencePayload, CoverageResultPayload } from './control-server.js';
import { Fence } from './fence.js';
import { resolveRadioTechnology } from './radio-technology.js';

export interface SendCoverageResultsService {
    send(fences: Fence[]): Promise<void>;
}

export interface CoverageResultSubmitter {
    submitCoverageResult(payload: CoverageResultPayload): Promise<void>;
}

export function buildFencePayload(fence: Fence, anchorAt: number): CoverageFencePayload {
    const location = fence.startingLocation;
    const technology = resolveRadioTechnology(fence.significantTechnology);

    const payload: CoverageFencePayload = {
        timestamp_microseconds: Math.round(fence.dateEntered * 1000),
        location: {
            latitude: location.latitude,
            longitude: location.longitude
        },
        offset_ms: Math.round(fence.dateEntered - anchorAt),
        radius_m: Math.round(fence.radiusMeters)
    };

    if (location.horizontalAccuracy >= 0) payload.location.accuracy = location.horizontalAccuracy;

    const avgPing = fence.averagePing;
    if (avgPing !== undefined) payload.avg_ping_ms = avgPing;

    if (fence.dateExited !== undefined) {
        payload.duration_ms = Math.round(fence.dateExited - fence.dateEntered);
    }

    if (technology) {
        payload.technology = technology.code;
        payload.technology_id = technology.id;
    }

    return payload;
}

export function buildCoverageResultPayload(testUUID: string, anchorAt: number, fences: Fence[]): CoverageResultPayload {
    return {
        test_uuid: testUUID,
        fences: fences.map((fence) => buildFencePayload(fence, anchorAt))
    };
}

/**
 * Submits fences of one sub-session; offsets are relative to its anchor.
 */
export class ControlServerCoverageResultsService implements SendCoverageResultsService {
    private submitter: CoverageResultSubmitter;
    private testUUID: string;
    private anchorAt: number;

    constructor(submitter: CoverageResultSubmitter, testUUID: string, anchorAt: number) {
        this.submitter = submitter;
        this.testUUID = testUUID;
        this.anchorAt = anchorAt;
    }

    public async send(fences: Fence[]): Promise<void> {
        await this.submitter.submitCoverageResult(buildCoverageResultPayload(this.testUUID, this.anchorAt, fences));
    }
}
