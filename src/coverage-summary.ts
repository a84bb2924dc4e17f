import { Fence } from './fence.js';
import { radioGeneration } from './radio-technology.js';
import { PingOutcome, StopReason } from './types.js';

export interface PingStats {
    median: number;
    iqr: number;
    min: number;
}

export interface CoverageSummary {
    testUUID?: string;
    stopReason: StopReason;
    startedAt: number;
    stoppedAt: number;
    subSessionCount: number;
    fenceCount: number;
    pings: {
        total: number;
        succeeded: number;
        failed: number;
    };
    // Over the fences' average pings
    averagePing?: PingStats;
    fencesPerGeneration: Record<string, number>;
}

export interface SummaryInput {
    testUUID?: string;
    stopReason: StopReason;
    startedAt: number;
    stoppedAt: number;
    subSessionCount: number;
    fences: Fence[];
    pings: PingOutcome[];
}

export function calculateStats(values: number[]): PingStats {
    if (values.length === 0) return { median: 0, iqr: 0, min: 0 };

    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    const median = sorted.length % 2 !== 0 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
    const min = sorted[0];

    const q1 = sorted[Math.floor(sorted.length * 0.25)];
    const q3 = sorted[Math.floor(sorted.length * 0.75)];
    const iqr = q3 - q1;

    return { median, iqr, min };
}

export function summarizeCoverage(input: SummaryInput): CoverageSummary {
    const succeeded = input.pings.filter((ping) => ping.result.kind === 'success').length;

    const averages: number[] = [];
    const fencesPerGeneration: Record<string, number> = {};
    for (const fence of input.fences) {
        const average = fence.averagePing;
        if (average !== undefined) averages.push(average);

        const generation = radioGeneration(fence.significantTechnology) ?? 'unknown';
        fencesPerGeneration[generation] = (fencesPerGeneration[generation] ?? 0) + 1;
    }

    return {
        testUUID: input.testUUID,
        stopReason: input.stopReason,
        startedAt: input.startedAt,
        stoppedAt: input.stoppedAt,
        subSessionCount: input.subSessionCount,
        fenceCount: input.fences.length,
        pings: {
            total: input.pings.length,
            succeeded,
            failed: input.pings.length - succeeded
        },
        averagePing: averages.length > 0 ? calculateStats(averages) : undefined,
        fencesPerGeneration
    };
}
