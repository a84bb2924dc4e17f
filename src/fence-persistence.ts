import { CoverageDatabase, CoverageStatements, prepareStatements } from './database.js';
import { Fence } from './fence.js';
import { moduleLogger } from './logger.js';
import { CoverageFenceRow, CoverageSessionRow } from './types.js';

const log = moduleLogger('persistence');

export interface FencePersistenceService {
    save(fence: Fence): Promise<void>;
    sessionStarted(at: number): Promise<void>;
    sessionInitialized(testUUID: string, anchorAt: number, loopUUID?: string): Promise<void>;
    sessionFinalized(at: number): Promise<void>;
}

export interface StoredSession {
    id: number;
    testUUID?: string;
    loopUUID?: string;
    startedAt: number;
    anchorAt?: number;
    finalizedAt?: number;
    fences: Fence[];
}

export type SubmissionMode = 'warm' | 'cold';

// A stored fence comes back with a single synthetic ping carrying its average
export function fenceFromRow(row: CoverageFenceRow, testUUID?: string): Fence {
    return new Fence({
        id: row.fence_id,
        startingLocation: {
            latitude: row.latitude,
            longitude: row.longitude,
            horizontalAccuracy: row.horizontal_accuracy ?? -1,
            timestamp: row.timestamp
        },
        dateEntered: row.timestamp,
        dateExited: row.exit_timestamp ?? undefined,
        technology: row.technology ?? undefined,
        radiusMeters: row.radius_m,
        sessionUUID: testUUID,
        pings: row.avg_ping_ms === null
            ? []
            : [{ timestamp: row.timestamp, result: { kind: 'success', durationMs: row.avg_ping_ms } }]
    });
}

export class SqliteFencePersistenceService implements FencePersistenceService {
    private db: CoverageDatabase;
    private stmts: CoverageStatements;
    // Row written by the current run, if it still exists
    private currentSessionId?: number;

    constructor(db: CoverageDatabase) {
        this.db = db;
        this.stmts = prepareStatements(db);
    }

    public async save(fence: Fence): Promise<void> {
        const session = this.sessionForFence(fence);

        this.stmts.upsertFence.run({
            session_id: session.id,
            fence_id: fence.id,
            timestamp: fence.dateEntered,
            exit_timestamp: fence.dateExited ?? null,
            latitude: fence.startingLocation.latitude,
            longitude: fence.startingLocation.longitude,
            horizontal_accuracy: fence.startingLocation.horizontalAccuracy >= 0 ? fence.startingLocation.horizontalAccuracy : null,
            avg_ping_ms: fence.averagePing ?? null,
            technology: fence.significantTechnology ?? null,
            radius_m: fence.radiusMeters
        });

        const { count } = this.stmts.countFencesForSession.get(session.id) ?? { count: 0 };
        log.debug({ testUUID: session.test_uuid, fenceCount: count }, 'Saved fence');
    }

    public async sessionStarted(at: number): Promise<void> {
        const info = this.stmts.insertSession.run({ started_at: at, test_uuid: null, loop_uuid: null, anchor_at: null });
        this.currentSessionId = Number(info.lastInsertRowid);
        log.info({ startedAt: at }, 'Session started');
    }

    public async sessionInitialized(testUUID: string, anchorAt: number, loopUUID?: string): Promise<void> {
        const current = this.currentSession();
        if (current && current.finalized_at === null) {
            this.stmts.initializeSession.run({ id: current.id, test_uuid: testUUID, loop_uuid: loopUUID ?? null, anchor_at: anchorAt });
        } else {
            const info = this.stmts.insertSession.run({ started_at: anchorAt, test_uuid: testUUID, loop_uuid: loopUUID ?? null, anchor_at: anchorAt });
            this.currentSessionId = Number(info.lastInsertRowid);
        }
        log.info({ testUUID, loopUUID }, 'Session initialized');
    }

    // Finalizes only the row this run wrote; a row deleted after submission stays deleted
    public async sessionFinalized(at: number): Promise<void> {
        const current = this.currentSession();
        this.currentSessionId = undefined;
        if (!current) {
            log.info('No current session to finalize');
            return;
        }
        this.stmts.finalizeSession.run({ id: current.id, finalized_at: at });
        log.info({ testUUID: current.test_uuid }, 'Session finalized');
    }

    /**
     * Sessions eligible for submission.
     * Warm: finalized sessions with a test UUID. Cold: every session with a test UUID.
     */
    public sessionsToSubmit(mode: SubmissionMode): StoredSession[] {
        return this.stmts.getAllSessions.all()
            .filter((row) => row.test_uuid !== null && (mode === 'cold' || row.finalized_at !== null))
            .map((row) => this.toStoredSession(row));
    }

    public allSessions(): StoredSession[] {
        return this.stmts.getAllSessions.all().map((row) => this.toStoredSession(row));
    }

    public deleteSession(id: number) {
        this.stmts.deleteSession.run(id);
    }

    public deleteSessionByUUID(testUUID: string): boolean {
        const info = this.stmts.deleteSessionByUUID.run(testUUID);
        return info.changes > 0;
    }

    /**
     * Drop sessions that can no longer be delivered: older than `maxAgeMs`
     * (reference = finalized_at, else started_at), and finalized sessions
     * without fences or test UUID. On launch unfinished ones qualify too.
     */
    public cleanup(maxAgeMs: number, now: number, isLaunched: boolean): number {
        const cutoff = now - maxAgeMs;

        const purge = this.db.transaction(() => {
            let deleted = 0;
            for (const row of this.stmts.getAllSessions.all()) {
                const reference = row.finalized_at ?? row.started_at;
                const expired = reference < cutoff;

                const { count } = this.stmts.countFencesForSession.get(row.id) ?? { count: 0 };
                const undeliverable = count === 0 || row.test_uuid === null;
                const orphaned = undeliverable && (row.finalized_at !== null || isLaunched);

                if (expired || orphaned) {
                    log.debug({ testUUID: row.test_uuid, fenceCount: count, expired }, 'Purging session');
                    this.stmts.deleteSession.run(row.id);
                    deleted++;
                }
            }
            return deleted;
        });

        const deleted = purge();
        if (deleted > 0) {
            log.info({ deleted }, 'Cleaned up stored sessions');
        }
        return deleted;
    }

    private sessionForFence(fence: Fence): CoverageSessionRow {
        if (fence.sessionUUID) {
            const owned = this.stmts.getSessionByUUID.get(fence.sessionUUID);
            if (owned) return owned;
        }

        const existing = this.currentSession()
            ?? this.stmts.getLatestUnfinishedSession.get()
            ?? this.stmts.getMostRecentSession.get();
        if (existing) return existing;

        // Fences never go unowned: open a pending bucket
        log.warn({ fenceId: fence.id }, 'No session for fence, creating one');
        const info = this.stmts.insertSession.run({ started_at: fence.dateEntered, test_uuid: null, loop_uuid: null, anchor_at: null });
        this.currentSessionId = Number(info.lastInsertRowid);
        return {
            id: this.currentSessionId,
            test_uuid: null,
            loop_uuid: null,
            started_at: fence.dateEntered,
            anchor_at: null,
            finalized_at: null
        };
    }

    private currentSession(): CoverageSessionRow | undefined {
        if (this.currentSessionId === undefined) return undefined;
        return this.stmts.getSessionById.get(this.currentSessionId);
    }

    private toStoredSession(row: CoverageSessionRow): StoredSession {
        const testUUID = row.test_uuid ?? undefined;
        return {
            id: row.id,
            testUUID,
            loopUUID: row.loop_uuid ?? undefined,
            startedAt: row.started_at,
            anchorAt: row.anchor_at ?? undefined,
            finalizedAt: row.finalized_at ?? undefined,
            fences: this.stmts.getFencesForSession.all(row.id).map((fence) => fenceFromRow(fence, testUUID))
        };
    }
}
