import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { moduleLogger } from './logger.js';
import { CoverageFenceRow, CoverageSessionRow } from './types.js';

const log = moduleLogger('database');

export type CoverageDatabase = Database.Database;

/**
 * Open (and create if needed) the coverage store. Pass ':memory:' for tests.
 */
export function openDatabase(file: string): CoverageDatabase {
    if (file !== ':memory:' && !fs.existsSync(path.dirname(file))) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
    }

    const db = new Database(file, { verbose: process.env.DEBUG ? (message) => log.debug({ sql: message }) : undefined });

    // Enable WAL mode for better concurrency
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return db;
}

/**
 * Initialize the database schema
 */
export function initDatabase(db: CoverageDatabase) {
    const migration = db.transaction(() => {
        // 1. Coverage sessions
        // One row per sub-session; test_uuid stays NULL until a ping token was issued.
        db.prepare(`
            CREATE TABLE IF NOT EXISTS coverage_sessions (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                test_uuid TEXT UNIQUE,
                loop_uuid TEXT,
                started_at INTEGER NOT NULL,      -- epoch ms
                anchor_at INTEGER,                -- epoch ms, offsets are relative to it
                finalized_at INTEGER              -- epoch ms, NULL while measuring
            )
        `).run();

        db.prepare(`CREATE INDEX IF NOT EXISTS idx_sessions_started ON coverage_sessions(started_at)`).run();

        // 2. Fences waiting for submission
        // Deleted together with their session once the control server accepted them.
        db.prepare(`
            CREATE TABLE IF NOT EXISTS coverage_fences (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                session_id INTEGER NOT NULL REFERENCES coverage_sessions(id) ON DELETE CASCADE,
                fence_id TEXT NOT NULL UNIQUE,
                timestamp INTEGER NOT NULL,       -- dateEntered, epoch ms
                exit_timestamp INTEGER,
                latitude REAL NOT NULL,
                longitude REAL NOT NULL,
                horizontal_accuracy REAL,
                avg_ping_ms INTEGER,
                technology TEXT,
                radius_m REAL NOT NULL
            )
        `).run();

        db.prepare(`CREATE INDEX IF NOT EXISTS idx_fences_session ON coverage_fences(session_id, timestamp)`).run();
    });

    try {
        migration();
        log.info('Schema initialized');
    } catch (err) {
        log.error({ err }, 'Schema initialization failed');
        throw err;
    }
}

function lazy<T>(create: () => T): () => T {
    let value: T | undefined;
    return () => {
        if (value === undefined) {
            value = create();
        }
        return value;
    };
}

export interface FenceUpsertParams {
    session_id: number;
    fence_id: string;
    timestamp: number;
    exit_timestamp: number | null;
    latitude: number;
    longitude: number;
    horizontal_accuracy: number | null;
    avg_ping_ms: number | null;
    technology: string | null;
    radius_m: number;
}

// Prepare commonly used statements lazily, once per connection
export function prepareStatements(db: CoverageDatabase) {
    const insertSession = lazy(() => db.prepare<{ started_at: number; test_uuid: string | null; loop_uuid: string | null; anchor_at: number | null }>(`
        INSERT INTO coverage_sessions (started_at, test_uuid, loop_uuid, anchor_at)
        VALUES (@started_at, @test_uuid, @loop_uuid, @anchor_at)
    `));

    const initializeSession = lazy(() => db.prepare<{ id: number; test_uuid: string; loop_uuid: string | null; anchor_at: number }>(`
        UPDATE coverage_sessions
        SET test_uuid = @test_uuid, loop_uuid = @loop_uuid, anchor_at = @anchor_at
        WHERE id = @id
    `));

    const finalizeSession = lazy(() => db.prepare<{ id: number; finalized_at: number }>(`
        UPDATE coverage_sessions SET finalized_at = @finalized_at
        WHERE id = @id AND finalized_at IS NULL
    `));

    const getSessionById = lazy(() => db.prepare<[number], CoverageSessionRow>(`
        SELECT * FROM coverage_sessions WHERE id = ?
    `));

    const getSessionByUUID = lazy(() => db.prepare<[string], CoverageSessionRow>(`
        SELECT * FROM coverage_sessions WHERE test_uuid = ?
    `));

    const getLatestUnfinishedSession = lazy(() => db.prepare<[], CoverageSessionRow>(`
        SELECT * FROM coverage_sessions
        WHERE finalized_at IS NULL
        ORDER BY started_at DESC, id DESC
        LIMIT 1
    `));

    const getMostRecentSession = lazy(() => db.prepare<[], CoverageSessionRow>(`
        SELECT * FROM coverage_sessions
        ORDER BY started_at DESC, id DESC
        LIMIT 1
    `));

    const getAllSessions = lazy(() => db.prepare<[], CoverageSessionRow>(`
        SELECT * FROM coverage_sessions ORDER BY started_at ASC, id ASC
    `));

    const deleteSession = lazy(() => db.prepare<[number]>(`
        DELETE FROM coverage_sessions WHERE id = ?
    `));

    const deleteSessionByUUID = lazy(() => db.prepare<[string]>(`
        DELETE FROM coverage_sessions WHERE test_uuid = ?
    `));

    const upsertFence = lazy(() => db.prepare<FenceUpsertParams>(`
        INSERT INTO coverage_fences (session_id, fence_id, timestamp, exit_timestamp, latitude, longitude, horizontal_accuracy, avg_ping_ms, technology, radius_m)
        VALUES (@session_id, @fence_id, @timestamp, @exit_timestamp, @latitude, @longitude, @horizontal_accuracy, @avg_ping_ms, @technology, @radius_m)
        ON CONFLICT(fence_id) DO UPDATE SET
            session_id = excluded.session_id,
            exit_timestamp = excluded.exit_timestamp,
            avg_ping_ms = excluded.avg_ping_ms,
            technology = excluded.technology
    `));

    const getFencesForSession = lazy(() => db.prepare<[number], CoverageFenceRow>(`
        SELECT * FROM coverage_fences
        WHERE session_id = ?
        ORDER BY timestamp ASC, id ASC
    `));

    const countFencesForSession = lazy(() => db.prepare<[number], { count: number }>(`
        SELECT COUNT(*) AS count FROM coverage_fences WHERE session_id = ?
    `));

    return {
        get insertSession() { return insertSession(); },
        get initializeSession() { return initializeSession(); },
        get finalizeSession() { return finalizeSession(); },
        get getSessionById() { return getSessionById(); },
        get getSessionByUUID() { return getSessionByUUID(); },
        get getLatestUnfinishedSession() { return getLatestUnfinishedSession(); },
        get getMostRecentSession() { return getMostRecentSession(); },
        get getAllSessions() { return getAllSessions(); },
        get deleteSession() { return deleteSession(); },
        get deleteSessionByUUID() { return deleteSessionByUUID(); },
        get upsertFence() { return upsertFence(); },
        get getFencesForSession() { return getFencesForSession(); },
        get countFencesForSession() { return countFencesForSession(); }
    };
}

export type CoverageStatements = ReturnType<typeof prepareStatements>;
