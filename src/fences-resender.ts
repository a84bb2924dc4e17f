import { Clock } from './clock.js';
import { SendCoverageResultsService } from './coverage-results.js';
import { StoredSession, SubmissionMode } from './fence-persistence.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('resender');

export interface ResendStore {
    cleanup(maxAgeMs: number, now: number, isLaunched: boolean): number;
    sessionsToSubmit(mode: SubmissionMode): StoredSession[];
    deleteSession(id: number): void;
}

export type ResultsServiceFactory = (testUUID: string, anchorAt: number) => SendCoverageResultsService;

export interface ResendReport {
    purged: number;
    sent: string[];
    failed: string[];
}

export interface PersistedFencesResenderOptions {
    store: ResendStore;
    resultsService: ResultsServiceFactory;
    maxResendAgeSeconds: number;
    clock: Clock;
}

interface RunningSweep {
    mode: SubmissionMode;
    sweep: Promise<ResendReport>;
}

function earliestFence(session: StoredSession): number {
    let earliest = Infinity;
    for (const fence of session.fences) {
        earliest = Math.min(earliest, fence.dateEntered);
    }
    return earliest === Infinity ? session.startedAt : earliest;
}

/**
 * Re-submits stored sessions. Warm sweeps (during a run) only touch finalized
 * sessions; the cold sweep at launch takes every session with a test UUID.
 */
export class PersistedFencesResender {
    private store: ResendStore;
    private resultsService: ResultsServiceFactory;
    private maxResendAgeMs: number;
    private clock: Clock;
    private inFlight?: RunningSweep;

    constructor(options: PersistedFencesResenderOptions) {
        this.store = options.store;
        this.resultsService = options.resultsService;
        this.maxResendAgeMs = options.maxResendAgeSeconds * 1000;
        this.clock = options.clock;
    }

    /**
     * Callers asking for the mode already running share its sweep. A request for
     * the other mode waits for it and then runs its own, so a cold sweep is never
     * answered by a warm one.
     */
    public resendPersistentSessions(isLaunched: boolean): Promise<ResendReport> {
        const mode: SubmissionMode = isLaunched ? 'cold' : 'warm';
        const running = this.inFlight;
        if (running) {
            if (running.mode === mode) {
                log.debug({ mode }, 'Resend already running, joining it');
                return running.sweep;
            }
            log.debug({ mode, running: running.mode }, 'Resend queued behind the running sweep');
            return running.sweep
                .catch(() => undefined)
                .then(() => this.resendPersistentSessions(isLaunched));
        }

        const entry: RunningSweep = {
            mode,
            sweep: this.sweep(isLaunched).finally(() => {
                if (this.inFlight === entry) this.inFlight = undefined;
            })
        };
        this.inFlight = entry;
        return entry.sweep;
    }

    private async sweep(isLaunched: boolean): Promise<ResendReport> {
        const report: ResendReport = { purged: 0, sent: [], failed: [] };
        log.info({ mode: isLaunched ? 'cold' : 'warm' }, 'Starting resend');

        try {
            report.purged = this.store.cleanup(this.maxResendAgeMs, this.clock.now(), isLaunched);
        } catch (err) {
            log.warn({ err }, 'Cleanup before resend failed');
        }

        const sessions = this.store.sessionsToSubmit(isLaunched ? 'cold' : 'warm')
            .sort((a, b) => earliestFence(b) - earliestFence(a));

        for (const session of sessions) {
            const { testUUID, anchorAt } = session;
            if (!testUUID || anchorAt === undefined || session.fences.length === 0) {
                log.warn({ testUUID, fenceCount: session.fences.length }, 'Skipping undeliverable session');
                continue;
            }

            const fences = [...session.fences].sort((a, b) => a.dateEntered - b.dateEntered);
            try {
                await this.resultsService(testUUID, anchorAt).send(fences);
                this.store.deleteSession(session.id);
                report.sent.push(testUUID);
                log.info({ testUUID, fenceCount: fences.length }, 'Resent and deleted session');
            } catch (err) {
                report.failed.push(testUUID);
                log.error({ err, testUUID }, 'Resend failed, session kept');
            }
        }

        log.info({ sent: report.sent.length, failed: report.failed.length, purged: report.purged }, 'Resend completed');
        return report;
    }
}
