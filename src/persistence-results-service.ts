import { SendCoverageResultsService } from './coverage-results.js';
import { ServiceError } from './errors.js';
import { Fence } from './fence.js';
import { ResendReport, ResultsServiceFactory } from './fences-resender.js';
import { moduleLogger } from './logger.js';
import { ActiveSubSession } from './session-controller.js';

const log = moduleLogger('results-service');

export interface PersistenceManagingOptions {
    activeSession: () => ActiveSubSession | undefined;
    store: { deleteSessionByUUID(testUUID: string): boolean };
    resultsService: ResultsServiceFactory;
    resender: { resendPersistentSessions(isLaunched: boolean): Promise<ResendReport> };
}

/**
 * Submits the active sub-session's fences, drops its stored copy once the
 * control server accepted them, then gives older stored sessions a chance.
 */
export class PersistenceManagingCoverageResultsService implements SendCoverageResultsService {
    private activeSession: () => ActiveSubSession | undefined;
    private store: PersistenceManagingOptions['store'];
    private resultsService: ResultsServiceFactory;
    private resender: PersistenceManagingOptions['resender'];

    constructor(options: PersistenceManagingOptions) {
        this.activeSession = options.activeSession;
        this.store = options.store;
        this.resultsService = options.resultsService;
        this.resender = options.resender;
    }

    public async send(fences: Fence[]): Promise<void> {
        const active = this.activeSession();
        if (!active) {
            log.error('Cannot send fences without a test UUID');
            throw new ServiceError('missingTestUUID');
        }

        const { testUUID, anchorAt } = active;
        const own = fences.filter((fence) => fence.sessionUUID === testUUID);

        if (own.length === 0) {
            log.info({ testUUID }, 'No fences for active session, resending stored ones only');
            await this.resender.resendPersistentSessions(false);
            return;
        }

        try {
            await this.resultsService(testUUID, anchorAt).send(own);
        } catch (err) {
            log.error({ err, testUUID, fenceCount: own.length }, 'Submission failed, session kept for retry');
            throw err;
        }

        this.store.deleteSessionByUUID(testUUID);
        log.info({ testUUID, fenceCount: own.length }, 'Submitted and deleted session');

        await this.resender.resendPersistentSessions(false);
    }
}
