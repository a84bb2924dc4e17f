import { Clock, SystemClock } from './clock.js';
import { AgentConfig } from './config.js';
import { ControlServerClient, FetchLike } from './control-server.js';
import { CoverageMeasurement } from './coverage-measurement.js';
import { ControlServerCoverageResultsService } from './coverage-results.js';
import { CoverageDatabase } from './database.js';
import { DeviceFeeds } from './device-feeds.js';
import { mergeCoverageEvents } from './event-merger.js';
import { SqliteFencePersistenceService } from './fence-persistence.js';
import { PersistedFencesResender, ResultsServiceFactory } from './fences-resender.js';
import { KeepMeasuringActivity } from './keep-measuring.js';
import { moduleLogger } from './logger.js';
import { PersistenceManagingCoverageResultsService } from './persistence-results-service.js';
import { PingPacer } from './ping-pacer.js';
import { UdpPingSession } from './ping-session.js';
import { CoverageSessionController } from './session-controller.js';
import { DatagramTransport, UdpTransport } from './udp-transport.js';

const log = moduleLogger('factory');

export interface NetworkCoverageDependencies {
    config: AgentConfig;
    db: CoverageDatabase;
    clock?: Clock;
    fetch?: FetchLike;
    transport?: DatagramTransport;
    feeds?: DeviceFeeds;
    keepMeasuring?: KeepMeasuringActivity;
}

/**
 * Wires the coverage stack: control server client, persistence, resender,
 * session controller, UDP ping session and the fence engine.
 */
export class NetworkCoverageFactory {
    public readonly clock: Clock;
    public readonly feeds: DeviceFeeds;
    public readonly controlServer: ControlServerClient;
    public readonly store: SqliteFencePersistenceService;
    public readonly resender: PersistedFencesResender;
    public readonly controller: CoverageSessionController;
    public readonly pingSession: UdpPingSession;
    public readonly measurement: CoverageMeasurement;
    private pingIntervalMs: number;
    private pingFailureReinitThreshold: number;
    private pacer?: PingPacer;

    constructor(deps: NetworkCoverageDependencies) {
        const { config } = deps;
        const clock = deps.clock ?? new SystemClock();
        const feeds = deps.feeds ?? new DeviceFeeds();
        this.clock = clock;
        this.feeds = feeds;
        this.pingIntervalMs = config.pingIntervalMs;
        this.pingFailureReinitThreshold = config.pingFailureReinitThreshold;

        this.controlServer = new ControlServerClient({
            baseUrl: config.controlServerUrl,
            clientUUID: config.clientUUID,
            timeoutMs: config.requestTimeoutMs,
            fetch: deps.fetch
        });

        this.store = new SqliteFencePersistenceService(deps.db);

        const controlServer = this.controlServer;
        const resultsService: ResultsServiceFactory = (testUUID, anchorAt) =>
            new ControlServerCoverageResultsService(controlServer, testUUID, anchorAt);

        this.resender = new PersistedFencesResender({
            store: this.store,
            resultsService,
            maxResendAgeSeconds: config.maxResendAgeSeconds,
            clock
        });

        const resender = this.resender;
        this.controller = new CoverageSessionController({
            requester: controlServer,
            clock,
            defaultMaxSessionSeconds: config.defaultMaxCoverageSessionSeconds,
            defaultMaxMeasurementSeconds: config.defaultMaxCoverageMeasurementSeconds,
            beforeRequest: async () => {
                await resender.resendPersistentSessions(false);
            }
        });

        this.pingSession = new UdpPingSession({
            initiator: this.controller,
            transport: deps.transport ?? new UdpTransport(),
            clock,
            timeoutMs: config.pingTimeoutMs
        });

        const controller = this.controller;
        const results = new PersistenceManagingCoverageResultsService({
            activeSession: () => controller.activeSession,
            store: this.store,
            resultsService,
            resender
        });

        this.measurement = new CoverageMeasurement({
            clock,
            updates: (signal) => this.runEvents(signal),
            persistence: this.store,
            results,
            radioTechnology: () => feeds.radioTechnology,
            fenceRadiusMeters: config.fenceRadiusMeters,
            minimumLocationAccuracyMeters: config.minimumLocationAccuracyMeters,
            locationWarningDelaySeconds: config.locationWarningDelaySeconds,
            insufficientAccuracyAutoStopSeconds: config.insufficientAccuracyAutoStopSeconds,
            keepMeasuring: deps.keepMeasuring,
            locationGate: () => controller.hasAttemptedInitialization,
            ipVersion: () => controller.activeSession?.ipVersion
        });

        this.controller.onSubSessionExpired = () => this.pacer?.requestReinitialization();
        this.controller.onSessionLimitReached = () => {
            void this.measurement.stop('sessionLimitReached');
        };
    }

    // Each run gets a fresh pacer so it always starts by requesting a token
    private runEvents(signal: AbortSignal) {
        const pacer = new PingPacer(this.pingSession, this.clock, this.pingIntervalMs, this.pingFailureReinitThreshold);
        this.pacer = pacer;

        const sessions = this.controller.begin(signal);
        signal.addEventListener('abort', () => {
            this.pingSession.close();
            log.debug('Run aborted, ping session closed');
        }, { once: true });

        return mergeCoverageEvents({
            pings: pacer.pings(signal),
            locations: this.feeds.locations(signal),
            networkTypes: this.feeds.networkTypes(signal),
            sessions
        }, signal);
    }
}
