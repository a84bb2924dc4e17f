import { Clock } from './clock.js';
import { SendCoverageResultsService } from './coverage-results.js';
import { CoverageSummary, summarizeCoverage } from './coverage-summary.js';
import { distanceMeters, Fence, fenceAt } from './fence.js';
import { FencePersistenceService } from './fence-persistence.js';
import { KeepMeasuringActivity, MeasuringToken } from './keep-measuring.js';
import { moduleLogger } from './logger.js';
import { radioGeneration } from './radio-technology.js';
import {
    CoverageEvent,
    CoverageWarning,
    InaccurateLocationWindow,
    IPVersion,
    LocationSample,
    NetworkTypeSample,
    PingOutcome,
    SessionInitializedEvent,
    StopReason
} from './types.js';

const log = moduleLogger('coverage');

export interface CoverageMeasurementOptions {
    clock: Clock;
    // Builds the merged event stream of one run; it must end when `signal` aborts
    updates: (signal: AbortSignal) => AsyncIterable<CoverageEvent>;
    persistence: FencePersistenceService;
    results: SendCoverageResultsService;
    radioTechnology: () => string | undefined;
    fenceRadiusMeters: number;
    minimumLocationAccuracyMeters: number;
    locationWarningDelaySeconds: number;
    insufficientAccuracyAutoStopSeconds: number;
    keepMeasuring?: KeepMeasuringActivity;
    // Location samples are ignored while this returns false
    locationGate?: () => boolean;
    ipVersion?: () => IPVersion | undefined;
}

export interface FenceSnapshot {
    id: string;
    latitude: number;
    longitude: number;
    dateEntered: number;
    dateExited?: number;
    radiusMeters: number;
    averagePing?: number;
    pingCount: number;
    technology?: string;
    generation?: string;
    sessionUUID?: string;
}

export interface CoverageSnapshot {
    isStarted: boolean;
    startedAt?: number;
    testUUID?: string;
    subSessionCount: number;
    fences: FenceSnapshot[];
    latestPingMs?: number;
    latestTechnology?: string;
    locationAccuracy?: number;
    warnings: CoverageWarning[];
    stopReason?: StopReason;
    ipVersion?: IPVersion;
}

/**
 * Fence segmentation engine. A single consumer reads the merged event stream
 * and owns every fence; nothing else mutates them while a run is active.
 */
export class CoverageMeasurement {
    private options: CoverageMeasurementOptions;
    private clock: Clock;
    private keepMeasuring: KeepMeasuringActivity;

    private started = false;
    private runStartedAt?: number;
    private abort?: AbortController;
    private consumer?: Promise<CoverageSummary>;
    private consumerSettled = true;
    private measuringToken?: MeasuringToken;
    private stopRequest?: { reason: StopReason; at: number };

    private fences: Fence[] = [];
    private pings: PingOutcome[] = [];
    private inaccurateWindows: InaccurateLocationWindow[] = [];
    private warnings: CoverageWarning[] = [];
    private lastLocation?: LocationSample;
    private latestTechnology?: string;
    private isOnWifi = false;
    private canWarnAboutAccuracy = false;
    private hasEverHadAccurateLocation = false;
    private activeSessionUUID?: string;
    private subSessionCount = 0;
    private lastStopReason?: StopReason;

    // Hooks for the server to forward state to connected devices
    public onUpdate?: (snapshot: CoverageSnapshot) => void;
    public onFinished?: (summary: CoverageSummary) => void;

    constructor(options: CoverageMeasurementOptions) {
        this.options = options;
        this.clock = options.clock;
        this.keepMeasuring = options.keepMeasuring ?? KeepMeasuringActivity.getInstance();
    }

    public get isStarted(): boolean {
        return this.started;
    }

    public get currentFences(): readonly Fence[] {
        return this.fences;
    }

    /**
     * Begin a run. Returns once the consumer loop is running; use
     * `finished()` to await its summary.
     */
    public start() {
        if (this.started || !this.consumerSettled) return;

        const abort = new AbortController();
        this.started = true;
        this.abort = abort;
        this.runStartedAt = this.clock.now();
        this.stopRequest = undefined;
        this.fences = [];
        this.pings = [];
        this.inaccurateWindows = [];
        this.warnings = [];
        this.lastLocation = undefined;
        this.latestTechnology = undefined;
        this.isOnWifi = false;
        this.canWarnAboutAccuracy = false;
        this.hasEverHadAccurateLocation = false;
        this.activeSessionUUID = undefined;
        this.subSessionCount = 0;
        this.lastStopReason = undefined;
        this.measuringToken = this.keepMeasuring.acquire();

        log.info({ startedAt: this.runStartedAt }, 'Coverage measurement started');

        void this.clock.sleep(this.options.locationWarningDelaySeconds * 1000, abort.signal).then((elapsed) => {
            if (!elapsed) return;
            this.canWarnAboutAccuracy = true;
            if (this.lastLocation) this.checkAccuracyWarning(this.lastLocation);
            this.publish();
        });

        void this.clock.sleep(this.options.insufficientAccuracyAutoStopSeconds * 1000, abort.signal).then((elapsed) => {
            if (!elapsed || !this.started || this.hasEverHadAccurateLocation) return;
            log.warn('No accurate location received, stopping');
            void this.stop('insufficientLocationAccuracy');
        });

        this.consumerSettled = false;
        this.consumer = this.consume(this.options.updates(abort.signal), abort.signal);
        this.publish();
    }

    /**
     * Stop the active run and resolve with its summary.
     * Resolves `undefined` when nothing was running.
     */
    public async stop(reason: StopReason = 'user'): Promise<CoverageSummary | undefined> {
        const consumer = this.consumer;
        if (!consumer || this.consumerSettled) return undefined;

        if (this.started && !this.stopRequest) {
            this.stopRequest = { reason, at: this.clock.now() };
            this.abort?.abort();
        }
        return consumer;
    }

    public async finished(): Promise<CoverageSummary | undefined> {
        return this.consumer;
    }

    public snapshot(): CoverageSnapshot {
        let latestPingMs: number | undefined;
        for (let i = this.pings.length - 1; i >= 0; i--) {
            const result = this.pings[i].result;
            if (result.kind === 'success') {
                latestPingMs = result.durationMs;
                break;
            }
        }

        return {
            isStarted: this.started,
            startedAt: this.started ? this.runStartedAt : undefined,
            testUUID: this.activeSessionUUID,
            subSessionCount: this.subSessionCount,
            fences: this.fences.map(fenceSnapshot),
            latestPingMs,
            latestTechnology: radioGeneration(this.latestTechnology) ?? this.latestTechnology,
            locationAccuracy: this.lastLocation?.horizontalAccuracy,
            warnings: [...this.warnings],
            stopReason: this.lastStopReason,
            ipVersion: this.options.ipVersion?.()
        };
    }

    private async consume(events: AsyncIterable<CoverageEvent>, signal: AbortSignal): Promise<CoverageSummary> {
        try {
            for await (const event of events) {
                if (signal.aborted) break;
                await this.process(event);
                this.publish();
            }
        } catch (err) {
            log.error({ err }, 'Coverage event stream failed');
        }

        const request = this.stopRequest ?? { reason: 'streamEnded', at: this.clock.now() };
        const summary = await this.finish(request.reason, request.at);
        this.consumerSettled = true;
        return summary;
    }

    private async process(event: CoverageEvent) {
        switch (event.kind) {
            case 'ping':
                this.handlePing(event.ping);
                break;
            case 'location':
                await this.handleLocation(event.location);
                break;
            case 'networkType':
                this.handleNetworkType(event.sample);
                break;
            case 'sessionInitialized':
                await this.handleSessionInitialized(event.event);
                break;
        }
    }

    private handlePing(ping: PingOutcome) {
        if (this.isOnWifi) return;
        if (this.inInaccurateWindow(ping.timestamp)) return;

        this.pings.push(ping);
        fenceAt(this.fences, ping.timestamp)?.appendPing(ping);
    }

    private async handleLocation(location: LocationSample) {
        if (this.options.locationGate && !this.options.locationGate()) return;

        const technology = this.options.radioTechnology();
        this.lastLocation = location;
        this.latestTechnology = technology;

        if (location.horizontalAccuracy > this.options.minimumLocationAccuracyMeters) {
            this.openInaccurateWindow(location.timestamp);
            this.checkAccuracyWarning(location);
            return;
        }

        this.closeInaccurateWindow(location.timestamp);
        this.removeWarning('waitingForGps');

        const deadline = (this.runStartedAt ?? 0) + this.options.insufficientAccuracyAutoStopSeconds * 1000;
        if (!this.hasEverHadAccurateLocation && location.timestamp < deadline) {
            this.hasEverHadAccurateLocation = true;
        }

        // Wi-Fi only updates warnings, fences stay untouched
        if (this.isOnWifi) return;

        const current = this.fences[this.fences.length - 1];
        if (!current) {
            this.fences.push(this.createFence(location, technology));
            return;
        }

        if (distanceMeters(current.startingLocation, location) >= this.options.fenceRadiusMeters) {
            current.exit(location.timestamp);
            if (this.activeSessionUUID) {
                await this.persist('save', () => this.options.persistence.save(current));
            }
            this.fences.push(this.createFence(location, technology));
        } else {
            current.appendLocation(location);
            if (technology) current.appendTechnology(technology);
        }
    }

    private handleNetworkType(sample: NetworkTypeSample) {
        const onWifi = sample.type === 'wifi';
        if (onWifi === this.isOnWifi) return;

        this.isOnWifi = onWifi;
        if (onWifi) {
            this.addWarning('disableWifi');
        } else {
            this.removeWarning('disableWifi');
        }
    }

    private async handleSessionInitialized(event: SessionInitializedEvent) {
        const persistence = this.options.persistence;
        const previous = this.activeSessionUUID;
        this.activeSessionUUID = event.sessionID;
        this.subSessionCount++;

        if (!previous) {
            // First token of the run: everything measured so far joins this sub-session
            await this.persist('sessionStarted', () => persistence.sessionStarted(this.runStartedAt ?? event.timestamp));
            await this.persist('sessionInitialized', () => persistence.sessionInitialized(event.sessionID, event.timestamp, event.loopUUID));

            for (const fence of this.fences) {
                fence.sessionUUID = event.sessionID;
            }
            for (const fence of this.fences) {
                if (!fence.isOpen) {
                    await this.persist('save', () => persistence.save(fence));
                }
            }
            return;
        }

        await this.persist('sessionFinalized', () => persistence.sessionFinalized(event.timestamp));
        await this.persist('sessionStarted', () => persistence.sessionStarted(event.timestamp));
        await this.persist('sessionInitialized', () => persistence.sessionInitialized(event.sessionID, event.timestamp, event.loopUUID));

        const open = this.fences[this.fences.length - 1];
        if (open?.isOpen) {
            open.sessionUUID = event.sessionID;
        }
        log.info({ testUUID: event.sessionID, loopUUID: event.loopUUID }, 'Switched to chained sub-session');
    }

    private async finish(reason: StopReason, at: number): Promise<CoverageSummary> {
        this.started = false;
        this.abort?.abort();
        this.measuringToken?.release();
        this.measuringToken = undefined;
        this.lastStopReason = reason;
        this.warnings = [];

        if (!this.activeSessionUUID) {
            if (this.fences.length > 0) {
                log.info({ fenceCount: this.fences.length }, 'Stopped before any session token, discarding fences');
            }
            this.fences = [];
        } else {
            const open = this.fences[this.fences.length - 1];
            if (open?.isOpen) {
                open.exit(at);
                await this.persist('save', () => this.options.persistence.save(open));
            }

            try {
                log.info({ fenceCount: this.fences.length, testUUID: this.activeSessionUUID }, 'Sending coverage results');
                await this.options.results.send(this.fences);
            } catch (err) {
                log.error({ err }, 'Sending coverage results failed');
            }

            await this.persist('sessionFinalized', () => this.options.persistence.sessionFinalized(at));
        }

        const summary = summarizeCoverage({
            testUUID: this.activeSessionUUID,
            stopReason: reason,
            startedAt: this.runStartedAt ?? at,
            stoppedAt: at,
            subSessionCount: this.subSessionCount,
            fences: this.fences,
            pings: this.pings
        });

        log.info({ reason, fenceCount: summary.fenceCount }, 'Coverage measurement stopped');
        this.publish();
        try {
            this.onFinished?.(summary);
        } catch (err) {
            log.warn({ err }, 'Summary observer failed');
        }
        return summary;
    }

    private async persist(operation: string, action: () => Promise<void>) {
        try {
            await action();
        } catch (err) {
            log.error({ err, operation }, 'Persistence failed');
        }
    }

    private createFence(location: LocationSample, technology: string | undefined): Fence {
        return new Fence({
            startingLocation: location,
            dateEntered: location.timestamp,
            technology,
            radiusMeters: this.options.fenceRadiusMeters,
            sessionUUID: this.activeSessionUUID
        });
    }

    private openInaccurateWindow(at: number) {
        const last = this.inaccurateWindows[this.inaccurateWindows.length - 1];
        if (last && last.end === undefined) return;
        this.inaccurateWindows.push({ begin: at });
    }

    private closeInaccurateWindow(at: number) {
        const last = this.inaccurateWindows[this.inaccurateWindows.length - 1];
        if (last && last.end === undefined) {
            last.end = at;
        }
    }

    private inInaccurateWindow(timestamp: number): boolean {
        return this.inaccurateWindows.some((window) =>
            window.begin <= timestamp && (window.end === undefined || timestamp < window.end));
    }

    private checkAccuracyWarning(location: LocationSample) {
        if (
            this.started &&
            this.canWarnAboutAccuracy &&
            location.horizontalAccuracy > this.options.minimumLocationAccuracyMeters
        ) {
            this.addWarning('waitingForGps');
        }
    }

    private addWarning(warning: CoverageWarning) {
        if (!this.warnings.includes(warning)) this.warnings.push(warning);
    }

    private removeWarning(warning: CoverageWarning) {
        this.warnings = this.warnings.filter((w) => w !== warning);
    }

    private publish() {
        if (!this.onUpdate) return;
        try {
            this.onUpdate(this.snapshot());
        } catch (err) {
            log.warn({ err }, 'Snapshot observer failed');
        }
    }
}

function fenceSnapshot(fence: Fence): FenceSnapshot {
    const technology = fence.significantTechnology;
    return {
        id: fence.id,
        latitude: fence.startingLocation.latitude,
        longitude: fence.startingLocation.longitude,
        dateEntered: fence.dateEntered,
        dateExited: fence.dateExited,
        radiusMeters: fence.radiusMeters,
        averagePing: fence.averagePing,
        pingCount: fence.pings.length,
        technology,
        generation: radioGeneration(technology),
        sessionUUID: fence.sessionUUID
    };
}
