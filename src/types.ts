// Core measurement inputs. All instants are Unix epoch milliseconds.

export interface LocationSample {
    latitude: number;
    longitude: number;
    horizontalAccuracy: number; // meters, lower is better
    timestamp: number;
}

export type NetworkConnectionType = 'wifi' | 'cellular';

export interface NetworkTypeSample {
    type: NetworkConnectionType;
    timestamp: number;
}

export type PingErrorReason =
    | 'timedOut'
    | 'networkIssue'
    | 'needsReinitialization'
    | 'initiationInProgress'
    | 'initiationFailed';

export type PingResult =
    | { kind: 'success'; durationMs: number }
    | { kind: 'error'; reason: PingErrorReason };

export interface PingOutcome {
    timestamp: number;
    result: PingResult;
}

export type IPVersion = 'IPv4' | 'IPv6';

// Credentials of one sub-session as issued by the control server
export interface SessionCredentials {
    testUUID: string;
    loopUUID?: string;
    pingToken: string;
    pingHost: string;
    pingPort: number;
    ipVersion?: IPVersion;
}

export interface SessionInitializedEvent {
    timestamp: number;
    sessionID: string;
    loopUUID?: string;
}

export interface InaccurateLocationWindow {
    begin: number;
    end?: number;
}

// Merged stream element consumed by the fence engine
export type CoverageEvent =
    | { kind: 'ping'; ping: PingOutcome }
    | { kind: 'location'; location: LocationSample }
    | { kind: 'networkType'; sample: NetworkTypeSample }
    | { kind: 'sessionInitialized'; event: SessionInitializedEvent };

export type StopReason =
    | 'user'
    | 'sessionLimitReached'
    | 'insufficientLocationAccuracy'
    | 'streamEnded';

export type CoverageWarning = 'waitingForGps' | 'disableWifi';

// Database Row Types

export interface CoverageSessionRow {
    id: number;
    test_uuid: string | null;
    loop_uuid: string | null;
    started_at: number;
    anchor_at: number | null;
    finalized_at: number | null;
}

export interface CoverageFenceRow {
    id: number;
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
