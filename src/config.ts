import { config as loadDotenv } from 'dotenv';
import path from 'path';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
    z.coerce.number().positive().default(fallback);

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    CLIENT_ORIGIN: z.string().default('*'),
    CONTROL_SERVER_URL: z.string().url().default('http://localhost:8080/RMBTControlServer'),
    CLIENT_UUID: z.string().min(1).optional(),
    DATABASE_PATH: z.string().default(path.join('data', 'coverage.db')),
    FENCE_RADIUS_METERS: numberFromEnv(20),
    MIN_LOCATION_ACCURACY_METERS: numberFromEnv(10),
    PING_INTERVAL_MS: numberFromEnv(500),
    PING_TIMEOUT_MS: numberFromEnv(1000),
    PING_FAILURE_REINIT_THRESHOLD: z.coerce.number().int().positive().default(5),
    REQUEST_TIMEOUT_MS: numberFromEnv(10000),
    MAX_RESEND_AGE_SECONDS: numberFromEnv(7 * 24 * 3600),
    DEFAULT_MAX_COVERAGE_SESSION_SECONDS: numberFromEnv(4 * 3600),
    DEFAULT_MAX_COVERAGE_MEASUREMENT_SECONDS: numberFromEnv(15 * 60),
    LOCATION_WARNING_DELAY_SECONDS: numberFromEnv(3),
    INSUFFICIENT_ACCURACY_AUTO_STOP_SECONDS: numberFromEnv(30 * 60),
    ONLINE_CHECK_INTERVAL_MS: numberFromEnv(5000)
});

export interface AgentConfig {
    port: number;
    clientOrigin: string;
    controlServerUrl: string;
    clientUUID?: string;
    databasePath: string;
    fenceRadiusMeters: number;
    minimumLocationAccuracyMeters: number;
    pingIntervalMs: number;
    pingTimeoutMs: number;
    pingFailureReinitThreshold: number;
    requestTimeoutMs: number;
    maxResendAgeSeconds: number;
    defaultMaxCoverageSessionSeconds: number;
    defaultMaxCoverageMeasurementSeconds: number;
    locationWarningDelaySeconds: number;
    insufficientAccuracyAutoStopSeconds: number;
    onlineCheckIntervalMs: number;
}

/**
 * Build the agent configuration from environment variables.
 * Pass an explicit env object to bypass `.env` loading (tests do).
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AgentConfig {
    if (!env) {
        loadDotenv();
    }
    const parsed = EnvSchema.parse(env ?? process.env);

    return {
        port: parsed.PORT,
        clientOrigin: parsed.CLIENT_ORIGIN,
        controlServerUrl: parsed.CONTROL_SERVER_URL.replace(/\/$/, ''),
        clientUUID: parsed.CLIENT_UUID,
        databasePath: parsed.DATABASE_PATH,
        fenceRadiusMeters: parsed.FENCE_RADIUS_METERS,
        minimumLocationAccuracyMeters: parsed.MIN_LOCATION_ACCURACY_METERS,
        pingIntervalMs: parsed.PING_INTERVAL_MS,
        pingTimeoutMs: parsed.PING_TIMEOUT_MS,
        pingFailureReinitThreshold: parsed.PING_FAILURE_REINIT_THRESHOLD,
        requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
        maxResendAgeSeconds: parsed.MAX_RESEND_AGE_SECONDS,
        defaultMaxCoverageSessionSeconds: parsed.DEFAULT_MAX_COVERAGE_SESSION_SECONDS,
        defaultMaxCoverageMeasurementSeconds: parsed.DEFAULT_MAX_COVERAGE_MEASUREMENT_SECONDS,
        locationWarningDelaySeconds: parsed.LOCATION_WARNING_DELAY_SECONDS,
        insufficientAccuracyAutoStopSeconds: parsed.INSUFFICIENT_ACCURACY_AUTO_STOP_SECONDS,
        onlineCheckIntervalMs: parsed.ONLINE_CHECK_INTERVAL_MS
    };
}
