import * as Boom from '@hapi/boom';
import { z } from 'zod';
import { moduleLogger } from './logger.js';
import { IPVersion, SessionCredentials } from './types.js';

const log = moduleLogger('control-server');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const CoverageRequestResponseSchema = z.object({
    test_uuid: z.string().min(1),
    ping_token: z.string().min(1),
    ping_host: z.string().min(1),
    ping_port: z.coerce.number().int().min(1).max(65535),
    ip_version: z.number().int().nullish(),
    max_coverage_session_seconds: z.number().positive().nullish(),
    max_coverage_measurement_seconds: z.number().positive().nullish()
});

export interface CoverageRequestResult {
    credentials: SessionCredentials;
    maxCoverageSessionSeconds?: number;
    maxCoverageMeasurementSeconds?: number;
}

// Wire shape of one fence in POST /coverageResult
export interface CoverageFencePayload {
    timestamp_microseconds: number;
    location: {
        latitude: number;
        longitude: number;
        accuracy?: number;
    };
    avg_ping_ms?: number;
    offset_ms: number;
    duration_ms?: number;
    radius_m: number;
    technology?: string;
    technology_id?: number;
}

export interface CoverageResultPayload {
    test_uuid: string;
    client_uuid?: string;
    fences: CoverageFencePayload[];
}

export interface ControlServerOptions {
    baseUrl: string;
    clientUUID?: string;
    timeoutMs: number;
    fetch?: FetchLike;
}

function ipVersionFromWire(value: number | null | undefined): IPVersion | undefined {
    if (value === 4) return 'IPv4';
    if (value === 6) return 'IPv6';
    return undefined;
}

export class ControlServerClient {
    private baseUrl: string;
    private clientUUID?: string;
    private timeoutMs: number;
    private fetchImpl: FetchLike;

    constructor(options: ControlServerOptions) {
        this.baseUrl = options.baseUrl.replace(/\/$/, '');
        this.clientUUID = options.clientUUID;
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    public get url(): string {
        return this.baseUrl;
    }

    public async requestCoverageSession(time: number, loopUUID?: string): Promise<CoverageRequestResult> {
        const response = await this.post('/coverageRequest', {
            time,
            measurement_type: 'dedicated',
            client_uuid: this.clientUUID,
            loop_uuid: loopUUID
        });

        let json: unknown;
        try {
            json = await response.json();
        } catch {
            throw Boom.badGateway('Control server returned invalid JSON', { path: '/coverageRequest' });
        }

        const parsed = CoverageRequestResponseSchema.safeParse(json);
        if (!parsed.success) {
            log.warn({ issues: parsed.error.issues }, 'Malformed coverage request response');
            throw Boom.badGateway('Malformed coverage request response', { path: '/coverageRequest' });
        }

        const body = parsed.data;
        return {
            credentials: {
                testUUID: body.test_uuid,
                loopUUID,
                pingToken: body.ping_token,
                pingHost: body.ping_host,
                pingPort: body.ping_port,
                ipVersion: ipVersionFromWire(body.ip_version)
            },
            maxCoverageSessionSeconds: body.max_coverage_session_seconds ?? undefined,
            maxCoverageMeasurementSeconds: body.max_coverage_measurement_seconds ?? undefined
        };
    }

    public async submitCoverageResult(payload: CoverageResultPayload): Promise<void> {
        const body: CoverageResultPayload = this.clientUUID && !payload.client_uuid
            ? { ...payload, client_uuid: this.clientUUID }
            : payload;

        await this.post('/coverageResult', body);
        log.info({ testUUID: payload.test_uuid, fenceCount: payload.fences.length }, 'Coverage result submitted');
    }

    // Resolves only for 2xx answers; everything else becomes a Boom error
    private async post(path: string, body: object): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}${path}`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (err) {
            if (err instanceof Error && err.name === 'TimeoutError') {
                throw Boom.gatewayTimeout(`Control server timed out on ${path}`);
            }
            log.debug({ err, path }, 'Control server unreachable');
            throw Boom.badGateway(`Control server unreachable on ${path}`);
        }

        if (response.status >= 200 && response.status < 300) {
            return response;
        }

        if (response.status >= 400) {
            throw new Boom.Boom(`Control server answered ${response.status} on ${path}`, {
                statusCode: response.status
            });
        }
        throw Boom.badGateway(`Control server answered ${response.status} on ${path}`, { status: response.status });
    }
}
