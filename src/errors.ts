import { PingErrorReason } from './types.js';

export class PingError extends Error {
    public readonly reason: PingErrorReason;

    constructor(reason: PingErrorReason, message?: string) {
        super(message ?? `Ping failed: ${reason}`);
        this.name = 'PingError';
        this.reason = reason;
    }
}

export function pingErrorReason(err: unknown): PingErrorReason {
    return err instanceof PingError ? err.reason : 'networkIssue';
}

export class TransportClosedError extends Error {
    constructor(message = 'Transport closed') {
        super(message);
        this.name = 'TransportClosedError';
    }
}

export type ServiceErrorCode = 'missingTestUUID';

export class ServiceError extends Error {
    public readonly code: ServiceErrorCode;

    constructor(code: ServiceErrorCode) {
        super(`Coverage results service error: ${code}`);
        this.name = 'ServiceError';
        this.code = code;
    }
}
