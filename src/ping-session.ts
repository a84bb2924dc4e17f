import { Clock } from './clock.js';
import { PingError, TransportClosedError } from './errors.js';
import { moduleLogger } from './logger.js';
import { PingErrorReason, SessionCredentials } from './types.js';
import { DatagramTransport } from './udp-transport.js';

const log = moduleLogger('ping-session');

export const PING_REQUEST_TAG = 'RP01';
export const PING_REPLY_TAG = 'RR01';
export const PING_ERROR_TAG = 'RE01';
const RESPONSE_LENGTH = 8;

// Supplies ping credentials; implemented by the session lifecycle controller
export interface SessionInitiating {
    initiate(): Promise<SessionCredentials>;
}

export interface PingResponse {
    tag: typeof PING_REPLY_TAG | typeof PING_ERROR_TAG;
    sequence: number;
}

export function encodePingRequest(sequence: number, token: string): Buffer {
    const header = Buffer.alloc(RESPONSE_LENGTH);
    header.write(PING_REQUEST_TAG, 0, 'ascii');
    header.writeUInt32BE(sequence >>> 0, 4);
    return Buffer.concat([header, Buffer.from(token, 'base64')]);
}

export function decodePingResponse(frame: Buffer): PingResponse | undefined {
    if (frame.length < RESPONSE_LENGTH) return undefined;

    const tag = frame.toString('ascii', 0, 4);
    if (tag !== PING_REPLY_TAG && tag !== PING_ERROR_TAG) return undefined;

    return { tag, sequence: frame.readUInt32BE(4) };
}

interface PendingPing {
    sentAt: number;
    resolve: (durationMs: number) => void;
    reject: (err: PingError) => void;
    timeout: AbortController;
}

export interface UdpPingSessionOptions {
    initiator: SessionInitiating;
    transport: DatagramTransport;
    clock: Clock;
    timeoutMs: number;
    initialSequence?: number;
}

/**
 * RTR UDP ping session: `RP01 | seq | token` requests, answered by
 * `RR01 | seq` (success) or `RE01 | seq` (token rejected).
 * Requests may be pipelined; replies are matched by sequence number only.
 */
export class UdpPingSession {
    private initiator: SessionInitiating;
    private transport: DatagramTransport;
    private clock: Clock;
    private timeoutMs: number;
    private sequence: number;
    private pending: Map<number, PendingPing> = new Map();

    // Bumped on every transport (re)start so a stale receive loop can tell it was replaced
    private generation = 0;
    private receiverGeneration?: number;

    constructor(options: UdpPingSessionOptions) {
        this.initiator = options.initiator;
        this.transport = options.transport;
        this.clock = options.clock;
        this.timeoutMs = options.timeoutMs;
        this.sequence = options.initialSequence ?? Math.floor(Math.random() * 0x100000000);
    }

    public get pendingCount(): number {
        return this.pending.size;
    }

    public async initiatePingSession(): Promise<string> {
        const credentials = await this.initiator.initiate();

        this.generation++;
        this.rejectAll('networkIssue');
        await this.transport.start(credentials.pingHost, credentials.pingPort, credentials.ipVersion);
        this.ensureReceiving();

        log.debug({ host: credentials.pingHost, port: credentials.pingPort, testUUID: credentials.testUUID }, 'Ping session initiated');
        return credentials.pingToken;
    }

    /**
     * Send one ping and resolve with its round trip in milliseconds.
     * Rejects with a `PingError` carrying the failure reason.
     */
    public async sendPing(token: string): Promise<number> {
        this.sequence = (this.sequence + 1) >>> 0;
        const seq = this.sequence;
        const frame = encodePingRequest(seq, token);

        const result = new Promise<number>((resolve, reject) => {
            this.pending.set(seq, {
                sentAt: this.clock.now(),
                resolve,
                reject,
                timeout: new AbortController()
            });
        });

        try {
            await this.transport.send(frame);
        } catch (err) {
            log.debug({ err, seq }, 'Ping send failed');
            this.settle(seq, new PingError('networkIssue'));
            return result;
        }

        const entry = this.pending.get(seq);
        if (entry) {
            void this.clock.sleep(this.timeoutMs, entry.timeout.signal).then((elapsed) => {
                if (elapsed) this.settle(seq, new PingError('timedOut'));
            });
        }
        this.ensureReceiving();

        return result;
    }

    public close() {
        this.generation++;
        this.receiverGeneration = undefined;
        this.rejectAll('networkIssue');
        this.transport.close();
    }

    private ensureReceiving() {
        if (this.receiverGeneration === this.generation) return;
        this.receiverGeneration = this.generation;
        void this.receiveLoop(this.generation);
    }

    private async receiveLoop(generation: number) {
        for (;;) {
            let frame: Buffer;
            try {
                frame = await this.transport.receive();
            } catch (err) {
                if (generation !== this.generation) return;
                if (err instanceof TransportClosedError) {
                    this.receiverGeneration = undefined;
                    this.rejectAll('networkIssue');
                    return;
                }
                // The socket stays usable; only the pings in flight are lost
                log.warn({ err }, 'Ping transport error');
                this.rejectAll('networkIssue');
                continue;
            }

            if (generation !== this.generation) return;
            this.handleFrame(frame);
        }
    }

    private handleFrame(frame: Buffer) {
        const response = decodePingResponse(frame);
        if (!response) return;

        if (response.tag === PING_REPLY_TAG) {
            this.settle(response.sequence, this.clock.now());
            return;
        }

        if (this.pending.has(response.sequence)) {
            this.settle(response.sequence, new PingError('needsReinitialization'));
        } else {
            // Error for a request we no longer track: the whole session is gone
            log.info({ seq: response.sequence }, 'Ping server rejected session');
            this.rejectAll('needsReinitialization');
        }
    }

    private settle(seq: number, outcome: number | PingError) {
        const entry = this.pending.get(seq);
        if (!entry) return;
        this.pending.delete(seq);
        entry.timeout.abort();

        if (outcome instanceof PingError) {
            entry.reject(outcome);
        } else {
            entry.resolve(outcome - entry.sentAt);
        }
    }

    private rejectAll(reason: PingErrorReason) {
        for (const seq of [...this.pending.keys()]) {
            this.settle(seq, new PingError(reason));
        }
    }
}
