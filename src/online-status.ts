import net from 'net';
import { moduleLogger } from './logger.js';

const log = moduleLogger('online-status');

const TIMEOUT_MS = 1000;

export interface OnlineStatusOptions {
    host: string;
    port: number;
    intervalMs: number;
    // Replaces the TCP reachability check (tests)
    reachable?: () => Promise<boolean>;
}

export function endpointOf(url: string): { host: string; port: number } {
    const parsed = new URL(url);
    const port = parsed.port ? Number(parsed.port) : parsed.protocol === 'https:' ? 443 : 80;
    return { host: parsed.hostname, port };
}

/**
 * Periodic reachability check of the control server. Fires `onReconnect`
 * on every offline to online transition.
 */
export class OnlineStatusMonitor {
    private host: string;
    private port: number;
    private intervalMs: number;
    private isReachable: () => Promise<boolean>;
    private isRunning: boolean = false;
    private timer: NodeJS.Timeout | null = null;
    private online: boolean | null = null;

    public onReconnect?: () => void;

    constructor(options: OnlineStatusOptions) {
        this.host = options.host;
        this.port = options.port;
        this.intervalMs = options.intervalMs;
        this.isReachable = options.reachable ?? (() => this.tcpPing());
    }

    public get isOnline(): boolean | null {
        return this.online;
    }

    public start() {
        if (this.isRunning) return;
        this.isRunning = true;
        void this.loop();
        log.info({ host: this.host, port: this.port }, 'Online status monitor started');
    }

    public stop() {
        this.isRunning = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        log.info('Online status monitor stopped');
    }

    // Single check; exposed so callers can check on demand
    public async check(): Promise<boolean> {
        let reachable = false;
        try {
            reachable = await this.isReachable();
        } catch (err) {
            log.warn({ err }, 'Reachability check failed');
        }
        this.update(reachable);
        return reachable;
    }

    private async loop() {
        if (!this.isRunning) return;

        await this.check();

        if (this.isRunning) {
            this.timer = setTimeout(() => void this.loop(), this.intervalMs);
        }
    }

    private update(reachable: boolean) {
        const previous = this.online;
        this.online = reachable;
        if (previous === reachable) return;

        log.info({ online: reachable }, 'Control server reachability changed');
        if (previous === false && reachable) {
            this.onReconnect?.();
        }
    }

    private tcpPing(): Promise<boolean> {
        return new Promise((resolve) => {
            const socket = new net.Socket();
            let resolved = false;

            const onDone = (success: boolean) => {
                if (resolved) return;
                resolved = true;
                socket.destroy();
                resolve(success);
            };

            socket.setTimeout(TIMEOUT_MS);

            socket.connect(this.port, this.host, () => {
                onDone(true);
            });

            socket.on('error', () => {
                onDone(false);
            });

            socket.on('timeout', () => {
                onDone(false);
            });
        });
    }
}
