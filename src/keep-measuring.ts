import { moduleLogger } from './logger.js';

const log = moduleLogger('keep-measuring');

const KEEP_ALIVE_INTERVAL_MS = 60 * 1000;

export interface KeepAliveHandle {
    release(): void;
}

export type KeepAliveFactory = () => KeepAliveHandle;

// A referenced interval keeps the process alive while a run is active
const intervalKeepAlive: KeepAliveFactory = () => {
    const timer = setInterval(() => log.debug('Coverage measurement still active'), KEEP_ALIVE_INTERVAL_MS);
    return { release: () => clearInterval(timer) };
};

export interface MeasuringToken {
    release(): void;
}

/**
 * Reference-counted activity shared by concurrent runs: the keep-alive
 * handle exists exactly while at least one token is held.
 */
export class KeepMeasuringActivity {
    private static instance: KeepMeasuringActivity;
    private createHandle: KeepAliveFactory;
    private handle: KeepAliveHandle | null = null;
    private count: number = 0;

    constructor(createHandle: KeepAliveFactory = intervalKeepAlive) {
        this.createHandle = createHandle;
    }

    public static getInstance(): KeepMeasuringActivity {
        if (!KeepMeasuringActivity.instance) {
            KeepMeasuringActivity.instance = new KeepMeasuringActivity();
        }
        return KeepMeasuringActivity.instance;
    }

    public get activeCount(): number {
        return this.count;
    }

    public get isActive(): boolean {
        return this.handle !== null;
    }

    public acquire(): MeasuringToken {
        this.count++;
        if (!this.handle) {
            this.handle = this.createHandle();
            log.info('Keep-measuring activity started');
        }

        let released = false;
        return {
            release: () => {
                if (released) return;
                released = true;
                this.releaseOne();
            }
        };
    }

    private releaseOne() {
        this.count = Math.max(0, this.count - 1);
        if (this.count === 0 && this.handle) {
            this.handle.release();
            this.handle = null;
            log.info('Keep-measuring activity ended');
        }
    }
}
