/**
 * Time source shared by the pacer, the session timers and the fence engine.
 *
 * `sleep` resolves `true` when the delay elapsed and `false` when `signal`
 * aborted first; it never rejects.
 */
export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

export class SystemClock implements Clock {
    public now(): number {
        return Date.now();
    }

    public sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
        return new Promise((resolve) => {
            if (signal?.aborted) {
                resolve(false);
                return;
            }

            const onAbort = () => {
                clearTimeout(timer);
                resolve(false);
            };
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve(true);
            }, Math.max(0, ms));

            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}

interface Sleeper {
    due: number;
    order: number;
    resolve: (elapsed: boolean) => void;
}

// Lets every pending promise chain run before virtual time moves on
async function settle(): Promise<void> {
    for (let i = 0; i < 3; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}

/**
 * Test-controlled clock: time only moves through `advance`, which wakes
 * sleepers in due order and lets their continuations run in between.
 */
export class VirtualClock implements Clock {
    private current: number;
    private sleepers: Sleeper[] = [];
    private order = 0;

    constructor(start: number = 0) {
        this.current = start;
    }

    public now(): number {
        return this.current;
    }

    public sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
        if (signal?.aborted) return Promise.resolve(false);
        if (ms <= 0) return Promise.resolve(true);

        return new Promise((resolve) => {
            const sleeper: Sleeper = {
                due: this.current + ms,
                order: this.order++,
                resolve
            };
            this.sleepers.push(sleeper);

            signal?.addEventListener('abort', () => {
                const idx = this.sleepers.indexOf(sleeper);
                if (idx !== -1) {
                    this.sleepers.splice(idx, 1);
                    resolve(false);
                }
            }, { once: true });
        });
    }

    public get pendingSleepers(): number {
        return this.sleepers.length;
    }

    public async advance(ms: number): Promise<void> {
        await this.advanceTo(this.current + ms);
    }

    public async advanceTo(instant: number): Promise<void> {
        await settle();
        for (;;) {
            const next = this.nextDue(instant);
            if (!next) break;

            this.sleepers.splice(this.sleepers.indexOf(next), 1);
            this.current = next.due;
            next.resolve(true);
            await settle();
        }
        this.current = Math.max(this.current, instant);
        await settle();
    }

    private nextDue(limit: number): Sleeper | undefined {
        let best: Sleeper | undefined;
        for (const sleeper of this.sleepers) {
            if (sleeper.due > limit) continue;
            if (!best || sleeper.due < best.due || (sleeper.due === best.due && sleeper.order < best.order)) {
                best = sleeper;
            }
        }
        return best;
    }
}
