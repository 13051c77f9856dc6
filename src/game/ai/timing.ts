import { type Step, type Task, completed, done, step, suspended } from './task';

/** Monotonic time source, in seconds. */
export interface Clock {
    now(): number;
}

/** Wall clock backed by `performance.now()`. */
export const systemClock: Clock = {
    now: () => performance.now() / 1000,
};

/**
 * Clock that only moves when told to. Drives headless simulations, where a
 * frame's worth of time passes per frame regardless of how fast it ran.
 */
export class ManualClock implements Clock {
    private current: number;

    constructor(start = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    advance(seconds: number): void {
        if (seconds < 0) {
            throw new Error(`ManualClock cannot move backwards (advance by ${seconds})`);
        }
        this.current += seconds;
    }

    set(seconds: number): void {
        if (seconds < this.current) {
            throw new Error(`ManualClock cannot move backwards (${this.current} -> ${seconds})`);
        }
        this.current = seconds;
    }
}

/**
 * Suspend until `interval` seconds have passed on `clock`, calling `action`
 * with the elapsed time on every tick spent waiting.
 *
 * The start time is read on the first step. Every poll reads the clock again,
 * so variable tick lengths are tolerated. `action` is stepped exactly once per
 * waiting tick; if it suspends, its continuation is dropped.
 */
export function waitDoing(
    action: (elapsed: number) => Task<void>,
    interval: number,
    clock: Clock = systemClock,
): Task<void> {
    return () => {
        const start = clock.now();

        const poll = (): Step<void> => {
            const elapsed = clock.now() - start;
            if (elapsed >= interval) return completed(undefined);
            return suspended(() => {
                step(action(elapsed));
                return poll();
            });
        };

        return poll();
    };
}

/** Suspend until `interval` seconds have passed on `clock`. */
export function wait(interval: number, clock: Clock = systemClock): Task<void> {
    return waitDoing(() => done, interval, clock);
}
