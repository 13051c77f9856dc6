import { LogHandler } from './log-handler';

/**
 * Throttled logger for hot paths.
 *
 * When an agent faults every tick, this logger emits at most one entry per
 * `throttleMs` and reports how many messages were suppressed in between.
 *
 * Usage:
 *   const tl = new ThrottledLogger(log, 1000);
 *   tl.error('Agent 3 step failed', err);
 */
export class ThrottledLogger {
    private lastTime = Number.NEGATIVE_INFINITY;
    private suppressed = 0;

    constructor(
        private readonly log: LogHandler,
        private readonly throttleMs: number,
        private readonly now: () => number = () => performance.now()
    ) {}

    /**
     * Update throttle state and return the message to log,
     * or null when it is suppressed.
     */
    private shouldLog(message: string): string | null {
        const now = this.now();
        if (now - this.lastTime < this.throttleMs) {
            this.suppressed++;
            return null;
        }

        this.lastTime = now;
        if (this.suppressed > 0) {
            const result = `${message} (${this.suppressed} similar suppressed)`;
            this.suppressed = 0;
            return result;
        }
        return message;
    }

    /**
     * Log an error if enough time has passed since the last one.
     * Returns `true` when the message was logged, `false` when suppressed.
     */
    error(message: string, error: Error): boolean {
        const finalMessage = this.shouldLog(message);
        if (finalMessage === null) return false;
        this.log.error(finalMessage, error);
        return true;
    }

    /** Same throttling as error(), for non-fatal issues. */
    warn(message: string): boolean {
        const finalMessage = this.shouldLog(message);
        if (finalMessage === null) return false;
        this.log.warn(finalMessage);
        return true;
    }
}
