import { LogHandler } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import { EventSubscriptionManager, type EventBus } from './event-bus';
import type { SimulationSettings } from './game-settings';
import type { TickSystem } from './tick-system';

/** Longest frame delta fed into the accumulator, in seconds */
const MAX_FRAME_DELTA = 0.1;

/** Consecutive failures before a tick system is disabled */
export const SYSTEM_CIRCUIT_BREAKER_THRESHOLD = 100;

/** Minimum interval between logged errors of the same origin (ms) */
const ERROR_THROTTLE_MS = 1000;

/** Per-system error tracking */
interface SystemErrorState {
    name: string;
    consecutiveFailures: number;
    disabled: boolean;
    logger: ThrottledLogger;
}

export type RenderCallback = (alpha: number, deltaSec: number) => void;

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Fixed-timestep simulation loop.
 *
 * Frames come either from Node timers (`start`) or from the caller
 * (`runFrame`, `runHeadless`). Each frame feeds its delta into an accumulator
 * and runs as many fixed ticks as fit, then calls the render callback.
 * Every registered system ticks inside its own error boundary, so one failing
 * system cannot stop the others; a system that keeps failing is disabled.
 */
export class GameLoop {
    private static log = new LogHandler('GameLoop');

    /** Track active loops to detect leaked timers */
    private static activeLoops = 0;

    private accumulator = 0;
    private lastTime = 0;
    private running = false;
    private stopRequested = false;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private stopWaiters: Array<() => void> = [];

    /** Frame-level errors (render callback, logic phase) */
    private readonly frameErrors: ThrottledLogger;

    /** Per-system error tracking for circuit breaker & throttled logging */
    private systemErrors = new Map<TickSystem, SystemErrorState>();

    private onRender: RenderCallback | null = null;

    /** When true, ticks are paused but frames and rendering continue */
    private _ticksPaused = false;

    private _tickCount = 0;

    /** Registered tick systems, in execution order */
    private systems: TickSystem[] = [];

    private subscriptions = new EventSubscriptionManager();

    private readonly boundFrame: () => void;

    constructor(
        private readonly settings: SimulationSettings,
        public readonly eventBus: EventBus,
        private readonly now: () => number = () => performance.now(),
    ) {
        this.frameErrors = new ThrottledLogger(GameLoop.log, ERROR_THROTTLE_MS, now);
        this.boundFrame = this.frame.bind(this);

        this.subscriptions.subscribe(eventBus, 'entity:removed', ({ entityId }) => {
            for (const system of this.systems) {
                system.onEntityRemoved?.(entityId);
            }
        });
    }

    /** Register a tick system to be updated each tick */
    public registerSystem(system: TickSystem, name: string = system.constructor.name || 'Unknown'): void {
        this.systems.push(system);
        this.systemErrors.set(system, {
            name,
            consecutiveFailures: 0,
            disabled: false,
            logger: new ThrottledLogger(GameLoop.log, ERROR_THROTTLE_MS, this.now),
        });
    }

    public pauseTicks(): void {
        this._ticksPaused = true;
    }

    public enableTicks(): void {
        if (!this._ticksPaused) return;
        this._ticksPaused = false;
        GameLoop.log.debug('Ticks enabled');
    }

    public get ticksPaused(): boolean {
        return this._ticksPaused;
    }

    /** Number of ticks run so far */
    public get tickCount(): number {
        return this._tickCount;
    }

    /** Seconds of loop time per tick */
    public get tickDuration(): number {
        return 1 / this.settings.tickRate;
    }

    public isSystemDisabled(system: TickSystem): boolean {
        return this.systemErrors.get(system)?.disabled ?? false;
    }

    /** Set the render callback, called once per frame after the ticks */
    public setRenderCallback(callback: RenderCallback | null): void {
        this.onRender = callback;
    }

    /** Run frames on Node timers until stopped */
    public start(): void {
        if (this.running) return;
        this.running = true;
        this.stopRequested = false;
        this.lastTime = this.now();
        this.scheduleFrame();

        GameLoop.activeLoops++;
        if (GameLoop.activeLoops > 1) {
            GameLoop.log.error(`Multiple game loops active (${GameLoop.activeLoops})! This indicates a cleanup leak.`);
        }
    }

    /**
     * Run frames of `frameSec` back to back, without timers, until the loop is
     * stopped or `maxTicks` is reached. `maxTicks` must be set or some system
     * must stop the loop, otherwise this never returns.
     */
    public runHeadless(frameSec: number, onFrame?: (deltaSec: number) => void): void {
        this.stopRequested = false;
        while (!this.stopRequested) {
            onFrame?.(frameSec);
            this.runFrame(frameSec);
        }
    }

    public stop(): void {
        this.stopRequested = true;
        if (this.running) {
            GameLoop.activeLoops = Math.max(0, GameLoop.activeLoops - 1);
        }
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }

        const waiters = this.stopWaiters;
        this.stopWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }

    /** Resolves when stop() is next called */
    public whenStopped(): Promise<void> {
        if (this.stopRequested) return Promise.resolve();
        return new Promise(resolve => {
            this.stopWaiters.push(resolve);
        });
    }

    /** Stop the loop and release systems and subscriptions */
    public destroy(): void {
        this.stop();
        this.subscriptions.unsubscribeAll();
        for (const system of this.systems) {
            system.destroy?.();
        }
        this.systems = [];
        this.systemErrors.clear();
    }

    public get isRunning(): boolean {
        return this.running;
    }

    private scheduleFrame(): void {
        this.timer = setTimeout(this.boundFrame, this.settings.frameDelayMs);
    }

    private frame(): void {
        this.timer = null;
        if (!this.running) return;

        const now = this.now();
        const deltaSec = (now - this.lastTime) / 1000;
        this.lastTime = now;

        this.runFrame(deltaSec);

        if (this.running) {
            this.scheduleFrame();
        }
    }

    /**
     * Advance the loop by one frame: run the fixed ticks that fit into the
     * accumulated time, then render.
     */
    public runFrame(deltaSec: number): void {
        const delta = Math.min(deltaSec, MAX_FRAME_DELTA);
        this.accumulator += delta;

        const shouldTick = !this._ticksPaused && !this.settings.paused;

        // ═══ LOGIC PHASE ═══
        try {
            const tickDuration = this.tickDuration;
            if (shouldTick) {
                const scaledDt = tickDuration * this.settings.gameSpeed;
                while (this.accumulator >= tickDuration && !this.stopRequested) {
                    this.tick(scaledDt);
                    this.accumulator -= tickDuration;
                }
            } else {
                // Drain accumulator to prevent catch-up burst when unpaused
                this.accumulator = 0;
            }
        } catch (e) {
            this.frameErrors.error('Error in logic phase', toError(e));
        }

        // ═══ RENDER PHASE ═══
        if (this.onRender) {
            try {
                this.onRender(this.accumulator / this.tickDuration, delta);
            } catch (e) {
                this.frameErrors.error('Error in render callback', toError(e));
            }
        }
    }

    private tick(dt: number): void {
        for (const system of this.systems) {
            const state = this.systemErrors.get(system);
            if (state?.disabled) continue;

            try {
                system.tick(dt);
                if (state) state.consecutiveFailures = 0;
            } catch (e) {
                this.handleSystemError(system, e);
            }

            if (this.stopRequested) break;
        }

        this._tickCount++;

        const maxTicks = this.settings.maxTicks;
        if (maxTicks > 0 && this._tickCount >= maxTicks) {
            GameLoop.log.info(`Reached tick limit (${maxTicks})`);
            this.stop();
        }
    }

    /**
     * Handle a per-system tick error. Logs with per-system throttling, tracks
     * consecutive failures, and disables the system via circuit breaker.
     */
    private handleSystemError(system: TickSystem, error: unknown): void {
        const state = this.systemErrors.get(system);
        if (!state) throw toError(error);

        state.consecutiveFailures++;

        if (state.consecutiveFailures >= SYSTEM_CIRCUIT_BREAKER_THRESHOLD) {
            state.disabled = true;
            GameLoop.log.error(
                `System "${state.name}" disabled after ${SYSTEM_CIRCUIT_BREAKER_THRESHOLD} consecutive failures`,
                toError(error),
            );
            return;
        }

        state.logger.error(`System "${state.name}" tick failed`, toError(error));
    }
}
