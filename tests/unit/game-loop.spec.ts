import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { EventBus } from '@/game/event-bus';
import { GameLoop, SYSTEM_CIRCUIT_BREAKER_THRESHOLD } from '@/game/game-loop';
import { getDefaultSettings, type SimulationSettings } from '@/game/game-settings';
import type { TickSystem } from '@/game/tick-system';
import { LogHandler } from '@/utilities/log-handler';

function makeSettings(overrides: Partial<SimulationSettings> = {}): SimulationSettings {
    return { ...getDefaultSettings(), tickRate: 10, ...overrides };
}

/** Tick system recording the dt of every tick */
function recorder(): TickSystem & { dts: number[] } {
    const dts: number[] = [];
    return {
        dts,
        tick(dt: number) {
            dts.push(dt);
        },
    };
}

function failing(): TickSystem {
    return {
        tick() {
            throw new Error('system broke');
        },
    };
}

describe('GameLoop', () => {
    let bus: EventBus;
    let loop: GameLoop;

    beforeEach(() => {
        LogHandler.getLogManager().setConsoleOutput(false);
        bus = new EventBus();
    });

    afterEach(() => {
        loop.destroy();
    });

    // ─── Fixed timestep ───────────────────────────────────────────────────────

    it('runs as many fixed ticks as fit into the accumulated time', () => {
        loop = new GameLoop(makeSettings(), bus);
        const system = recorder();
        loop.registerSystem(system, 'Recorder');

        loop.runFrame(0.05);
        expect(loop.tickCount).toBe(0);

        loop.runFrame(0.05);
        expect(loop.tickCount).toBe(1);
        expect(system.dts).toEqual([0.1]);
    });

    it('caps long frames', () => {
        loop = new GameLoop(makeSettings(), bus);

        loop.runFrame(5);

        expect(loop.tickCount).toBe(1);
    });

    it('scales the tick dt by the game speed', () => {
        loop = new GameLoop(makeSettings({ gameSpeed: 2 }), bus);
        const system = recorder();
        loop.registerSystem(system, 'Recorder');

        loop.runFrame(0.1);

        expect(system.dts).toEqual([0.2]);
    });

    it('ticks systems in registration order', () => {
        loop = new GameLoop(makeSettings(), bus);
        const order: string[] = [];
        loop.registerSystem({ tick: () => { order.push('physics'); } }, 'Physics');
        loop.registerSystem({ tick: () => { order.push('agents'); } }, 'Agents');

        loop.runFrame(0.1);

        expect(order).toEqual(['physics', 'agents']);
    });

    // ─── Pausing ──────────────────────────────────────────────────────────────

    it('does not tick while paused and drops the paused time', () => {
        loop = new GameLoop(makeSettings(), bus);

        loop.pauseTicks();
        loop.runFrame(0.1);
        expect(loop.tickCount).toBe(0);
        expect(loop.ticksPaused).toBe(true);

        loop.enableTicks();
        loop.runFrame(0.05);
        expect(loop.tickCount).toBe(0);
    });

    it('honours the paused setting', () => {
        loop = new GameLoop(makeSettings({ paused: true }), bus);

        loop.runFrame(0.1);

        expect(loop.tickCount).toBe(0);
    });

    // ─── Error isolation ──────────────────────────────────────────────────────

    it('keeps ticking other systems when one fails', () => {
        loop = new GameLoop(makeSettings(), bus);
        const healthy = recorder();
        loop.registerSystem(failing(), 'Failing');
        loop.registerSystem(healthy, 'Healthy');

        loop.runFrame(0.1);

        expect(healthy.dts).toHaveLength(1);
        expect(loop.tickCount).toBe(1);
    });

    it('disables a system after too many consecutive failures', () => {
        loop = new GameLoop(makeSettings(), bus);
        const broken = failing();
        const tickSpy = vi.spyOn(broken, 'tick');
        loop.registerSystem(broken, 'Failing');

        for (let i = 0; i < SYSTEM_CIRCUIT_BREAKER_THRESHOLD - 1; i++) loop.runFrame(0.1);
        expect(loop.isSystemDisabled(broken)).toBe(false);

        loop.runFrame(0.1);
        expect(loop.isSystemDisabled(broken)).toBe(true);

        loop.runFrame(0.1);
        expect(tickSpy).toHaveBeenCalledTimes(SYSTEM_CIRCUIT_BREAKER_THRESHOLD);
    });

    it('resets the failure count after a successful tick', () => {
        loop = new GameLoop(makeSettings(), bus);
        let calls = 0;
        const flaky: TickSystem = {
            tick() {
                calls++;
                if (calls % 50 !== 0) throw new Error('flaky');
            },
        };
        loop.registerSystem(flaky, 'Flaky');

        for (let i = 0; i < 150; i++) loop.runFrame(0.1);

        expect(loop.isSystemDisabled(flaky)).toBe(false);
    });

    // ─── Stopping ─────────────────────────────────────────────────────────────

    it('stops at the tick limit', async () => {
        loop = new GameLoop(makeSettings({ maxTicks: 3 }), bus);
        const stopped = loop.whenStopped();

        loop.runHeadless(0.1);

        expect(loop.tickCount).toBe(3);
        await expect(stopped).resolves.toBeUndefined();
    });

    it('stops a headless run when a system asks for it', () => {
        loop = new GameLoop(makeSettings(), bus);
        const frames: number[] = [];
        loop.registerSystem({
            tick: () => {
                if (loop.tickCount === 4) loop.stop();
            },
        }, 'Stopper');

        loop.runHeadless(0.1, delta => frames.push(delta));

        expect(loop.tickCount).toBe(5);
        expect(frames).toEqual([0.1, 0.1, 0.1, 0.1, 0.1]);
    });

    it('skips the remaining systems once stopped mid-tick', () => {
        loop = new GameLoop(makeSettings(), bus);
        const after = recorder();
        loop.registerSystem({ tick: () => loop.stop() }, 'Stopper');
        loop.registerSystem(after, 'After');

        loop.runFrame(0.1);

        expect(after.dts).toEqual([]);
    });

    // ─── Rendering ────────────────────────────────────────────────────────────

    it('renders once per frame with the leftover fraction of a tick', () => {
        loop = new GameLoop(makeSettings(), bus);
        const render = vi.fn();
        loop.setRenderCallback(render);

        loop.runFrame(0.05);

        expect(render).toHaveBeenCalledTimes(1);
        expect(render.mock.calls[0][0]).toBeCloseTo(0.5);
        expect(render.mock.calls[0][1]).toBe(0.05);
    });

    it('keeps ticking when rendering throws', () => {
        loop = new GameLoop(makeSettings(), bus);
        loop.setRenderCallback(() => {
            throw new Error('no terminal');
        });

        loop.runFrame(0.1);
        loop.runFrame(0.1);

        expect(loop.tickCount).toBe(2);
    });

    // ─── Timers ───────────────────────────────────────────────────────────────

    it('runs frames on timers until stopped', () => {
        vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
        try {
            let nowMs = 0;
            loop = new GameLoop(makeSettings({ frameDelayMs: 100 }), bus, () => nowMs);

            loop.start();
            expect(loop.isRunning).toBe(true);

            nowMs = 100;
            vi.advanceTimersByTime(100);
            expect(loop.tickCount).toBe(1);

            loop.stop();
            expect(loop.isRunning).toBe(false);
            expect(vi.getTimerCount()).toBe(0);
        } finally {
            vi.useRealTimers();
        }
    });

    // ─── Lifecycle ────────────────────────────────────────────────────────────

    it('forwards entity removal to every system', () => {
        loop = new GameLoop(makeSettings(), bus);
        const removed: number[] = [];
        loop.registerSystem({ tick: () => {}, onEntityRemoved: id => { removed.push(id); } }, 'Tracker');

        bus.emit('entity:removed', { entityId: 7 });

        expect(removed).toEqual([7]);
    });

    it('destroys systems and drops its subscriptions on destroy', () => {
        loop = new GameLoop(makeSettings(), bus);
        const destroy = vi.fn();
        loop.registerSystem({ tick: () => {}, destroy }, 'Owned');

        loop.destroy();

        expect(destroy).toHaveBeenCalledTimes(1);
        expect(bus.listenerCount('entity:removed')).toBe(0);
    });
});
