import { ManualClock, systemClock, type Clock } from '../ai';
import { EventBus } from '../event-bus';
import { GameLoop } from '../game-loop';
import type { SimulationSettings } from '../game-settings';
import { ConsoleRenderer } from './console-renderer';
import { createPoliceChase, registerPoliceChase, type PoliceChase } from './index';
import type { Scenario } from './scenario-loader';
import type { ShipRole } from './ship';

/** Tick limit for headless runs when the settings set none */
export const HEADLESS_DEFAULT_MAX_TICKS = 100_000;

export interface ShipSummary {
    role: ShipRole;
    integrity: number;
    fuel: number;
}

export interface RunSummary {
    ticks: number;
    /** Why the simulation ended, undefined when it hit the tick limit */
    endReason?: string;
    destroyed: ShipRole[];
    dockings: number;
    ships: ShipSummary[];
}

interface Session {
    loop: GameLoop;
    chase: PoliceChase;
    summary: () => RunSummary;
}

function createSession(settings: SimulationSettings, scenario: Scenario, clock: Clock): Session {
    const eventBus = new EventBus();
    const loop = new GameLoop(settings, eventBus);
    const chase = createPoliceChase(scenario, eventBus, clock);
    registerPoliceChase(loop, chase);

    let endReason: string | undefined;
    const destroyed: ShipRole[] = [];
    let dockings = 0;

    eventBus.on('ship:docked', () => {
        dockings++;
    });
    eventBus.on('ship:destroyed', ({ entityId }) => {
        const ship = chase.state.getShipById(entityId);
        if (ship) destroyed.push(ship.role);
    });
    eventBus.on('simulation:ended', ({ reason }) => {
        endReason = reason;
        loop.stop();
    });

    const summary = (): RunSummary => ({
        ticks: loop.tickCount,
        endReason,
        destroyed: [...destroyed],
        dockings,
        ships: chase.state.allShips().map(ship => ({
            role: ship.role,
            integrity: ship.integrity,
            fuel: ship.fuel,
        })),
    });

    return { loop, chase, summary };
}

/**
 * Run the chase as fast as possible on a manual clock. Each frame advances the
 * clock by one tick's worth of loop time, so waits measured in seconds take the
 * same number of ticks as in a real-time run.
 */
export function runHeadless(settings: SimulationSettings, scenario: Scenario): RunSummary {
    const clock = new ManualClock();
    const limited: SimulationSettings = {
        ...settings,
        paused: false,
        maxTicks: settings.maxTicks > 0 ? settings.maxTicks : HEADLESS_DEFAULT_MAX_TICKS,
    };
    const session = createSession(limited, scenario, clock);
    const frameSec = session.loop.tickDuration;

    session.loop.runHeadless(frameSec, delta => clock.advance(delta));
    session.loop.destroy();
    return session.summary();
}

/** Run the chase in real time on Node timers, drawing every frame */
export async function runRealtime(
    settings: SimulationSettings,
    scenario: Scenario,
    write?: (text: string) => void,
): Promise<RunSummary> {
    const session = createSession(settings, scenario, systemClock);

    if (settings.render) {
        const renderer = new ConsoleRenderer(session.chase.state, write);
        session.loop.setRenderCallback(() => renderer.draw());
    }

    const stopped = session.loop.whenStopped();
    session.loop.start();
    await stopped;
    session.loop.destroy();
    return session.summary();
}
