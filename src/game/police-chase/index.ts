/**
 * Police chase simulation.
 *
 * A police corvette defends a cargo freighter from a pirate near a police
 * station, going back to the station for repairs when it runs low. Every
 * ship's AI is a task driven by the AgentSystem.
 *
 * @module police-chase
 */

import type { Clock } from '../ai';
import type { EventBus } from '../event-bus';
import type { GameLoop } from '../game-loop';
import { AgentSystem } from '../systems/agent-system';
import { CombatSystem } from './combat-system';
import { PoliceChaseState } from './police-chase-state';
import type { Scenario } from './scenario-loader';
import { shipAi } from './ship-ai';
import { ShipPhysicsSystem } from './ship-physics-system';

export interface PoliceChase {
    state: PoliceChaseState;
    physics: ShipPhysicsSystem;
    agents: AgentSystem;
    combat: CombatSystem;
}

/** Build the state, the systems and one AI agent per ship */
export function createPoliceChase(scenario: Scenario, eventBus: EventBus, clock: Clock): PoliceChase {
    const state = new PoliceChaseState(scenario);
    const agents = new AgentSystem(eventBus);

    for (const ship of state.allShips()) {
        agents.spawn(ship.entityId, shipAi({ state, clock, eventBus }, ship.role), ship.role);
    }

    return {
        state,
        physics: new ShipPhysicsSystem(state),
        agents,
        combat: new CombatSystem(state, eventBus),
    };
}

/** Register the chase's systems in execution order: physics, AI, combat */
export function registerPoliceChase(loop: GameLoop, chase: PoliceChase): void {
    loop.registerSystem(chase.physics, 'ShipPhysicsSystem');
    loop.registerSystem(chase.agents, 'AgentSystem');
    loop.registerSystem(chase.combat, 'CombatSystem');
}

export { PoliceChaseState } from './police-chase-state';
export { CombatSystem } from './combat-system';
export { ShipPhysicsSystem } from './ship-physics-system';
export { ConsoleRenderer, shipLabel, GRID_COLUMNS, GRID_ROWS } from './console-renderer';
export { loadScenario, parseScenario, ScenarioError, DEFAULT_SCENARIO_PATH } from './scenario-loader';
export type { Scenario, ShipDefinition } from './scenario-loader';
export { attack, reachStation, patrolAi, pirateAi, cargoAi, shipAi, steerTowards } from './ship-ai';
export type { ShipAiContext } from './ship-ai';
export type { Ship, ShipRole } from './ship';
