import type { TickSystem } from '../tick-system';
import type { PoliceChaseState } from './police-chase-state';
import { integrate } from './ship';

/**
 * Moves every ship by one simulation step. Runs before the AgentSystem, so
 * a burn decided by an AI this tick takes effect on the next one.
 */
export class ShipPhysicsSystem implements TickSystem {
    constructor(private readonly state: PoliceChaseState) {}

    tick(_dt: number): void {
        for (const ship of this.state.allShips()) {
            integrate(ship, this.state.timeStep);
        }
    }
}
