import type { EventBus } from '../event-bus';
import type { TickSystem } from '../tick-system';
import { LogHandler } from '@/utilities/log-handler';
import type { PoliceChaseState } from './police-chase-state';
import type { Ship } from './ship';
import { distance } from './vec2';

/**
 * Applies weapons damage between ships in range and ends the simulation when
 * a ship is destroyed.
 *
 * The patrol and the cargo both shoot the pirate. The pirate shoots the
 * patrol when it is in range, otherwise the cargo.
 */
export class CombatSystem implements TickSystem {
    private static log = new LogHandler('CombatSystem');

    private ticks = 0;
    private _ended = false;

    constructor(
        private readonly state: PoliceChaseState,
        private readonly eventBus: EventBus,
    ) {}

    get ended(): boolean {
        return this._ended;
    }

    tick(_dt: number): void {
        this.ticks++;
        if (this._ended) return;

        const dt = this.state.timeStep;
        const patrol = this.state.ship('patrol');
        const pirate = this.state.ship('pirate');
        const cargo = this.state.ship('cargo');

        if (inRange(patrol, pirate)) {
            pirate.integrity -= patrol.damage * dt;
        }
        if (inRange(cargo, pirate)) {
            pirate.integrity -= cargo.damage * dt;
        }
        if (inRange(pirate, patrol)) {
            patrol.integrity -= pirate.damage * dt;
        } else if (inRange(pirate, cargo)) {
            cargo.integrity -= pirate.damage * dt;
        }

        const destroyed = this.state.allShips().filter(ship => ship.integrity <= 0);
        if (destroyed.length === 0) return;

        for (const ship of destroyed) {
            CombatSystem.log.info(`${ship.role} destroyed at tick ${this.ticks}`);
            this.eventBus.emit('ship:destroyed', { entityId: ship.entityId, role: ship.role });
        }

        this._ended = true;
        this.eventBus.emit('simulation:ended', {
            tick: this.ticks,
            reason: `${destroyed.map(ship => ship.role).join(', ')} destroyed`,
        });
    }
}

/** Whether `target` is within `shooter`'s weapons range */
function inRange(shooter: Ship, target: Ship): boolean {
    return distance(shooter.position, target.position) < shooter.weaponsRange;
}
