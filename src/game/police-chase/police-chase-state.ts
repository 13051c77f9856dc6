import type { Scenario } from './scenario-loader';
import { SHIP_ROLES, type Ship, type ShipRole } from './ship';
import type { Vec2 } from './vec2';

/** First entity id handed out to ships */
const FIRST_SHIP_ID = 1;

/**
 * Canonical state of the chase. Systems mutate ships in place through this
 * object; behaviors keep a reference to it plus a role, never a ship copy.
 */
export class PoliceChaseState {
    public readonly timeStep: number;
    public readonly fieldSize: number;
    public readonly stationPosition: Vec2;

    private readonly ships: Record<ShipRole, Ship>;
    private readonly byId = new Map<number, Ship>();

    constructor(scenario: Scenario) {
        this.timeStep = scenario.timeStep;
        this.fieldSize = scenario.fieldSize;
        this.stationPosition = scenario.stationPosition;

        const create = (role: ShipRole, entityId: number): Ship => {
            const def = scenario.ships[role];
            return {
                entityId,
                role,
                position: def.position,
                velocity: { x: 0, y: 0 },
                force: { x: 0, y: 0 },
                dryMass: def.dryMass,
                fuel: def.fuel,
                maxFuel: def.maxFuel,
                thrust: def.thrust,
                fuelBurn: def.fuelBurn,
                integrity: def.integrity,
                maxIntegrity: def.integrity,
                damage: def.damage,
                weaponsRange: def.weaponsRange,
            };
        };

        this.ships = {
            patrol: create('patrol', FIRST_SHIP_ID),
            pirate: create('pirate', FIRST_SHIP_ID + 1),
            cargo: create('cargo', FIRST_SHIP_ID + 2),
        };

        for (const role of SHIP_ROLES) {
            const ship = this.ships[role];
            this.byId.set(ship.entityId, ship);
        }
    }

    ship(role: ShipRole): Ship {
        return this.ships[role];
    }

    getShipById(entityId: number): Ship | undefined {
        return this.byId.get(entityId);
    }

    /** All ships in update order: patrol, pirate, cargo */
    allShips(): Ship[] {
        return SHIP_ROLES.map(role => this.ships[role]);
    }

    /** Docking distance around the station */
    get dockingRadius(): number {
        return this.fieldSize * 0.1;
    }
}
