import { type Vec2, ZERO, add, scale } from './vec2';

export type ShipRole = 'patrol' | 'pirate' | 'cargo';

export const SHIP_ROLES: readonly ShipRole[] = ['patrol', 'pirate', 'cargo'];

/**
 * A ship's physical and combat state. Owned by PoliceChaseState; AI tasks
 * look ships up by role on every step instead of keeping their own copy.
 */
export interface Ship {
    readonly entityId: number;
    readonly role: ShipRole;

    position: Vec2;
    velocity: Vec2;
    /** Current force, cleared after each integration step */
    force: Vec2;

    /** kg */
    readonly dryMass: number;
    /** kg */
    fuel: number;
    readonly maxFuel: number;
    /** N per second of burn */
    readonly thrust: number;
    /** kg per second of burn */
    readonly fuelBurn: number;

    integrity: number;
    readonly maxIntegrity: number;
    /** Integrity removed per simulated second in range */
    readonly damage: number;
    /** m */
    readonly weaponsRange: number;
}

export function shipMass(ship: Ship): number {
    return ship.dryMass + ship.fuel;
}

/**
 * Fire the engines along `dir` at `power` (0..1) for one simulation step.
 * Does nothing when the tank cannot cover the burn.
 * @returns whether the engines fired
 */
export function impulse(ship: Ship, dir: Vec2, power: number, dt: number): boolean {
    const burn = ship.fuelBurn * power * dt;
    if (ship.fuel <= burn) return false;

    ship.force = scale(dir, ship.thrust * power * dt);
    ship.fuel -= burn;
    return true;
}

/** Advance position and velocity by `dt` seconds and clear the force */
export function integrate(ship: Ship, dt: number): void {
    ship.position = add(ship.position, scale(ship.velocity, dt));
    ship.velocity = add(ship.velocity, scale(ship.force, dt / shipMass(ship)));
    ship.force = ZERO;
}

export function isHealthyAndFueled(ship: Ship, threshold = 0.4): boolean {
    return ship.integrity > ship.maxIntegrity * threshold && ship.fuel > ship.maxFuel * threshold;
}
