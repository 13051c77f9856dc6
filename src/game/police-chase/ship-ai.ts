/**
 * Ship behaviors for the police chase, written as tasks.
 *
 * Each behavior reads like a blocking script ("burn towards the target, wait a
 * second, check again") and is stepped once per simulation tick by the
 * AgentSystem. Ships are looked up in the shared state on every step.
 */

import {
    type Clock,
    type Task,
    defer,
    done,
    effect,
    guard,
    map,
    raceDiscard,
    repeat,
    series,
    then,
    wait,
    waitDoing,
    yieldTick,
} from '../ai';
import type { EventBus } from '../event-bus';
import type { PoliceChaseState } from './police-chase-state';
import { type Ship, type ShipRole, impulse, isHealthyAndFueled } from './ship';
import { ZERO, type Vec2, distance, dot, length, negate, normalize, scale, sub } from './vec2';

/** Below this speed a ship counts as standing still (m/s) */
const MIN_SPEED = 0.01;

/** Engine cool-off between course corrections (s) */
const ENGINE_COOLOFF = 1.0;

/** Time spent docked before repairs are done (s) */
const DOCKING_TIME = 5.0;

/** Fraction of weapons range a ship tries to close to */
const ATTACK_RANGE_FACTOR = 0.8;

export interface ShipAiContext {
    state: PoliceChaseState;
    clock: Clock;
    eventBus?: EventBus;
}

/**
 * One engine burn that brings the ship's heading towards `dir`:
 * brake when moving away, correct sideways drift when oblique,
 * push with `cruisePower` when already aligned, full burn from rest.
 */
export function steerTowards(ship: Ship, dir: Vec2, cruisePower: number, dt: number): void {
    if (length(ship.velocity) <= MIN_SPEED) {
        impulse(ship, dir, 1.0, dt);
        return;
    }

    const heading = normalize(ship.velocity);
    const alignment = dot(dir, heading);
    if (alignment <= 0) {
        impulse(ship, negate(heading), 1.0, dt);
    } else if (alignment < 0.5) {
        impulse(ship, normalize(negate(sub(heading, scale(dir, alignment)))), 0.3, dt);
    } else {
        impulse(ship, dir, cruisePower, dt);
    }
}

/** Close in on `target` until within weapons range, one burn per second */
export function attack(ctx: ShipAiContext, self: ShipRole, target: ShipRole): Task<void> {
    return series(
        yieldTick,
        defer(() => {
            const ship = ctx.state.ship(self);
            const offset = sub(ctx.state.ship(target).position, ship.position);
            if (length(offset) <= ship.weaponsRange * ATTACK_RANGE_FACTOR) return done;

            steerTowards(ship, normalize(offset), 0.1, ctx.state.timeStep);
            return wait(ENGINE_COOLOFF, ctx.clock);
        }),
    );
}

/** Head for the station; once there, hold still, then repair and refuel */
export function reachStation(ctx: ShipAiContext, self: ShipRole): Task<void> {
    const holdStill = (): Task<void> => effect(() => {
        ctx.state.ship(self).velocity = ZERO;
    });

    const repair = effect(() => {
        const ship = ctx.state.ship(self);
        ship.integrity = ship.maxIntegrity;
        ship.fuel = ship.maxFuel;
        ctx.eventBus?.emit('ship:docked', { entityId: ship.entityId });
    });

    return series(
        yieldTick,
        defer(() => {
            const ship = ctx.state.ship(self);
            const toStation = sub(ctx.state.stationPosition, ship.position);
            if (length(toStation) <= ctx.state.dockingRadius) {
                return series(waitDoing(holdStill, DOCKING_TIME, ctx.clock), repair);
            }

            steerTowards(ship, normalize(toStation), 0.2, ctx.state.timeStep);
            return wait(ENGINE_COOLOFF, ctx.clock);
        }),
    );
}

/** Attack the pirate while healthy and fueled, otherwise go home for repairs */
export function patrolAi(ctx: ShipAiContext): Task<void> {
    const healthyAndFueled = then(yieldTick, effect(() => isHealthyAndFueled(ctx.state.ship('patrol'))));
    const needDocking = then(yieldTick, map(healthyAndFueled, healthy => !healthy));

    return repeat(raceDiscard(
        guard(healthyAndFueled, attack(ctx, 'patrol', 'pirate')),
        guard(needDocking, reachStation(ctx, 'patrol')),
    ));
}

/** Fight the patrol when it comes close, otherwise go after the cargo */
export function pirateAi(ctx: ShipAiContext): Task<void> {
    const patrolNear = then(yieldTick, effect(() => {
        const patrol = ctx.state.ship('patrol');
        return distance(ctx.state.ship('pirate').position, patrol.position) < patrol.weaponsRange;
    }));
    const patrolFar = map(patrolNear, near => !near);

    return repeat(raceDiscard(
        guard(patrolNear, attack(ctx, 'pirate', 'patrol')),
        guard(patrolFar, attack(ctx, 'pirate', 'cargo')),
    ));
}

/** Keep limping towards the station */
export function cargoAi(ctx: ShipAiContext): Task<void> {
    return repeat(then(yieldTick, reachStation(ctx, 'cargo')));
}

export function shipAi(ctx: ShipAiContext, role: ShipRole): Task<void> {
    switch (role) {
    case 'patrol':
        return patrolAi(ctx);
    case 'pirate':
        return pirateAi(ctx);
    case 'cargo':
        return cargoAi(ctx);
    }
}
