/**
 * Loads the police chase scenario from YAML.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { type Vec2, scale, vec2 } from './vec2';
import { SHIP_ROLES, type ShipRole } from './ship';

export const DEFAULT_SCENARIO_PATH = fileURLToPath(new URL('./data/scenario.yaml', import.meta.url));

/** Thrown for a scenario file that cannot be used */
export class ScenarioError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ScenarioError';
    }
}

/** Initial state of one ship, in SI units */
export interface ShipDefinition {
    position: Vec2;
    dryMass: number;
    fuel: number;
    maxFuel: number;
    /** N per second of burn */
    thrust: number;
    /** kg per second of burn */
    fuelBurn: number;
    integrity: number;
    /** Integrity per second in range */
    damage: number;
    /** m */
    weaponsRange: number;
}

export interface Scenario {
    /** Simulated seconds per tick */
    timeStep: number;
    /** Side of the square field, m */
    fieldSize: number;
    stationPosition: Vec2;
    ships: Record<ShipRole, ShipDefinition>;
}

const SHIP_KEYS = [
    'position', 'dryMass', 'maxFuel', 'fuelLevel', 'thrustPerStep',
    'burnPerStep', 'integrity', 'damagePerStep', 'weaponsRange',
];

const SCENARIO_KEYS = ['timeStep', 'fieldSize', 'station', 'ships'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, where: string): Record<string, unknown> {
    if (!isRecord(value)) {
        throw new ScenarioError(`Expected a mapping at "${where}"`);
    }
    return value;
}

function rejectUnknownKeys(record: Record<string, unknown>, allowed: string[], where: string): void {
    for (const key of Object.keys(record)) {
        if (!allowed.includes(key)) {
            throw new ScenarioError(`Unknown key "${key}" in ${where}. Valid keys: ${allowed.join(', ')}`);
        }
    }
}

function parsePositive(value: unknown, where: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ScenarioError(`"${where}" must be a positive number, got ${JSON.stringify(value)}`);
    }
    return value;
}

function parseFraction(value: unknown, where: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
        throw new ScenarioError(`"${where}" must be a number between 0 and 1, got ${JSON.stringify(value)}`);
    }
    return value;
}

/** Parse an [x, y] pair of field fractions into meters */
function parseFieldPoint(value: unknown, fieldSize: number, where: string): Vec2 {
    if (!Array.isArray(value) || value.length !== 2) {
        throw new ScenarioError(`"${where}" must be a pair [x, y]`);
    }
    const x = parseFraction(value[0], `${where}[0]`);
    const y = parseFraction(value[1], `${where}[1]`);
    return scale(vec2(x, y), fieldSize);
}

function parseShip(value: unknown, role: ShipRole, fieldSize: number, timeStep: number): ShipDefinition {
    const where = `ships.${role}`;
    const raw = expectRecord(value, where);
    rejectUnknownKeys(raw, SHIP_KEYS, where);

    const maxFuel = parsePositive(raw.maxFuel, `${where}.maxFuel`);
    return {
        position: parseFieldPoint(raw.position, fieldSize, `${where}.position`),
        dryMass: parsePositive(raw.dryMass, `${where}.dryMass`),
        fuel: maxFuel * parseFraction(raw.fuelLevel, `${where}.fuelLevel`),
        maxFuel,
        thrust: parsePositive(raw.thrustPerStep, `${where}.thrustPerStep`) / timeStep,
        fuelBurn: parsePositive(raw.burnPerStep, `${where}.burnPerStep`) / timeStep,
        integrity: parsePositive(raw.integrity, `${where}.integrity`),
        damage: parsePositive(raw.damagePerStep, `${where}.damagePerStep`) / timeStep,
        weaponsRange: parseFraction(raw.weaponsRange, `${where}.weaponsRange`) * fieldSize,
    };
}

/** Parse scenario YAML text. Throws ScenarioError on invalid content. */
export function parseScenario(text: string): Scenario {
    let document: unknown;
    try {
        document = parseYaml(text);
    } catch (e) {
        throw new ScenarioError('Scenario is not valid YAML', { cause: e });
    }

    const raw = expectRecord(document, 'scenario');
    rejectUnknownKeys(raw, SCENARIO_KEYS, 'scenario');

    const timeStep = parsePositive(raw.timeStep, 'timeStep');
    const fieldSize = parsePositive(raw.fieldSize, 'fieldSize');
    const rawShips = expectRecord(raw.ships, 'ships');
    rejectUnknownKeys(rawShips, [...SHIP_ROLES], 'ships');

    return {
        timeStep,
        fieldSize,
        stationPosition: parseFieldPoint(raw.station, fieldSize, 'station'),
        ships: {
            patrol: parseShip(rawShips.patrol, 'patrol', fieldSize, timeStep),
            pirate: parseShip(rawShips.pirate, 'pirate', fieldSize, timeStep),
            cargo: parseShip(rawShips.cargo, 'cargo', fieldSize, timeStep),
        },
    };
}

/** Load a scenario file, the bundled one by default */
export function loadScenario(filePath: string = DEFAULT_SCENARIO_PATH): Scenario {
    let text: string;
    try {
        text = readFileSync(filePath, 'utf8');
    } catch (e) {
        throw new ScenarioError(`Cannot read scenario file ${filePath}`, { cause: e });
    }
    return parseScenario(text);
}
