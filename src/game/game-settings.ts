import { existsSync, readFileSync } from 'fs';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('Settings');

/** Default settings file, looked up in the working directory */
export const SETTINGS_FILE_NAME = 'tickwork.settings.json';

/**
 * Simulation settings - add new settings here together with a default and
 * they are picked up from the settings file automatically.
 */
export interface SimulationSettings {
    // Loop
    paused: boolean;
    gameSpeed: number;
    /** Simulation ticks per second of loop time */
    tickRate: number;
    /** Delay between frames when running on timers */
    frameDelayMs: number;
    /** Stop after this many ticks (0 = until the simulation ends) */
    maxTicks: number;

    // Output
    render: boolean;
    /** Run on a manual clock as fast as possible instead of in real time */
    headless: boolean;
}

/** Default values for all settings */
const DEFAULT_SETTINGS: SimulationSettings = {
    paused: false,
    gameSpeed: 1.0,
    tickRate: 100,
    frameDelayMs: 10,
    maxTicks: 0,

    render: true,
    headless: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keep only known keys whose value has the same type as the default */
export function sanitizeSettings(raw: unknown): Partial<SimulationSettings> {
    if (!isRecord(raw)) {
        log.warn('Settings must be a JSON object, ignoring');
        return {};
    }

    const result: Partial<SimulationSettings> = {};
    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
        case 'paused':
        case 'render':
        case 'headless':
            if (typeof value === 'boolean') result[key] = value;
            else log.warn(`Setting "${key}" must be a boolean, ignoring`);
            break;
        case 'gameSpeed':
        case 'tickRate':
        case 'frameDelayMs':
        case 'maxTicks':
            if (typeof value === 'number' && Number.isFinite(value) && value >= 0) result[key] = value;
            else log.warn(`Setting "${key}" must be a non-negative number, ignoring`);
            break;
        default:
            log.warn(`Unknown setting "${key}", ignoring`);
        }
    }
    return result;
}

/** Load settings from a JSON file, merging with defaults */
export function loadSettings(filePath: string = SETTINGS_FILE_NAME): SimulationSettings {
    if (!existsSync(filePath)) return { ...DEFAULT_SETTINGS };

    try {
        const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));

        // Merge with defaults so files written for older versions keep working
        return {
            ...DEFAULT_SETTINGS,
            ...sanitizeSettings(parsed),
        };
    } catch (e) {
        log.warn(`Failed to load settings from ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
        return { ...DEFAULT_SETTINGS };
    }
}

/** Get a copy of the default settings */
export function getDefaultSettings(): SimulationSettings {
    return { ...DEFAULT_SETTINGS };
}
