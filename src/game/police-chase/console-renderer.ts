import type { PoliceChaseState } from './police-chase-state';
import type { Ship, ShipRole } from './ship';
import type { Vec2 } from './vec2';

export const GRID_COLUMNS = 80;
export const GRID_ROWS = 24;

const STATION_SYMBOL = '¤';

const SHIP_SYMBOLS: Record<ShipRole, string> = {
    patrol: '∆',
    pirate: '†',
    cargo: '•',
};

/** ANSI: clear screen, cursor home */
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/** A 0..1 ratio as a single digit 0..9 */
function gauge(value: number, max: number): string {
    const level = Math.round((9 * value) / max);
    return String(Math.max(0, Math.min(9, level)));
}

/** Ship label: fuel gauge, role symbol, integrity gauge */
export function shipLabel(ship: Ship): string {
    return gauge(ship.fuel, ship.maxFuel) + SHIP_SYMBOLS[ship.role] + gauge(ship.integrity, ship.maxIntegrity);
}

/**
 * Draws the chase as a character grid: the station and one label per ship,
 * placed by field position. Later labels overwrite earlier ones.
 */
export class ConsoleRenderer {
    constructor(
        private readonly state: PoliceChaseState,
        private readonly write: (text: string) => void = text => { process.stdout.write(text); },
    ) {}

    /** Grid cell for a field position */
    cellOf(position: Vec2): { column: number; row: number } {
        const field = this.state.fieldSize;
        const column = Math.floor((position.x / field) * (GRID_COLUMNS - 1)) - 1;
        const row = Math.floor((position.y / field) * (GRID_ROWS - 1));
        return {
            column: Math.max(0, Math.min(GRID_COLUMNS - 1, column)),
            row: Math.max(0, Math.min(GRID_ROWS - 1, row)),
        };
    }

    /** Render the current state as GRID_ROWS lines of GRID_COLUMNS characters */
    renderFrame(): string {
        const grid: string[][] = Array.from({ length: GRID_ROWS }, () => new Array<string>(GRID_COLUMNS).fill(' '));

        const put = (position: Vec2, text: string): void => {
            const { column, row } = this.cellOf(position);
            const chars = [...text];
            for (let i = 0; i < chars.length && column + i < GRID_COLUMNS; i++) {
                grid[row][column + i] = chars[i];
            }
        };

        put(this.state.stationPosition, STATION_SYMBOL);
        for (const ship of this.state.allShips()) {
            put(ship.position, shipLabel(ship));
        }

        return grid.map(line => line.join('')).join('\n');
    }

    /** Clear the terminal and draw the current frame */
    draw(): void {
        this.write(CLEAR_SCREEN + this.renderFrame() + '\n');
    }
}
