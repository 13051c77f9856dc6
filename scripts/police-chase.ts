#!/usr/bin/env npx tsx

/**
 * Police Chase CLI
 *
 * Runs the police chase simulation in the terminal.
 *
 * Usage:
 *   npx tsx scripts/police-chase.ts [options]
 *
 * Examples:
 *   # Watch the chase in real time
 *   npx tsx scripts/police-chase.ts
 *
 *   # Run to the end as fast as possible and print a summary
 *   npx tsx scripts/police-chase.ts --headless
 *
 *   # Stop after 5000 ticks
 *   npx tsx scripts/police-chase.ts --headless --max-ticks 5000
 */

import { loadSettings, SETTINGS_FILE_NAME } from '@/game/game-settings';
import { loadScenario, DEFAULT_SCENARIO_PATH } from '@/game/police-chase';
import { runHeadless, runRealtime, type RunSummary } from '@/game/police-chase/runner';
import { LogHandler } from '@/utilities/log-handler';
import { LogType } from '@/utilities/log-manager';

interface CliOptions {
    settings: string;
    scenario: string;
    maxTicks?: number;
    headless: boolean;
    quiet: boolean;
}

function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = {
        settings: SETTINGS_FILE_NAME,
        scenario: DEFAULT_SCENARIO_PATH,
        headless: false,
        quiet: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === '--settings' || arg === '-s') {
            options.settings = args[++i] || options.settings;
        } else if (arg === '--scenario') {
            options.scenario = args[++i] || options.scenario;
        } else if (arg === '--max-ticks' || arg === '-n') {
            const value = Number(args[++i]);
            if (!Number.isInteger(value) || value < 0) {
                console.error('Error: --max-ticks takes a non-negative integer');
                process.exit(1);
            }
            options.maxTicks = value;
        } else if (arg === '--headless') {
            options.headless = true;
        } else if (arg === '--quiet' || arg === '-q') {
            options.quiet = true;
        } else if (arg === '--help' || arg === '-h') {
            printHelp();
            process.exit(0);
        } else {
            console.error(`Error: Unknown option ${arg}`);
            printHelp();
            process.exit(1);
        }
    }

    return options;
}

function printHelp(): void {
    console.log(`
Police Chase - a police corvette, a pirate and a cargo freighter, AIs written as tasks

Usage:
  npx tsx scripts/police-chase.ts [options]

Options:
  -s, --settings    Settings JSON file (default: ./${SETTINGS_FILE_NAME})
  --scenario        Scenario YAML file (default: bundled scenario)
  -n, --max-ticks   Stop after this many ticks
  --headless        No rendering, manual clock, run as fast as possible
  -q, --quiet       Only log warnings and errors
  -h, --help        Show this help message
`);
}

function printSummary(summary: RunSummary): void {
    console.log(`Ticks: ${summary.ticks}`);
    console.log(`Ended: ${summary.endReason ?? 'tick limit reached'}`);
    console.log(`Dockings: ${summary.dockings}`);
    for (const ship of summary.ships) {
        console.log(`  ${ship.role.padEnd(7)} integrity ${ship.integrity.toFixed(2)}  fuel ${ship.fuel.toExponential(2)}`);
    }
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));

    if (options.quiet) {
        LogHandler.getLogManager().setMinLevel(LogType.Warn);
    }

    const settings = loadSettings(options.settings);
    if (options.maxTicks !== undefined) settings.maxTicks = options.maxTicks;
    if (options.headless) settings.headless = true;

    const scenario = loadScenario(options.scenario);

    const summary = settings.headless
        ? runHeadless(settings, scenario)
        : await runRealtime(settings, scenario);

    printSummary(summary);
}

main().catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
