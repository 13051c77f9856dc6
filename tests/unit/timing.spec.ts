import { afterEach, describe, it, expect, vi } from 'vitest';
import {
    ManualClock,
    StepKind,
    effect,
    series,
    systemClock,
    wait,
    waitDoing,
    yieldTick,
} from '@/game/ai';
import { kinds, runTicks, steppingClock } from './helpers/task-helpers';

// ─── Clocks ───────────────────────────────────────────────────────────────────

describe('systemClock', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('reports performance time in seconds', () => {
        vi.spyOn(performance, 'now').mockReturnValue(2500);

        expect(systemClock.now()).toBe(2.5);
    });
});

describe('ManualClock', () => {
    it('starts where it is told to', () => {
        expect(new ManualClock().now()).toBe(0);
        expect(new ManualClock(12).now()).toBe(12);
    });

    it('moves only when advanced or set', () => {
        const clock = new ManualClock();

        clock.advance(1.5);
        expect(clock.now()).toBe(1.5);

        clock.set(4);
        expect(clock.now()).toBe(4);
    });

    it('refuses to move backwards', () => {
        const clock = new ManualClock(10);

        expect(() => clock.advance(-1)).toThrow('cannot move backwards');
        expect(() => clock.set(9)).toThrow('cannot move backwards');
        expect(clock.now()).toBe(10);
    });
});

// ─── wait ─────────────────────────────────────────────────────────────────────

describe('wait', () => {
    it('completes on the step where the clock has moved by the interval', () => {
        const outcomes = runTicks(wait(1.0, steppingClock(0.5)), 2);

        expect(kinds(outcomes)).toEqual([StepKind.Suspended, StepKind.Completed]);
    });

    it('counts clock readings, not ticks', () => {
        const outcomes = runTicks(wait(1.0, steppingClock(0.25)), 4);

        expect(kinds(outcomes)).toEqual([
            StepKind.Suspended, StepKind.Suspended, StepKind.Suspended, StepKind.Completed,
        ]);
    });

    it('completes on the first step for a zero interval', () => {
        const outcomes = runTicks(wait(0, new ManualClock()), 1);

        expect(kinds(outcomes)).toEqual([StepKind.Completed]);
    });

    it('reads the start time on the first step, not when built', () => {
        const clock = new ManualClock();
        const task = wait(1, clock);

        clock.advance(5);
        expect(runTicks(task, 1)[0].kind).toBe(StepKind.Suspended);
    });

    it('tolerates uneven tick lengths', () => {
        const clock = new ManualClock();
        const task = wait(1, clock);

        let outcome = task();
        expect(outcome.kind).toBe(StepKind.Suspended);

        for (const delta of [0.4, 0.4]) {
            if (outcome.kind === StepKind.Completed) break;
            clock.advance(delta);
            outcome = outcome.next();
            expect(outcome.kind).toBe(StepKind.Suspended);
        }

        clock.advance(0.4);
        if (outcome.kind !== StepKind.Completed) outcome = outcome.next();
        expect(outcome.kind).toBe(StepKind.Completed);
    });
});

// ─── waitDoing ────────────────────────────────────────────────────────────────

describe('waitDoing', () => {
    it('calls the action with the elapsed time on every waiting tick', () => {
        const clock = new ManualClock();
        const seen: number[] = [];
        const action = vi.fn((elapsed: number) => effect(() => { seen.push(elapsed); }));
        const task = waitDoing(action, 1, clock);

        let outcome = task();
        expect(outcome.kind).toBe(StepKind.Suspended);
        expect(action).not.toHaveBeenCalled();

        for (let i = 0; i < 2 && outcome.kind !== StepKind.Completed; i++) {
            clock.advance(0.5);
            outcome = outcome.next();
        }

        expect(outcome.kind).toBe(StepKind.Completed);
        expect(action).toHaveBeenCalledTimes(2);
        expect(seen).toEqual([0, 0.5]);
    });

    it('steps the action once per tick and drops its suspension', () => {
        const clock = new ManualClock();
        let starts = 0;
        let ends = 0;
        const action = () => series(
            effect(() => { starts++; }),
            yieldTick,
            effect(() => { ends++; }),
        );
        const task = waitDoing(action, 1, clock);

        let outcome = task();
        for (let i = 0; i < 2 && outcome.kind !== StepKind.Completed; i++) {
            clock.advance(0.5);
            outcome = outcome.next();
        }

        expect(outcome.kind).toBe(StepKind.Completed);
        expect(starts).toBe(2);
        expect(ends).toBe(0);
    });
});
