import {
    type Step,
    type Task,
    StepKind,
    completed,
    done,
    map,
    preempting,
    sequence,
    step,
    suspended,
    then,
} from './task';

// ─── Suspension ───────────────────────────────────────────────────────────────

/** Suspends for exactly one tick, then completes. */
export const yieldTick: Task<void> = () => suspended(done);

/** Like yieldTick, but tells an enclosing race or guard that this branch is
 *  about to finish and its competitors may be dropped. */
export const preemptTick: Task<void> = () => preempting(done);

// ─── Race ─────────────────────────────────────────────────────────────────────

export type Either<A, B> =
    | { readonly side: 'left'; readonly value: A }
    | { readonly side: 'right'; readonly value: B };

export function left<A, B = never>(value: A): Either<A, B> {
    return { side: 'left', value };
}

export function right<B, A = never>(value: B): Either<A, B> {
    return { side: 'right', value };
}

/**
 * Run two tasks side by side, `first` always stepped before `second`.
 *
 * Resolution order per tick:
 *  1. `first` completed → Left, `second` is dropped
 *  2. `second` completed → Right, `first` is dropped
 *  3. `first` preempting → `second` is dropped, `first` continues alone as Left
 *  4. `second` preempting → `first` is dropped, `second` continues alone as Right
 *  5. both suspended → race again on the next tick
 *
 * A dropped task is never stepped again.
 */
export function race<A, B>(first: Task<A>, second: Task<B>): Task<Either<A, B>> {
    return (): Step<Either<A, B>> => {
        const a = step(first);
        const b = step(second);

        if (a.kind === StepKind.Completed) return completed(left(a.value));
        if (b.kind === StepKind.Completed) return completed(right(b.value));
        if (a.kind === StepKind.Preempting) return suspended(map(a.next, value => left<A, B>(value)));
        if (b.kind === StepKind.Preempting) return suspended(map(b.next, value => right<B, A>(value)));
        return suspended(race(a.next, b.next));
    };
}

/** Race two behaviors when only their side effects matter. */
export function raceDiscard(first: Task<unknown>, second: Task<unknown>): Task<void> {
    return map(race(first, second), () => undefined);
}

// ─── Guard ────────────────────────────────────────────────────────────────────

/**
 * Poll `condition` once per tick until it yields true, then claim control with
 * one preempting tick and run `action` to completion.
 *
 * A false poll costs one suspended tick; the next poll restarts `condition`
 * from scratch.
 */
export function guard<A>(condition: Task<boolean>, action: Task<A>): Task<A> {
    return sequence(condition, holds =>
        holds ? then(preemptTick, action) : then(yieldTick, guard(condition, action)),
    );
}

// ─── Repeat ───────────────────────────────────────────────────────────────────

/**
 * Restart `body` every time it completes. Never completes itself.
 *
 * The next iteration starts in the same tick the previous one finished, unless
 * that iteration never suspended; then the tick ends suspended so that a body
 * that completes immediately runs once per tick instead of looping forever.
 */
export function repeat(body: Task<void>): Task<void> {
    return iterate(body, body, true);
}

function iterate(body: Task<void>, current: Task<void>, fresh: boolean): Task<void> {
    return () => {
        const outcome = step(current);
        switch (outcome.kind) {
        case StepKind.Completed:
            return fresh ? suspended(iterate(body, body, true)) : step(iterate(body, body, true));
        case StepKind.Suspended:
            return suspended(iterate(body, outcome.next, false));
        case StepKind.Preempting:
            return preempting(iterate(body, outcome.next, false));
        }
    };
}
