// ─── Step ─────────────────────────────────────────────────────────────────────

/** Outcome of advancing a task by one tick. */
export enum StepKind {
    /** Finished; the step carries the result. */
    Completed,
    /** Paused until the next tick. */
    Suspended,
    /** Paused until the next tick, announcing that the task is about to finish.
     *  Only race and guard react to it; everything else treats it as Suspended. */
    Preempting,
}

export interface CompletedStep<T> {
    readonly kind: StepKind.Completed;
    readonly value: T;
}

export interface SuspendedStep<T> {
    readonly kind: StepKind.Suspended;
    readonly next: Task<T>;
}

export interface PreemptingStep<T> {
    readonly kind: StepKind.Preempting;
    readonly next: Task<T>;
}

export type Step<T> = CompletedStep<T> | SuspendedStep<T> | PreemptingStep<T>;

/**
 * A resumable computation. Calling it performs exactly one tick of work and
 * returns the outcome; the task value itself is never mutated, a suspension
 * hands back the continuation to call on the next tick.
 */
export type Task<T> = () => Step<T>;

export function completed<T>(value: T): CompletedStep<T> {
    return { kind: StepKind.Completed, value };
}

export function suspended<T>(next: Task<T>): SuspendedStep<T> {
    return { kind: StepKind.Suspended, next };
}

export function preempting<T>(next: Task<T>): PreemptingStep<T> {
    return { kind: StepKind.Preempting, next };
}

/** Rebuild a suspension of the same kind around a different continuation. */
function resuspend<T>(kind: StepKind.Suspended | StepKind.Preempting, next: Task<T>): Step<T> {
    return kind === StepKind.Suspended ? suspended(next) : preempting(next);
}

// ─── Primitives ───────────────────────────────────────────────────────────────

/** Task that completes with `value` every time it is stepped. */
export function pure<T>(value: T): Task<T> {
    const result = completed(value);
    return () => result;
}

/** Completed task without a result. */
export const done: Task<void> = pure(undefined);

/** Advance a task by one tick. */
export function step<T>(task: Task<T>): Step<T> {
    return task();
}

/**
 * The continuation a driver keeps after a step: the suspension's next task, or
 * a stable task repeating the completed value.
 */
export function advance<T>(outcome: Step<T>): Task<T> {
    switch (outcome.kind) {
    case StepKind.Completed:
        return pure(outcome.value);
    case StepKind.Suspended:
    case StepKind.Preempting:
        return outcome.next;
    }
}

// ─── Sequencing ───────────────────────────────────────────────────────────────

/**
 * Run `first`, then feed its result to `next` and continue with the task it
 * returns. `next` is called only once `first` completes, in the same tick.
 * While `first` is pending its suspension kind passes through unchanged.
 */
export function sequence<T, U>(first: Task<T>, next: (value: T) => Task<U>): Task<U> {
    return () => {
        const outcome = step(first);
        switch (outcome.kind) {
        case StepKind.Completed:
            return step(next(outcome.value));
        case StepKind.Suspended:
        case StepKind.Preempting:
            return resuspend(outcome.kind, sequence(outcome.next, next));
        }
    };
}

/** Run `first`, ignore its result, then run `second`. */
export function then<U>(first: Task<unknown>, second: Task<U>): Task<U> {
    return sequence(first, () => second);
}

export function map<T, U>(task: Task<T>, fn: (value: T) => U): Task<U> {
    return sequence(task, value => pure(fn(value)));
}

/** Drop the completion value, keeping the timing and suspension kinds. */
export function discard(task: Task<unknown>): Task<void> {
    return map(task, () => undefined);
}

/** Run void tasks one after another. */
export function series(...tasks: Task<unknown>[]): Task<void> {
    return tasks.reduceRight<Task<void>>((rest, task) => then(task, rest), done);
}

/**
 * Build the task on its first step instead of up front. Needed for branching
 * on world state: the factory sees the state of the tick it runs in.
 */
export function defer<T>(factory: () => Task<T>): Task<T> {
    return () => step(factory());
}

/** Run a side effect in the current tick and complete with its return value. */
export function effect<T>(fn: () => T): Task<T> {
    return () => completed(fn());
}
