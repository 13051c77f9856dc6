/**
 * AI Module
 *
 * Cooperative tasks for entity AI: behaviors written as sequential steps that
 * run one tick at a time, interleaved with other behaviors by a driver.
 *
 * @module ai
 */

// Steps and tasks
export {
    StepKind,
    completed,
    suspended,
    preempting,
    pure,
    done,
    step,
    advance,
    sequence,
    then,
    map,
    discard,
    series,
    defer,
    effect,
} from './task';
export type { Step, CompletedStep, SuspendedStep, PreemptingStep, Task } from './task';

// Combinators
export {
    yieldTick,
    preemptTick,
    left,
    right,
    race,
    raceDiscard,
    guard,
    repeat,
} from './combinators';
export type { Either } from './combinators';

// Time
export { systemClock, ManualClock, waitDoing, wait } from './timing';
export type { Clock } from './timing';

// Driver handle
export { TaskRunner } from './task-runner';
