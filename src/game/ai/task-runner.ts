import { type Task, StepKind, advance, step } from './task';

/**
 * Owner of one task handle. Each `tick()` steps the current task once and keeps
 * the continuation, so the caller never touches a stale task value.
 */
export class TaskRunner<T> {
    private current: Task<T>;
    private _lastKind: StepKind | undefined;
    private _result: T | undefined;
    private _ticks = 0;

    constructor(task: Task<T>) {
        this.current = task;
    }

    /** Run one tick of the task.
     *  @returns how the tick ended */
    tick(): StepKind {
        const outcome = step(this.current);
        this.current = advance(outcome);
        this._lastKind = outcome.kind;
        this._ticks++;
        if (outcome.kind === StepKind.Completed) {
            this._result = outcome.value;
        }
        return outcome.kind;
    }

    /** Task that the next tick will step. */
    get task(): Task<T> {
        return this.current;
    }

    /** Outcome of the last tick, undefined before the first one. */
    get lastKind(): StepKind | undefined {
        return this._lastKind;
    }

    get isCompleted(): boolean {
        return this._lastKind === StepKind.Completed;
    }

    get result(): T | undefined {
        return this._result;
    }

    get ticks(): number {
        return this._ticks;
    }
}
