/**
 * Agent driver.
 *
 * Owns one behavior task per agent and steps each of them exactly once per
 * simulation tick, in spawn order. Behaviors never see the driver; they
 * suspend by returning a suspension and the driver keeps the continuation.
 */

import { TaskRunner, StepKind, type Task } from '../ai';
import type { EventBus } from '../event-bus';
import type { TickSystem } from '../tick-system';
import { LogHandler } from '@/utilities/log-handler';

/** What the driver does with an agent whose behavior has completed */
export enum CompletionPolicy {
    /** Keep stepping the completed task; it keeps returning its result */
    Keep,
    /** Drop the agent on the tick it completes */
    Remove,
}

/** Thrown when an agent's behavior throws while being stepped */
export class AgentStepError extends Error {
    constructor(
        public readonly entityId: number,
        public readonly agentName: string,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Agent ${entityId} (${agentName}) failed: ${reason}`, { cause });
        this.name = 'AgentStepError';
    }
}

interface AgentEntry {
    name: string;
    runner: TaskRunner<void>;
    policy: CompletionPolicy;
    /** Completion already reported */
    reported: boolean;
}

export class AgentSystem implements TickSystem {
    private static log = new LogHandler('AgentSystem');

    private agents = new Map<number, AgentEntry>();

    constructor(private readonly eventBus?: EventBus) {}

    /**
     * Give an entity a behavior. Replaces any behavior it already had; the old
     * task is dropped without being stepped again.
     */
    spawn(
        entityId: number,
        behavior: Task<void>,
        name = `agent-${entityId}`,
        policy: CompletionPolicy = CompletionPolicy.Keep,
    ): TaskRunner<void> {
        if (this.agents.has(entityId)) {
            AgentSystem.log.warn(`Agent ${entityId} already has a behavior, replacing it`);
        }

        const runner = new TaskRunner(behavior);
        this.agents.set(entityId, { name, runner, policy, reported: false });
        this.eventBus?.emit('agent:spawned', { entityId, name });
        return runner;
    }

    /** Drop an agent's behavior. Returns false if it had none. */
    remove(entityId: number): boolean {
        const entry = this.agents.get(entityId);
        if (!entry) return false;

        this.agents.delete(entityId);
        this.eventBus?.emit('agent:removed', { entityId, completed: entry.runner.isCompleted });
        return true;
    }

    has(entityId: number): boolean {
        return this.agents.has(entityId);
    }

    getRunner(entityId: number): TaskRunner<void> | undefined {
        return this.agents.get(entityId)?.runner;
    }

    get agentCount(): number {
        return this.agents.size;
    }

    /**
     * Step every agent once. A throwing behavior aborts the rest of the tick
     * with an AgentStepError; the faulting agent keeps its previous task.
     */
    tick(_dt: number): void {
        // Snapshot: behaviors may spawn or remove agents while being stepped
        for (const [entityId, entry] of [...this.agents]) {
            if (this.agents.get(entityId) !== entry) continue;

            let kind: StepKind;
            try {
                kind = entry.runner.tick();
            } catch (e) {
                throw new AgentStepError(entityId, entry.name, e);
            }

            if (kind !== StepKind.Completed || entry.reported) continue;

            entry.reported = true;
            AgentSystem.log.debug(`Agent ${entityId} (${entry.name}) completed after ${entry.runner.ticks} ticks`);
            this.eventBus?.emit('agent:completed', { entityId, ticks: entry.runner.ticks });

            if (entry.policy === CompletionPolicy.Remove) {
                this.remove(entityId);
            }
        }
    }

    onEntityRemoved(entityId: number): void {
        this.remove(entityId);
    }

    destroy(): void {
        this.agents.clear();
    }
}
