/**
 * Lightweight typed event bus for decoupling simulation systems.
 * Systems register event handlers instead of being called directly.
 */

/** Event map defining all simulation events and their payloads */
export interface SimulationEvents {
    /** Emitted when an agent gets a behavior task */
    'agent:spawned': {
        entityId: number;
        name: string;
    };
    /** Emitted on the tick an agent's behavior completes */
    'agent:completed': {
        entityId: number;
        ticks: number;
    };
    /** Emitted when an agent is dropped from the driver */
    'agent:removed': {
        entityId: number;
        /** True if the behavior had completed */
        completed: boolean;
    };
    /** Emitted when an entity leaves the simulation; systems clean up per-entity state */
    'entity:removed': {
        entityId: number;
    };

    // === Police chase ===

    /** Emitted when a ship finishes docking: repaired and refueled */
    'ship:docked': {
        entityId: number;
    };
    /** Emitted when a ship's integrity drops to zero */
    'ship:destroyed': {
        entityId: number;
        role: string;
    };
    /** Emitted once when the simulation reaches an end condition */
    'simulation:ended': {
        tick: number;
        reason: string;
    };
}

type EventHandler<T> = (payload: T) => void;

type HandlerMap = {
    [K in keyof SimulationEvents]?: Set<EventHandler<SimulationEvents[K]>>;
};

export class EventBus {
    private handlers: HandlerMap = {};

    /** Register an event handler */
    on<K extends keyof SimulationEvents>(event: K, handler: EventHandler<SimulationEvents[K]>): void {
        const existing: HandlerMap[K] = this.handlers[event];
        if (existing) {
            existing.add(handler);
            return;
        }
        const handlers: { [P in K]?: Set<EventHandler<SimulationEvents[P]>> } = this.handlers;
        handlers[event] = new Set([handler]);
    }

    /** Remove an event handler */
    off<K extends keyof SimulationEvents>(event: K, handler: EventHandler<SimulationEvents[K]>): void {
        const existing: HandlerMap[K] = this.handlers[event];
        existing?.delete(handler);
    }

    /** Emit an event to all registered handlers */
    emit<K extends keyof SimulationEvents>(event: K, payload: SimulationEvents[K]): void {
        const handlers: HandlerMap[K] = this.handlers[event];
        if (!handlers) return;
        for (const handler of handlers) {
            handler(payload);
        }
    }

    /** Number of handlers registered for an event */
    listenerCount(event: keyof SimulationEvents): number {
        return this.handlers[event]?.size ?? 0;
    }

    /** Remove all handlers */
    clear(): void {
        this.handlers = {};
    }
}

/**
 * Helper class to manage event subscriptions and unsubscribe all at once.
 *
 * @example
 * ```ts
 * class MySystem {
 *     private subscriptions = new EventSubscriptionManager();
 *
 *     registerEvents(eventBus: EventBus): void {
 *         this.subscriptions.subscribe(eventBus, 'entity:removed', ({ entityId }) => {
 *             this.forget(entityId);
 *         });
 *     }
 *
 *     destroy(): void {
 *         this.subscriptions.unsubscribeAll();
 *     }
 * }
 * ```
 */
export class EventSubscriptionManager {
    private unsubscribers: Array<() => void> = [];

    /** Subscribe to an event and track the subscription for later cleanup. */
    subscribe<K extends keyof SimulationEvents>(
        eventBus: EventBus,
        event: K,
        handler: EventHandler<SimulationEvents[K]>,
    ): void {
        eventBus.on(event, handler);
        this.unsubscribers.push(() => eventBus.off(event, handler));
    }

    /** Unsubscribe from all tracked events. */
    unsubscribeAll(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
    }

    /** Number of active subscriptions */
    get count(): number {
        return this.unsubscribers.length;
    }
}
