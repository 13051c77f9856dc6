/**
 * Interface for systems that update every simulation tick.
 * Systems register with the GameLoop instead of being called directly.
 */
export interface TickSystem {
    /** Called each fixed-timestep tick */
    tick(dt: number): void;

    /**
     * Optional: Called when an entity is removed from the simulation.
     * Systems that keep per-entity state (Map<entityId, State>) drop it here.
     */
    onEntityRemoved?(entityId: number): void;

    /**
     * Optional: Called when the loop is destroyed.
     * Systems that subscribe to events unsubscribe here.
     */
    destroy?(): void;
}
