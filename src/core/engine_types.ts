/**
 * Mutable record owned by one dialogue entity for its whole lifetime.
 * Only the dispatcher advances `cycle`; the graph counters are written by
 * whatever owns the semantic graph (see GraphMemoryService).
 */
export interface EngineState {
    /** Dialogue turns processed so far. Never decreases. */
    cycle: number;
    /** Node count reported by the semantic graph. */
    graphNodes: number;
    /** Edge count reported by the semantic graph. */
    graphEdges: number;
    selfNotSelfCapable: boolean;
    ethicsEnabled: boolean;
}

export const DEFAULT_ENGINE_STATE: Readonly<EngineState> = {
    cycle: 0,
    graphNodes: 0,
    graphEdges: 0,
    selfNotSelfCapable: true,
    ethicsEnabled: true,
};
