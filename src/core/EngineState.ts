import { DEFAULT_ENGINE_STATE, EngineState } from './engine_types';

/**
 * Creates a fresh state record. Counters start at zero and both capability
 * flags are on unless overridden.
 */
export function createEngineState(overrides: Partial<EngineState> = {}): EngineState {
    return { ...DEFAULT_ENGINE_STATE, ...overrides };
}

/**
 * Advances the dialogue cycle by exactly one and returns the new value.
 * The read-increment-write is synchronous, so no other turn can interleave with it.
 */
export function advanceCycle(state: EngineState): number {
    state.cycle += 1;
    return state.cycle;
}

/**
 * Overwrites the graph counters. Negative or fractional values are clamped to
 * non-negative integers.
 */
export function setGraphCounters(state: EngineState, nodes: number, edges: number): void {
    state.graphNodes = toCounter(nodes);
    state.graphEdges = toCounter(edges);
}

function toCounter(value: number): number {
    return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}
