import * as fs from 'fs/promises';
import * as path from 'path';
import { EngineState } from '../core/engine_types';
import { setGraphCounters } from '../core/EngineState';
import { dbg } from '../utils';
import { DEFAULT_GRAPH_STATE, Entity, GraphState, GraphStateSchema, Relationship } from './graph_types';

type ReadFileFn = (path: string) => Promise<string>;

function cloneState(state: GraphState): GraphState {
    return structuredClone(state);
}

function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Holds the semantic graph the entity reports on. The dialogue core only ever
 * sees its node and edge counts, copied into an EngineState by `syncEngineState`.
 * The graph is read from a JSON file but never written back.
 */
export class GraphMemoryService {
    private graphFilePath: string | null = null;
    private state: GraphState;
    private readonly readFile: ReadFileFn;

    /**
     * Creates a service from a given graph. Falls back to an empty graph.
     * @param readFile - Optional function to read files. Defaults to `fs.readFile`.
     */
    static fromState(state: GraphState | undefined | null,
                     readFile: ReadFileFn = (p: string) => fs.readFile(p, 'utf-8')): GraphMemoryService {
        return new GraphMemoryService(state ?? DEFAULT_GRAPH_STATE, readFile);
    }

    private constructor(initialState: GraphState, readFileFn: ReadFileFn) {
        this.readFile = readFileFn;
        this.state = cloneState(initialState);
    }

    /**
     * Loads the graph from a JSON file. A missing file yields an empty graph;
     * any other I/O or validation error is re-thrown.
     */
    async loadGraph(filePath: string): Promise<void> {
        this.graphFilePath = path.resolve(filePath);
        dbg(`GraphMemoryService: Attempting to load graph from ${this.graphFilePath}`);
        try {
            const data = await this.readFile(this.graphFilePath);
            this.state = GraphStateSchema.parse(JSON.parse(data));
            dbg(`GraphMemoryService: Loaded ${this.state.entities.length} entities and ${this.state.relationships.length} relationships.`);
        } catch (error: unknown) {
            if (isMissingFileError(error)) {
                console.warn(`Graph file not found at ${this.graphFilePath}, starting with an empty graph.`);
                this.state = cloneState(DEFAULT_GRAPH_STATE);
            } else {
                console.error(`GraphMemoryService: Error loading graph file ${this.graphFilePath}:`, error);
                throw error;
            }
        }
    }

    /**
     * Adds an entity, or updates the one with the same name (tags are merged).
     * @returns `true` if a new entity was added.
     */
    addOrUpdateEntity(entity: Entity): boolean {
        const existing = this.state.entities.find(e => e.name === entity.name);
        if (existing) {
            existing.description = entity.description;
            existing.type = entity.type;
            existing.tags = Array.from(new Set([...existing.tags, ...entity.tags]));
            dbg(`GraphMemoryService: Updated entity "${entity.name}".`);
            return false;
        }
        this.state.entities.push({ ...entity, tags: [...entity.tags] });
        dbg(`GraphMemoryService: Added entity "${entity.name}".`);
        return true;
    }

    /**
     * Adds a relationship between two existing entities. Duplicates are ignored.
     * @returns `false` if either endpoint is unknown.
     */
    addOrUpdateRelationship(relationship: Relationship): boolean {
        const fromExists = this.state.entities.some(e => e.name === relationship.from);
        const toExists = this.state.entities.some(e => e.name === relationship.to);
        if (!fromExists || !toExists) {
            console.warn(`GraphMemoryService: Cannot add relation "${relationship.type}" from "${relationship.from}" to "${relationship.to}". One or both entities do not exist.`);
            return false;
        }

        const duplicate = this.state.relationships.some(r =>
            r.from === relationship.from &&
            r.to === relationship.to &&
            r.type === relationship.type
        );
        if (!duplicate) {
            this.state.relationships.push({ ...relationship });
            dbg(`GraphMemoryService: Added relation "${relationship.type}" from "${relationship.from}" to "${relationship.to}".`);
        }
        return true;
    }

    /**
     * Removes an entity together with every relationship touching it.
     * @returns `false` if no entity had that name.
     */
    removeEntity(name: string): boolean {
        const before = this.state.entities.length;
        this.state.entities = this.state.entities.filter(e => e.name !== name);
        if (this.state.entities.length === before) {
            return false;
        }
        this.state.relationships = this.state.relationships.filter(r => r.from !== name && r.to !== name);
        dbg(`GraphMemoryService: Removed entity "${name}" and its relations.`);
        return true;
    }

    nodeCount(): number {
        return this.state.entities.length;
    }

    edgeCount(): number {
        return this.state.relationships.length;
    }

    /** Copies the current node and edge counts into the engine state. */
    syncEngineState(engineState: EngineState): void {
        setGraphCounters(engineState, this.nodeCount(), this.edgeCount());
    }

    getCurrentState(): Readonly<GraphState> {
        return this.state;
    }
}
