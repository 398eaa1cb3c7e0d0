import { z } from 'zod';

export const EntitySchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    type: z.string().default('concept'),
    tags: z.array(z.string()).default([]),
});

export const RelationshipSchema = z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    type: z.string().min(1),
});

export const GraphStateSchema = z.object({
    entities: z.array(EntitySchema).default([]),
    relationships: z.array(RelationshipSchema).default([]),
});

/** A node of the semantic graph. Identified by `name`. */
export type Entity = z.infer<typeof EntitySchema>;

/** A directed edge, unique per (from, to, type). */
export type Relationship = z.infer<typeof RelationshipSchema>;

export type GraphState = z.infer<typeof GraphStateSchema>;

export const DEFAULT_GRAPH_STATE: GraphState = {
    entities: [],
    relationships: [],
};
