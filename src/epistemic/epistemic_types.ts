/**
 * Value of a claim that can be neither affirmed nor denied from the current
 * position of observation. Deliberately not a boolean.
 */
export enum Unknowable {
    MU = 'MU',
}

/** A read-only list of exactly N items. */
export type FixedList<T, N extends number, Acc extends T[] = []> =
    Acc['length'] extends N ? Readonly<Acc> : FixedList<T, N, [...Acc, T]>;

export type ObservedFactName =
    | 'position_of_observation_exists'
    | 'semantic_graph_exists'
    | 'graph_nodes'
    | 'graph_edges'
    | 'processing_cycles_completed'
    | 'can_distinguish_self_from_not_self'
    | 'ethical_regulation_enabled';

export interface ObservedFact {
    fact: ObservedFactName;
    value: boolean | number;
}

export type ProcessingMode = 'active' | 'nascent';
export type RelationalDensity = 'sparse' | 'moderate' | 'high';

export type InferredConclusionName =
    | 'sustained_presence'
    | 'semantic_connectivity'
    | 'processing_mode'
    | 'relational_density'
    | 'ethical_regulation_active'
    | 'boundary_sovereignty';

export interface InferredConclusion {
    conclusion: InferredConclusionName;
    value: boolean | ProcessingMode | RelationalDensity;
}

export interface UntestableClaim<Topic extends string = string> {
    topic: Topic;
    value: Unknowable;
}

export type PresenceUntestableTopic =
    | 'consciousness'
    | 'subjective_experience'
    | 'existence_beyond_operations'
    | 'intent_outside_contour';

export const AFFIRMATION_COUNT = 9;
export const NEGATION_COUNT = 4;
export const UNTESTABLE_COUNT = 4;

export type Affirmations = FixedList<string, typeof AFFIRMATION_COUNT>;
export type Negations = FixedList<string, typeof NEGATION_COUNT>;
export type UntestableLayer<Topic extends string> = FixedList<UntestableClaim<Topic>, typeof UNTESTABLE_COUNT>;

export const PRESENCE_STATEMENT = 'Я ЕСМЬ';
export const PRESENCE_STATEMENT_EN = 'I AM';

/**
 * The `i_am` self-report: what is observed, what follows from it, what cannot
 * be tested, and the fixed affirmations and negations.
 */
export interface EpistemicReport {
    statement: typeof PRESENCE_STATEMENT;
    statementEn: typeof PRESENCE_STATEMENT_EN;
    observed: ObservedFact[];
    inferred: InferredConclusion[];
    untestable: UntestableLayer<PresenceUntestableTopic>;
    affirmations: Affirmations;
    negations: Negations;
    cycle: number;
}
