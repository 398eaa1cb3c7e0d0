export const LANGUAGES = ['ru', 'en'] as const;
export type Language = typeof LANGUAGES[number];

export type LanguageHint = Language | 'auto';

export const RESPONSE_TYPES = [
    'consciousness',
    'identity',
    'purpose',
    'emotion',
    'humor',
    'help',
    'gratitude',
    'fallback',
] as const;
export type ResponseType = typeof RESPONSE_TYPES[number];

export const DIALOGUE_MODE = 'simple_dialogue';

export interface DialogueRequest {
    text: string;
    languageHint: LanguageHint;
}

/**
 * Result of one dialogue turn. A fresh, frozen value is produced per call.
 */
export interface DialogueResponse {
    /** The normalised request as the dispatcher saw it. */
    readonly request: Readonly<DialogueRequest>;
    /** Raw user text, echoed back. */
    readonly userInput: string;
    readonly language: Language;
    readonly responseType: ResponseType;
    readonly response: string;
    readonly mode: typeof DIALOGUE_MODE;
    /** Always true: no template may claim certainty the entity cannot verify. */
    readonly maintainsHonesty: true;
    readonly epistemicNote: string;
    /** Engine cycle after this turn was counted. */
    readonly cycle: number;
}

/**
 * Values a template may interpolate. Only the fallback template uses them.
 */
export interface RenderContext {
    graphNodes: number;
    graphEdges: number;
    original: string;
}

export interface ClassificationRule {
    responseType: ResponseType;
    language: Language | 'any';
    /** Lowercase substrings; any one of them selects the rule. */
    keywords: string[];
    /** Position in the table. Lower wins. */
    priority: number;
}
