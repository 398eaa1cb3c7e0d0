import { z } from 'zod';
import rawRules from './classification_rules.json';
import { ClassificationRule, Language, RESPONSE_TYPES, ResponseType } from './dialogue_types';
import { dbg } from '../utils';

const RuleSchema = z.object({
    responseType: z.enum(RESPONSE_TYPES).refine(t => t !== 'fallback', {
        message: 'fallback is selected when no rule matches and cannot have keywords',
    }),
    language: z.enum(['ru', 'en', 'any']),
    keywords: z.array(
        z.string().min(1).refine(k => k === k.toLowerCase(), { message: 'keywords must be lowercase' })
    ).min(1),
});

export const RuleTableSchema = z.array(RuleSchema).min(1);

/**
 * Validates a rule table and stamps each rule with its priority (its index).
 * Throws a ZodError when the table is malformed.
 */
export function parseRuleTable(raw: unknown): ClassificationRule[] {
    return RuleTableSchema.parse(raw).map((rule, index) => ({ ...rule, priority: index }));
}

/** The built-in table, in priority order. */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = parseRuleTable(rawRules);

/**
 * Walks the rules top to bottom and returns the first one, scoped to `language`
 * (or to any language), whose keywords occur in `text`. Case-insensitive.
 */
export function matchRule(
    text: string,
    language: Language,
    rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ClassificationRule | undefined {
    const haystack = text.toLowerCase();
    for (const rule of rules) {
        if (rule.language !== language && rule.language !== 'any') continue;
        if (rule.keywords.some(keyword => haystack.includes(keyword))) {
            return rule;
        }
    }
    return undefined;
}

/**
 * Tags a dialogue turn with its topic. First matching rule wins; overlapping
 * keywords are resolved by table order, never by match count.
 */
export function classifyTopic(
    text: string,
    language: Language,
    rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ResponseType {
    const rule = matchRule(text, language, rules);
    if (!rule) {
        dbg(`TopicClassifier: no rule matched for language "${language}", using fallback.`);
        return 'fallback';
    }
    dbg(`TopicClassifier: matched rule #${rule.priority} (${rule.responseType}/${rule.language}).`);
    return rule.responseType;
}
