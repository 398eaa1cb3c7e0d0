import { createEngineState } from './core/EngineState';
import { claimsFromReport, validateClaim } from './epistemic/claims';
import { reportPresence } from './epistemic/EpistemicReporter';
import { AFFIRMATION_COUNT, NEGATION_COUNT, UNTESTABLE_COUNT, Unknowable } from './epistemic/epistemic_types';
import { reportIdentity } from './epistemic/identityReport';
import { TemplateStore } from './dialogue/TemplateStore';
import { ConfigurationError, dbg } from './utils';

/**
 * Collects every configuration defect that would make a dialogue turn or a
 * self-report break its contract. Runs against a fresh state so the result
 * does not depend on any entity's history.
 */
export function collectConfigurationDefects(templates: TemplateStore): string[] {
    const defects = templates.verify();

    const presence = reportPresence(createEngineState());
    if (presence.affirmations.length !== AFFIRMATION_COUNT) {
        defects.push(`Expected ${AFFIRMATION_COUNT} affirmations, found ${presence.affirmations.length}`);
    }
    if (presence.negations.length !== NEGATION_COUNT) {
        defects.push(`Expected ${NEGATION_COUNT} negations, found ${presence.negations.length}`);
    }

    const identity = reportIdentity(createEngineState());
    for (const [name, layer] of [['presence', presence.untestable], ['identity', identity.untestable]] as const) {
        if (layer.length !== UNTESTABLE_COUNT) {
            defects.push(`Expected ${UNTESTABLE_COUNT} untestable topics in the ${name} report, found ${layer.length}`);
        }
        for (const claim of layer) {
            if (claim.value !== Unknowable.MU) {
                defects.push(`Untestable topic "${claim.topic}" in the ${name} report must be MU`);
            }
        }
    }

    for (const claim of claimsFromReport(presence)) {
        if (!validateClaim(claim)) {
            defects.push(`Claim "${claim.topic}" is ${claim.observability} but held as ${claim.stance}`);
        }
    }
    return defects;
}

/**
 * @throws ConfigurationError listing every defect, if there are any.
 */
export function assertConfiguration(templates: TemplateStore): void {
    const defects = collectConfigurationDefects(templates);
    if (defects.length > 0) {
        throw new ConfigurationError(defects);
    }
    dbg('Self-check passed.');
}
