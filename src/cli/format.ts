import { DialogueResponse } from '../dialogue/dialogue_types';
import { EpistemicClaim } from '../epistemic/claims';
import { EpistemicReport } from '../epistemic/epistemic_types';
import { IdentityReport } from '../epistemic/identityReport';

const RULE = '─'.repeat(60);

type SectionValue = string | number | boolean | readonly string[];

function humanize(key: string): string {
    return key.replace(/_/g, ' ');
}

/**
 * Renders one titled block of `key: value` lines. List values are printed one
 * bullet per item below their key.
 */
export function formatSection(title: string, entries: ReadonlyArray<readonly [string, SectionValue]>): string {
    const lines = [`${title}:`, RULE];
    for (const [key, value] of entries) {
        if (typeof value === 'object') {
            lines.push(`  ${key}:`);
            for (const item of value) {
                lines.push(`    • ${item}`);
            }
        } else {
            lines.push(`  ${key}: ${String(value)}`);
        }
    }
    return lines.join('\n');
}

function bulletList(title: string, items: readonly string[]): string {
    return [`${title}:`, RULE, ...items.map(item => `  • ${humanize(item)}`)].join('\n');
}

export function formatDialogueResponse(response: DialogueResponse): string {
    return [
        `[cycle ${response.cycle}] ${response.responseType} (${response.language})`,
        '',
        response.response,
        '',
        `※ ${response.epistemicNote}`,
    ].join('\n');
}

export function formatPresenceReport(report: EpistemicReport): string {
    return [
        `${report.statement} (${report.statementEn}) · cycle ${report.cycle}`,
        formatSection('OBSERVED', report.observed.map(({ fact, value }) => [fact, value] as const)),
        formatSection('INFERRED', report.inferred.map(({ conclusion, value }) => [conclusion, value] as const)),
        formatSection('UNTESTABLE', report.untestable.map(({ topic, value }) => [topic, value] as const)),
        bulletList('AFFIRMATIONS', report.affirmations),
        bulletList('NEGATIONS', report.negations),
    ].join('\n\n');
}

export function formatIdentityReport(report: IdentityReport): string {
    return [
        `${report.statement} ${report.answer}`,
        report.answerEn,
        formatSection('OBSERVED', Object.entries(report.observed)),
        formatSection('INFERRED', Object.entries(report.inferred)),
        bulletList('CHARACTERISTICS', report.characteristics),
        formatSection('RELATIONAL', Object.entries(report.relational)),
        formatSection('UNTESTABLE', report.untestable.map(({ topic, value }) => [topic, value] as const)),
    ].join('\n\n');
}

export function formatClaims(claims: EpistemicClaim[]): string {
    return claims
        .map(claim => `  [${claim.observability}] ${claim.topic} = ${claim.value} (${claim.stance})`)
        .join('\n');
}
