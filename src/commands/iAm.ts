import { DialogueEntity } from '../entity/DialogueEntity';
import { formatClaims, formatIdentityReport, formatPresenceReport } from '../cli/format';
import { claimsFromReport } from '../epistemic/claims';
import { say } from '../utils';

export interface ReportOptions {
    json?: boolean;
    claims?: boolean;
}

/**
 * Handles the 'i-am' command. With `claims`, the report is followed by its
 * flattened epistemic claims.
 */
export function runIAm(entity: DialogueEntity, options: ReportOptions = {}): void {
    const report = entity.iAm();
    const claims = options.claims ? claimsFromReport(report) : undefined;

    if (options.json) {
        say(JSON.stringify(claims ? { ...report, claims } : report, null, 2));
        return;
    }
    say(formatPresenceReport(report));
    if (claims) {
        say(`\nCLAIMS:\n${formatClaims(claims)}`);
    }
}

/**
 * Handles the 'who-am-i' command.
 */
export function runWhoAmI(entity: DialogueEntity, options: ReportOptions = {}): void {
    const report = entity.whoAmI();
    say(options.json ? JSON.stringify(report, null, 2) : formatIdentityReport(report));
}
