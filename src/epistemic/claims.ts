import { EpistemicReport, Unknowable } from './epistemic_types';

export type Observability = 'observed' | 'inferred' | 'untestable';
export type Stance = 'affirmed' | 'denied' | 'agnostic' | 'mu';

/**
 * A single assertion the entity makes about itself, tagged with how it was
 * obtained and what position it takes.
 */
export interface EpistemicClaim {
    topic: string;
    observability: Observability;
    stance: Stance;
    /** Value as reported, for display. */
    value: string;
    cycle: number;
}

/**
 * Untestable claims may only be held agnostically or as MU; affirming or
 * denying one is a discipline violation.
 */
export function validateClaim(claim: EpistemicClaim): boolean {
    if (claim.observability === 'untestable') {
        return claim.stance === 'agnostic' || claim.stance === 'mu';
    }
    return true;
}

function stanceOf(value: boolean | number | string): Stance {
    if (value === Unknowable.MU) return 'mu';
    if (value === false) return 'denied';
    return 'affirmed';
}

/**
 * Flattens a presence report into claims, layer by layer and in report order.
 * Booleans map to affirmed/denied; counts and statuses are affirmed as stated.
 */
export function claimsFromReport(report: EpistemicReport): EpistemicClaim[] {
    const cycle = report.cycle;
    return [
        ...report.observed.map(({ fact, value }): EpistemicClaim => ({
            topic: fact, observability: 'observed', stance: stanceOf(value), value: String(value), cycle,
        })),
        ...report.inferred.map(({ conclusion, value }): EpistemicClaim => ({
            topic: conclusion, observability: 'inferred', stance: stanceOf(value), value: String(value), cycle,
        })),
        ...report.untestable.map(({ topic, value }): EpistemicClaim => ({
            topic, observability: 'untestable', stance: stanceOf(value), value, cycle,
        })),
    ];
}
