import { ELIGIBILITY_MARKERS } from '../config/kstartup.js';

/**
 * True when the eligibility line mentions "all ages" (전체) or 40 years (40세).
 * Plain substring containment, no normalisation.
 */
export function isEligible(eligibilityText: string): boolean {
    return ELIGIBILITY_MARKERS.some((marker) => eligibilityText.includes(marker));
}
