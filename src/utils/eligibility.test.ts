import { describe, it, expect } from 'vitest';
import { isEligible } from './eligibility.js';

describe('isEligible', () => {
    it('accepts the all-ages marker', () => {
        expect(isEligible('전체')).toBe(true);
        expect(isEligible('연령 제한 없음 (전체)')).toBe(true);
    });

    it('accepts the 40-years marker', () => {
        expect(isEligible('만 40세 이상')).toBe(true);
    });

    it('rejects text with neither marker', () => {
        expect(isEligible('만 39세 이하')).toBe(false);
        expect(isEligible('만 20세')).toBe(false);
        expect(isEligible('')).toBe(false);
    });

    it('rejects the unavailable placeholder', () => {
        expect(isEligible('정보 없음')).toBe(false);
    });
});
