import { describe, it, expect } from 'vitest';
import { TermOverlapPairwiseScorer } from '../src/infrastructure/providers/TermOverlapPairwiseScorer';

describe('TermOverlapPairwiseScorer', () => {
    const scorer = new TermOverlapPairwiseScorer();
    const text = 'Patient has chest pain after the surgery';

    it('should give full marks for a covered, adjacent query', async () => {
        expect(await scorer.score('chest pain', text)).toBeCloseTo(1, 12);
    });

    it('should withhold the adjacency share when terms are not side by side', async () => {
        expect(await scorer.score('pain chest', text)).toBeCloseTo(0.7, 12);
    });

    it('should score partial coverage proportionally', async () => {
        expect(await scorer.score('chest cough', text)).toBeCloseTo(0.35, 12);
    });

    it('should treat adjacency as coverage for a single-term query', async () => {
        expect(await scorer.score('surgery', text)).toBeCloseTo(1, 12);
        expect(await scorer.score('fever', text)).toBe(0);
    });

    it('should look for adjacency across removed stopwords', async () => {
        expect(await scorer.score('pain surgery', text)).toBeCloseTo(1, 12);
    });

    it('should score an empty query as 0', async () => {
        expect(await scorer.score('', text)).toBe(0);
    });
});
