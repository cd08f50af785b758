import { describe, it, expect } from 'vitest';
import {
    assertFusionWeights,
    clampUnit,
    fuseWeighted,
    minMaxNormalize,
    rankByScore,
} from '../src/domain/services/ScoreFusion';
import { ConfigurationError } from '../src/domain/errors/AppError';

describe('ScoreFusion', () => {
    describe('minMaxNormalize', () => {
        it('should scale scores into [0, 1]', () => {
            expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
        });

        it('should map a uniform list to 1.0', () => {
            expect(minMaxNormalize([3, 3, 3])).toEqual([1, 1, 1]);
            expect(minMaxNormalize([0, 0])).toEqual([1, 1]);
        });

        it('should map a single score to 1.0', () => {
            expect(minMaxNormalize([0.2])).toEqual([1]);
        });

        it('should return an empty list for empty input', () => {
            expect(minMaxNormalize([])).toEqual([]);
        });

        it('should handle negative scores', () => {
            expect(minMaxNormalize([-2, 0, 2])).toEqual([0, 0.5, 1]);
        });
    });

    describe('fuseWeighted', () => {
        it('should combine two normalized columns with the given weights', () => {
            const fused = fuseWeighted([1, 0, 0.5], [0, 1, 0.5], { lexical: 0.75, dense: 0.25 });
            expect(fused).toEqual([0.75, 0.25, 0.5]);
        });

        it('should reject weights that do not sum to one', () => {
            expect(() => fuseWeighted([1], [1], { lexical: 0.6, dense: 0.5 })).toThrow(ConfigurationError);
        });

        it('should accept weights within the tolerance', () => {
            expect(() => assertFusionWeights({ lexical: 0.5, dense: 0.5000005 })).not.toThrow();
            expect(() => assertFusionWeights({ lexical: 0.5, dense: 0.50001 })).toThrow(ConfigurationError);
        });

        it('should reject negative weights even when they sum to one', () => {
            expect(() => assertFusionWeights({ lexical: -0.1, dense: 1.1 })).toThrow(ConfigurationError);
        });

        it('should reject columns of different length', () => {
            expect(() => fuseWeighted([1, 0], [1], { lexical: 0.5, dense: 0.5 })).toThrow(
                'Cannot fuse score lists of different length (2 vs 1)'
            );
        });
    });

    describe('rankByScore', () => {
        it('should order symmetric fusion ties by chunk id', () => {
            const lexical = minMaxNormalize([1, 2]);
            const dense = minMaxNormalize([0.8, 0.4]);
            const fused = fuseWeighted(lexical, dense, { lexical: 0.5, dense: 0.5 });
            const items = [
                { chunkId: 'c2', score: fused[0] ?? -1 },
                { chunkId: 'c1', score: fused[1] ?? -1 },
            ];

            const ranked = rankByScore(items, (item) => item.score);

            expect(fused).toEqual([0.5, 0.5]);
            expect(ranked.map((item) => item.chunkId)).toEqual(['c1', 'c2']);
        });

        it('should apply secondary keys before the chunk id', () => {
            const items = [
                { chunkId: 'a', primary: 0.5, secondary: 0.1 },
                { chunkId: 'b', primary: 0.5, secondary: 0.9 },
                { chunkId: 'c', primary: 0.7, secondary: 0 },
                { chunkId: 'd', primary: 0.5, secondary: 0.9 },
            ];

            const ranked = rankByScore(items, (i) => i.primary, (i) => i.secondary);

            expect(ranked.map((i) => i.chunkId)).toEqual(['c', 'b', 'd', 'a']);
        });

        it('should compare chunk ids by code unit', () => {
            const items = [{ chunkId: 'b' }, { chunkId: 'B' }, { chunkId: 'a10' }, { chunkId: 'a9' }];
            expect(rankByScore(items).map((i) => i.chunkId)).toEqual(['B', 'a10', 'a9', 'b']);
        });

        it('should not mutate its input', () => {
            const items = [{ chunkId: 'z', s: 0 }, { chunkId: 'a', s: 1 }];
            rankByScore(items, (i) => i.s);
            expect(items.map((i) => i.chunkId)).toEqual(['z', 'a']);
        });
    });

    it('clampUnit should bound values to [0, 1]', () => {
        expect(clampUnit(-0.5)).toBe(0);
        expect(clampUnit(0.25)).toBe(0.25);
        expect(clampUnit(1.5)).toBe(1);
    });
});
