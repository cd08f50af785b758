import { describe, it, expect, vi } from 'vitest';
import { cosineSimilarity, VectorDenseIndex } from '../src/infrastructure/providers/VectorDenseIndex';
import { HashingVectorProvider } from '../src/infrastructure/providers/HashingVectorProvider';
import { VectorProvider } from '../src/application/providers/VectorProvider';
import { StageIoError } from '../src/domain/errors/AppError';
import { corpusOf } from './helpers';

describe('VectorDenseIndex', () => {
    describe('cosineSimilarity', () => {
        it('should compute the cosine of two vectors', () => {
            expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
            expect(cosineSimilarity([3, 4], [6, 8])).toBeCloseTo(1, 12);
        });

        it('should return 0 for mismatched or zero vectors', () => {
            expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
            expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
            expect(cosineSimilarity([], [])).toBe(0);
        });
    });

    describe('HashingVectorProvider', () => {
        const provider = new HashingVectorProvider(64);

        it('should produce deterministic unit vectors', () => {
            const a = provider.embed('Chest pain on exertion');
            const b = provider.embed('chest PAIN on exertion!');

            expect(a).toHaveLength(64);
            expect(a).toEqual(b);
            expect(Math.sqrt(a.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 12);
        });

        it('should return a zero vector for stopword-only text', () => {
            expect(provider.embed('the of and').every((v) => v === 0)).toBe(true);
        });
    });

    it('should only embed chunks without precomputed vectors', async () => {
        const corpus = corpusOf(['c1', 'n1', 'alpha'], ['c2', 'n1', 'beta']);
        const generateEmbedding = vi.fn(async (text: string) => (text === 'beta' ? [0, 1] : [1, 0]));
        const provider: VectorProvider = { generateEmbedding };

        const index = await VectorDenseIndex.fromCorpus(corpus, provider, new Map([['c1', [1, 0]]]));

        expect(index.size).toBe(2);
        expect(generateEmbedding).toHaveBeenCalledTimes(1);
        expect(generateEmbedding).toHaveBeenCalledWith('beta');
    });

    it('should rank by similarity and drop non-positive scores', async () => {
        const vectors = new Map<string, number[]>([
            ['c1', [1, 0]],
            ['c2', [1, 1]],
            ['c3', [-1, 0]],
            ['c4', [1, 1]],
        ]);
        const provider: VectorProvider = { generateEmbedding: async () => [1, 0.2] };
        const index = new VectorDenseIndex(vectors, provider);

        const hits = await index.search('anything', 10);

        expect(hits.map((h) => h.chunkId)).toEqual(['c1', 'c2', 'c4']);
        expect(await index.search('anything', 2)).toHaveLength(2);
    });

    describe('dimension checks', () => {
        const corpus = corpusOf(['c1', 'n1', 'chest pain at rest'], ['c2', 'n1', 'knee pain after a fall']);
        const wide = (seed: number): number[] => Array.from({ length: 768 }, (_, i) => ((i + seed) % 7) / 7);

        it('should refuse a query embedding narrower than the precomputed vectors', async () => {
            const precomputed = new Map([
                ['c1', wide(1)],
                ['c2', wide(2)],
            ]);
            const index = await VectorDenseIndex.fromCorpus(corpus, new HashingVectorProvider(256), precomputed, '/idx');

            const error = await index.search('chest pain', 10).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(StageIoError);
            expect(error).toHaveProperty(
                'message',
                'Dense index /idx holds 768-dimension vectors but the query embedding has 256'
            );
            expect(error).toHaveProperty('path', '/idx');
        });

        it('should refuse an index mixing precomputed and embedded dimensions', async () => {
            const precomputed = new Map([['c1', wide(1)]]);

            await expect(
                VectorDenseIndex.fromCorpus(corpus, new HashingVectorProvider(256), precomputed, '/idx')
            ).rejects.toThrow('Dense index /idx mixes vector dimensions: chunk c2 has 256, expected 768');
        });
    });
});
