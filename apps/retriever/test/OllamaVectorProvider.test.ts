import { describe, it, expect, vi, beforeEach } from 'vitest';

const { embedQuery, constructed } = vi.hoisted(() => {
    const constructed: unknown[] = [];
    return { embedQuery: vi.fn(), constructed };
});

vi.mock('@langchain/ollama', () => ({
    OllamaEmbeddings: class {
        embedQuery = embedQuery;
        constructor(options: unknown) {
            constructed.push(options);
        }
    },
}));

import { OllamaVectorProvider } from '../src/infrastructure/providers/OllamaVectorProvider';
import { VectorDenseIndex } from '../src/infrastructure/providers/VectorDenseIndex';
import { corpusOf } from './helpers';

describe('OllamaVectorProvider', () => {
    beforeEach(() => {
        embedQuery.mockReset();
        constructed.length = 0;
    });

    it('should configure the embedding model from explicit options', () => {
        const provider = new OllamaVectorProvider({ model: 'test-embedder', baseUrl: 'http://ollama.test:11434' });

        expect(provider.model).toBe('test-embedder');
        expect(constructed).toEqual([{ model: 'test-embedder', baseUrl: 'http://ollama.test:11434' }]);
    });

    it('should return the vector produced by the model', async () => {
        embedQuery.mockResolvedValue([0.1, 0.2, 0.3]);
        const provider = new OllamaVectorProvider({ model: 'test-embedder' });

        expect(await provider.generateEmbedding('chest pain')).toEqual([0.1, 0.2, 0.3]);
        expect(embedQuery).toHaveBeenCalledWith('chest pain');
    });

    it('should refuse empty or non-finite vectors', async () => {
        const provider = new OllamaVectorProvider({ model: 'test-embedder' });

        embedQuery.mockResolvedValueOnce([]);
        await expect(provider.generateEmbedding('chest pain')).rejects.toThrow(
            'Embedding model test-embedder returned an unusable vector for "chest pain"'
        );

        embedQuery.mockResolvedValueOnce([0.5, Number.NaN]);
        await expect(provider.generateEmbedding('chest pain')).rejects.toThrow('unusable vector');
    });

    it('should back a dense index built from the corpus', async () => {
        embedQuery.mockImplementation(async (text: string) => (text.includes('knee') ? [0, 1] : [1, 0]));
        const corpus = corpusOf(['c1', 'n1', 'chest pain at rest'], ['c2', 'n2', 'knee swelling']);

        const index = await VectorDenseIndex.fromCorpus(corpus, new OllamaVectorProvider({ model: 'test-embedder' }));
        const hits = await index.search('knee', 10);

        expect(hits).toEqual([{ chunkId: 'c2', score: 1 }]);
    });
});
