import { DenseIndex, ScoredHit } from '../../application/providers/ScoringProvider';
import { VectorProvider } from '../../application/providers/VectorProvider';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { StageIoError } from '../../domain/errors/AppError';
import { compareChunkIds } from '../../domain/services/ScoreFusion';
import logger from '../logger';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length === 0 || a.length !== b.length) return 0;

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    if (normA === 0 || normB === 0) return 0;
    return dot / Math.sqrt(normA * normB);
}

export class VectorDenseIndex implements DenseIndex {
    private readonly dimensions: number | undefined;

    constructor(
        private readonly vectors: ReadonlyMap<string, readonly number[]>,
        private readonly vectorProvider: VectorProvider,
        private readonly source: string = 'in-memory dense index'
    ) {
        for (const [chunkId, vector] of vectors) {
            if (this.dimensions === undefined) {
                this.dimensions = vector.length;
            } else if (vector.length !== this.dimensions) {
                throw new StageIoError(
                    `Dense index ${source} mixes vector dimensions: chunk ${chunkId} has ${vector.length}, expected ${this.dimensions}`,
                    source
                );
            }
        }
    }

    get size(): number {
        return this.vectors.size;
    }

    /**
     * Uses precomputed vectors where the index directory provides them and
     * embeds the remaining chunks with the same provider as the query. Every
     * vector must match the dimension of the query embedding.
     */
    static async fromCorpus(
        corpus: ChunkCorpus,
        vectorProvider: VectorProvider,
        precomputed: ReadonlyMap<string, readonly number[]> = new Map(),
        source?: string
    ): Promise<VectorDenseIndex> {
        const vectors = new Map<string, readonly number[]>();
        let embedded = 0;

        for (const chunk of corpus.all()) {
            const existing = precomputed.get(chunk.id);
            if (existing) {
                vectors.set(chunk.id, existing);
                continue;
            }
            vectors.set(chunk.id, await vectorProvider.generateEmbedding(chunk.text));
            embedded++;
        }

        logger.debug('Dense index ready', { chunks: vectors.size, embedded, precomputed: vectors.size - embedded });
        return new VectorDenseIndex(vectors, vectorProvider, source);
    }

    async search(query: string, limit: number): Promise<ScoredHit[]> {
        const queryVector = await this.vectorProvider.generateEmbedding(query);
        if (this.dimensions !== undefined && queryVector.length !== this.dimensions) {
            throw new StageIoError(
                `Dense index ${this.source} holds ${this.dimensions}-dimension vectors but the query embedding has ${queryVector.length}`,
                this.source
            );
        }

        const hits: ScoredHit[] = [];
        for (const [chunkId, vector] of this.vectors) {
            const score = cosineSimilarity(queryVector, vector);
            if (score > 0) {
                hits.push({ chunkId, score });
            }
        }

        return hits
            .sort((a, b) => b.score - a.score || compareChunkIds(a.chunkId, b.chunkId))
            .slice(0, limit);
    }
}
