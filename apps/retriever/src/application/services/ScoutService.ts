import { DenseIndex, LexicalIndex, ScoredHit } from '../providers/ScoringProvider';
import { RetrievalConfig } from '../config/retrievalConfig';
import { Candidate } from '../../domain/entities/Candidate';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { AppError, ScorerFailure } from '../../domain/errors/AppError';
import { fuseWeighted, minMaxNormalize, rankByScore } from '../../domain/services/ScoreFusion';
import logger from '../../infrastructure/logger';

export interface ScoutResult {
    candidates: Candidate[];
    lexicalHits: number;
    denseHits: number;
    timing: { lexical: number; dense: number; fusion: number };
}

type Mechanism = 'lexical' | 'dense';

interface TimedHits {
    hits: ScoredHit[];
    ms: number;
}

interface MergedScores {
    lexical: number;
    dense: number;
}

export class ScoutService {
    constructor(
        private lexicalIndex: LexicalIndex,
        private denseIndex: DenseIndex
    ) {}

    async run(query: string, corpus: ChunkCorpus, config: RetrievalConfig): Promise<ScoutResult> {
        const [lexicalOutcome, denseOutcome] = await Promise.allSettled([
            this.timed('lexical', () => this.lexicalIndex.search(query, config.kA)),
            this.timed('dense', () => this.denseIndex.search(query, config.kA)),
        ]);
        const lexical = this.settle('lexical', lexicalOutcome, denseOutcome);
        const dense = this.settle('dense', denseOutcome, lexicalOutcome);

        const fusionStart = Date.now();

        if (lexical.hits.length === 0 && dense.hits.length === 0) {
            logger.info('Scout found no candidates', { query: query.substring(0, 50) });
            return {
                candidates: [],
                lexicalHits: 0,
                denseHits: 0,
                timing: { lexical: lexical.ms, dense: dense.ms, fusion: 0 },
            };
        }

        const merged = this.merge(lexical.hits, dense.hits);
        const ids = Array.from(merged.keys());
        const lexicalScores = ids.map((id) => merged.get(id)?.lexical ?? 0);
        const denseScores = ids.map((id) => merged.get(id)?.dense ?? 0);

        const normalizedLexical = minMaxNormalize(lexicalScores);
        const normalizedDense = minMaxNormalize(denseScores);
        const fused = fuseWeighted(normalizedLexical, normalizedDense, config.fusion);

        const candidates = ids.map(
            (id, i) =>
                new Candidate(
                    id,
                    corpus.require(id).sourceNoteId,
                    normalizedLexical[i] ?? 0,
                    normalizedDense[i] ?? 0,
                    fused[i] ?? 0
                )
        );

        const ranked = rankByScore(candidates, (c) => c.fusionScore).slice(0, config.kA);

        logger.info('Scout completed', {
            query: query.substring(0, 50),
            lexicalHits: lexical.hits.length,
            denseHits: dense.hits.length,
            merged: ids.length,
            kept: ranked.length,
        });

        return {
            candidates: ranked,
            lexicalHits: lexical.hits.length,
            denseHits: dense.hits.length,
            timing: { lexical: lexical.ms, dense: dense.ms, fusion: Date.now() - fusionStart },
        };
    }

    /**
     * Union by chunk id; a chunk missing from one mechanism scores 0 there.
     */
    private merge(lexicalHits: readonly ScoredHit[], denseHits: readonly ScoredHit[]): Map<string, MergedScores> {
        const merged = new Map<string, MergedScores>();

        for (const hit of lexicalHits) {
            if (!merged.has(hit.chunkId)) {
                merged.set(hit.chunkId, { lexical: hit.score, dense: 0 });
            }
        }

        for (const hit of denseHits) {
            const existing = merged.get(hit.chunkId);
            if (existing) {
                existing.dense = hit.score;
            } else {
                merged.set(hit.chunkId, { lexical: 0, dense: hit.score });
            }
        }

        return merged;
    }

    /**
     * Unwraps one mechanism's search. On failure the processed count is the
     * number of hits the other mechanism had already returned.
     */
    private settle(
        mechanism: Mechanism,
        outcome: PromiseSettledResult<TimedHits>,
        other: PromiseSettledResult<TimedHits>
    ): TimedHits {
        if (outcome.status === 'fulfilled') return outcome.value;

        const error: unknown = outcome.reason;
        if (error instanceof AppError) throw error;

        const processed = other.status === 'fulfilled' ? other.value.hits.length : 0;
        if (error instanceof NonFiniteHitError) {
            throw new ScorerFailure('scout', processed, new Error(`${mechanism} score is not finite`), error.chunkId);
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new ScorerFailure('scout', processed, new Error(`${mechanism} index: ${reason}`));
    }

    private async timed(mechanism: Mechanism, search: () => Promise<ScoredHit[]>): Promise<TimedHits> {
        const start = Date.now();
        const hits = await search();

        for (const hit of hits) {
            if (!Number.isFinite(hit.score)) {
                throw new NonFiniteHitError(mechanism, hit.chunkId);
            }
        }
        return { hits, ms: Date.now() - start };
    }
}

class NonFiniteHitError extends Error {
    constructor(
        mechanism: Mechanism,
        public readonly chunkId: string
    ) {
        super(`${mechanism} score is not finite`);
    }
}
