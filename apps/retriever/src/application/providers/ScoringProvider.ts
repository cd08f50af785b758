import { EvidenceSpan } from '../../domain/entities/RescoredCandidate';

export interface ScoredHit {
    chunkId: string;
    score: number;
}

/**
 * Query side of an already-built lexical index. Hits come back best first,
 * at most `limit` of them, raw (unnormalized) scores.
 */
export interface LexicalIndex {
    search(query: string, limit: number): Promise<ScoredHit[]>;
}

export interface DenseIndex {
    search(query: string, limit: number): Promise<ScoredHit[]>;
}

export interface InteractionScore {
    score: number;
    evidence: EvidenceSpan[];
}

/**
 * Token-level interaction between a query and one chunk. Scores lie in [0, 1].
 */
export interface InteractionScorer {
    score(query: string, text: string): Promise<InteractionScore>;
}

/**
 * Full (query, chunk) relevance. Raw output feeds calibration, so only a
 * finite number is required; the default scorers stay in [0, 1].
 */
export interface PairwiseScorer {
    score(query: string, text: string): Promise<number>;
}
