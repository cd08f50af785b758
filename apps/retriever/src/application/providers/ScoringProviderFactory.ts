import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { RetrievalConfig } from '../config/retrievalConfig';
import { DenseIndex, InteractionScorer, LexicalIndex, PairwiseScorer } from './ScoringProvider';

/**
 * Builds the pluggable scoring capabilities for one run. Swapping the factory
 * swaps every backend without touching the stages.
 */
export interface ScoringProviderFactory {
    createLexicalIndex(corpus: ChunkCorpus, config: RetrievalConfig): Promise<LexicalIndex>;
    createDenseIndex(
        corpus: ChunkCorpus,
        config: RetrievalConfig,
        vectors?: ReadonlyMap<string, readonly number[]>,
        source?: string
    ): Promise<DenseIndex>;
    createInteractionScorer(config: RetrievalConfig): InteractionScorer;
    createPairwiseScorer(config: RetrievalConfig): PairwiseScorer;
}
