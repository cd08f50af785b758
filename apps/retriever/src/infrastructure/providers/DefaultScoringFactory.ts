import { ScoringProviderFactory } from '../../application/providers/ScoringProviderFactory';
import { DenseIndex, InteractionScorer, LexicalIndex, PairwiseScorer } from '../../application/providers/ScoringProvider';
import { VectorProvider } from '../../application/providers/VectorProvider';
import { RetrievalConfig } from '../../application/config/retrievalConfig';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { Bm25LexicalIndex } from './Bm25LexicalIndex';
import { VectorDenseIndex } from './VectorDenseIndex';
import { HashingVectorProvider } from './HashingVectorProvider';
import { OllamaVectorProvider } from './OllamaVectorProvider';
import { LateInteractionScorer } from './LateInteractionScorer';
import { TermOverlapPairwiseScorer } from './TermOverlapPairwiseScorer';
import { LLMPairwiseScorer } from './LLMPairwiseScorer';
import { OllamaLLMProvider } from './OllamaLLMProvider';

export class DefaultScoringFactory implements ScoringProviderFactory {
    async createLexicalIndex(corpus: ChunkCorpus, config: RetrievalConfig): Promise<LexicalIndex> {
        return Bm25LexicalIndex.fromCorpus(corpus, config.lexical);
    }

    async createDenseIndex(
        corpus: ChunkCorpus,
        config: RetrievalConfig,
        vectors?: ReadonlyMap<string, readonly number[]>,
        source?: string
    ): Promise<DenseIndex> {
        return VectorDenseIndex.fromCorpus(corpus, this.createVectorProvider(config), vectors, source);
    }

    createInteractionScorer(): InteractionScorer {
        return new LateInteractionScorer();
    }

    createPairwiseScorer(config: RetrievalConfig): PairwiseScorer {
        if (config.pairwise.provider === 'ollama') {
            return new LLMPairwiseScorer(new OllamaLLMProvider());
        }
        return new TermOverlapPairwiseScorer();
    }

    private createVectorProvider(config: RetrievalConfig): VectorProvider {
        if (config.dense.provider === 'ollama') {
            return new OllamaVectorProvider();
        }
        return new HashingVectorProvider(config.dense.dimensions);
    }
}
