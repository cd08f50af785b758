import { LLMProvider } from '../../application/providers/LLMProvider';
import { PairwiseScorer } from '../../application/providers/ScoringProvider';

export class LLMPairwiseScorer implements PairwiseScorer {
    constructor(private readonly llmProvider: LLMProvider) {}

    score(query: string, text: string): Promise<number> {
        return this.llmProvider.scoreRelevance(query, text);
    }
}
