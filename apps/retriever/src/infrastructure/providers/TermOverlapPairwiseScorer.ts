import { PairwiseScorer } from '../../application/providers/ScoringProvider';
import { tokenize, uniqueTokens } from '../../application/utils/tokenize';

const COVERAGE_WEIGHT = 0.7;
const ADJACENCY_WEIGHT = 0.3;

/**
 * In-process pairwise scorer: how much of the query the chunk covers, and
 * whether consecutive query terms also appear side by side in the chunk.
 */
export class TermOverlapPairwiseScorer implements PairwiseScorer {
    async score(query: string, text: string): Promise<number> {
        const queryTokens = uniqueTokens(tokenize(query));
        if (queryTokens.length === 0) return 0;

        const chunkTokens = tokenize(text);
        const present = new Set(chunkTokens);
        const matched = queryTokens.filter((token) => present.has(token)).length;
        const coverage = matched / queryTokens.length;

        let adjacency = coverage;
        if (queryTokens.length >= 2) {
            const chunkBigrams = new Set<string>();
            for (let i = 0; i + 1 < chunkTokens.length; i++) {
                chunkBigrams.add(`${chunkTokens[i]} ${chunkTokens[i + 1]}`);
            }
            let hits = 0;
            for (let i = 0; i + 1 < queryTokens.length; i++) {
                if (chunkBigrams.has(`${queryTokens[i]} ${queryTokens[i + 1]}`)) hits++;
            }
            adjacency = hits / (queryTokens.length - 1);
        }

        return COVERAGE_WEIGHT * coverage + ADJACENCY_WEIGHT * adjacency;
    }
}
