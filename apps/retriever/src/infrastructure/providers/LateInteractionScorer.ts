import { InteractionScore, InteractionScorer } from '../../application/providers/ScoringProvider';
import { tokenize, tokenizeWithPositions, uniqueTokens } from '../../application/utils/tokenize';
import { compareEvidence, EvidenceSpan } from '../../domain/entities/RescoredCandidate';

const MIN_PREFIX_LENGTH = 3;

/**
 * 1 for identical tokens, shorter/longer for a prefix match of at least
 * three characters ("metasta" vs "metastatic"), otherwise 0.
 */
export function tokenSimilarity(a: string, b: string): number {
    if (a === b) return 1;
    const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
    if (shorter.length >= MIN_PREFIX_LENGTH && longer.startsWith(shorter)) {
        return shorter.length / longer.length;
    }
    return 0;
}

/**
 * MaxSim late interaction: every distinct query token is matched against its
 * best chunk token and the maxima are averaged.
 */
export class LateInteractionScorer implements InteractionScorer {
    async score(query: string, text: string): Promise<InteractionScore> {
        const queryTokens = uniqueTokens(tokenize(query));
        if (queryTokens.length === 0) {
            return { score: 0, evidence: [] };
        }

        const chunkTokens = tokenizeWithPositions(text);
        const evidenceByPosition = new Map<number, EvidenceSpan>();
        let total = 0;

        for (const queryToken of queryTokens) {
            let best = 0;
            let bestPosition = -1;
            let bestText = '';
            for (const chunkToken of chunkTokens) {
                const similarity = tokenSimilarity(queryToken, chunkToken.text);
                if (similarity > best) {
                    best = similarity;
                    bestPosition = chunkToken.position;
                    bestText = chunkToken.text;
                }
            }

            total += best;
            if (best > 0) {
                const existing = evidenceByPosition.get(bestPosition);
                if (!existing || existing.weight < best) {
                    evidenceByPosition.set(bestPosition, { token: bestText, weight: best, position: bestPosition });
                }
            }
        }

        return {
            score: Math.min(1, total / queryTokens.length),
            evidence: Array.from(evidenceByPosition.values()).sort(compareEvidence),
        };
    }
}
