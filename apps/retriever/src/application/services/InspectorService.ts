import { InteractionScorer } from '../providers/ScoringProvider';
import { RetrievalConfig } from '../config/retrievalConfig';
import { mapWithWorkers } from '../utils/workerPool';
import { Candidate } from '../../domain/entities/Candidate';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { compareEvidence, EvidenceSpan, RescoredCandidate } from '../../domain/entities/RescoredCandidate';
import { ScorerFailure } from '../../domain/errors/AppError';
import { clampUnit, rankByScore } from '../../domain/services/ScoreFusion';
import logger from '../../infrastructure/logger';

export interface InspectorResult {
    rescored: RescoredCandidate[];
    timing: { scoring: number; ranking: number };
}

type InspectorInput = Pick<Candidate, 'chunkId' | 'sourceNoteId' | 'fusionScore'>;

export class InspectorService {
    constructor(private interactionScorer: InteractionScorer) {}

    async run(
        query: string,
        candidates: readonly InspectorInput[],
        corpus: ChunkCorpus,
        config: RetrievalConfig,
        signal?: AbortSignal
    ): Promise<InspectorResult> {
        if (candidates.length === 0) {
            logger.info('Inspector received no candidates', { query: query.substring(0, 50) });
            return { rescored: [], timing: { scoring: 0, ranking: 0 } };
        }

        const scoringStart = Date.now();
        const texts = candidates.map((candidate) => corpus.require(candidate.chunkId).text);
        let processed = 0;

        const rescored = await mapWithWorkers(candidates, config.workers, async (candidate, index) => {
            let score: number;
            let evidence: EvidenceSpan[];
            try {
                ({ score, evidence } = await this.interactionScorer.score(query, texts[index] ?? ''));
            } catch (error) {
                throw new ScorerFailure('inspect', processed, error, candidate.chunkId);
            }
            if (!Number.isFinite(score)) {
                throw new ScorerFailure('inspect', processed, new Error('interaction score is not finite'), candidate.chunkId);
            }
            processed++;

            return new RescoredCandidate(
                candidate.chunkId,
                candidate.sourceNoteId,
                clampUnit(score),
                candidate.fusionScore,
                this.selectEvidence(evidence, config)
            );
        }, signal);
        const scoringMs = Date.now() - scoringStart;

        const rankingStart = Date.now();
        const ranked = rankByScore(
            rescored,
            (c) => c.interactionScore,
            (c) => c.fusionScore
        ).slice(0, config.kB);

        logger.info('Inspector completed', {
            query: query.substring(0, 50),
            input: candidates.length,
            kept: ranked.length,
            latency: scoringMs,
        });

        return { rescored: ranked, timing: { scoring: scoringMs, ranking: Date.now() - rankingStart } };
    }

    private selectEvidence(evidence: readonly EvidenceSpan[], config: RetrievalConfig): EvidenceSpan[] | undefined {
        if (!config.includeEvidence || evidence.length === 0) return undefined;
        return [...evidence].sort(compareEvidence).slice(0, config.evidenceLimit);
    }
}
