import { PairwiseScorer } from '../providers/ScoringProvider';
import { RetrievalConfig } from '../config/retrievalConfig';
import { mapWithWorkers } from '../utils/workerPool';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { FinalResult } from '../../domain/entities/FinalResult';
import { NoteLinkTable } from '../../domain/entities/NoteLinkTable';
import { RescoredCandidate } from '../../domain/entities/RescoredCandidate';
import { ScorerFailure } from '../../domain/errors/AppError';
import { CalibrationMap, calibrateBatch } from '../../domain/services/Calibration';
import { rankByScore } from '../../domain/services/ScoreFusion';
import logger from '../../infrastructure/logger';

export interface JudgeResult {
    results: FinalResult[];
    calibrated: boolean;
    patientUidAttached: number;
    timing: { scoring: number; calibration: number };
}

type JudgeInput = Pick<RescoredCandidate, 'chunkId'>;

export class JudgeService {
    constructor(private pairwiseScorer: PairwiseScorer) {}

    async run(
        query: string,
        rescored: readonly JudgeInput[],
        corpus: ChunkCorpus,
        calibration: CalibrationMap,
        links: NoteLinkTable | undefined,
        config: RetrievalConfig,
        signal?: AbortSignal
    ): Promise<JudgeResult> {
        if (!calibration.calibrated) {
            logger.warn('Judge scores are uncalibrated, using identity mapping', { reason: calibration.reason });
        }

        if (rescored.length === 0) {
            logger.info('Judge received no candidates', { query: query.substring(0, 50) });
            return {
                results: [],
                calibrated: calibration.calibrated,
                patientUidAttached: 0,
                timing: { scoring: 0, calibration: 0 },
            };
        }

        const scoringStart = Date.now();
        const chunks = rescored.map((candidate) => corpus.require(candidate.chunkId));
        let processed = 0;

        const raws = await mapWithWorkers(rescored, config.workers, async (candidate, index) => {
            let raw: number;
            try {
                raw = await this.pairwiseScorer.score(query, chunks[index]?.text ?? '');
            } catch (error) {
                throw new ScorerFailure('judge', processed, error, candidate.chunkId);
            }
            if (!Number.isFinite(raw)) {
                throw new ScorerFailure('judge', processed, new Error('pairwise score is not finite'), candidate.chunkId);
            }
            processed++;
            return raw;
        }, signal);
        const scoringMs = Date.now() - scoringStart;

        const calibrationStart = Date.now();
        const calibrated = calibrateBatch(calibration, raws);

        const results = rescored.map((candidate, i) => {
            const chunk = corpus.require(candidate.chunkId);
            return new FinalResult(
                candidate.chunkId,
                calibrated[i] ?? 0,
                raws[i] ?? 0,
                links ? links.patientFor(chunk.sourceNoteId) : null,
                { sourceNoteId: chunk.sourceNoteId, offset: chunk.offset }
            );
        });

        const ranked = rankByScore(results, (r) => r.calibratedScore).slice(0, config.kC);
        const patientUidAttached = ranked.filter((r) => r.patientUid !== null).length;

        logger.info('Judge completed', {
            query: query.substring(0, 50),
            input: rescored.length,
            kept: ranked.length,
            calibrated: calibration.calibrated,
            patientUidAttached,
        });

        return {
            results: ranked,
            calibrated: calibration.calibrated,
            patientUidAttached,
            timing: { scoring: scoringMs, calibration: Date.now() - calibrationStart },
        };
    }
}
