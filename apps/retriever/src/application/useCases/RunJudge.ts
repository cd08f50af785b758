import { StageSummary } from '@clinical-funnel/types';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import { ScoringProviderFactory } from '../providers/ScoringProviderFactory';
import { RetrievalConfig } from '../config/retrievalConfig';
import { JudgeService } from '../services/JudgeService';
import { CalibrationRepository } from '../../domain/entities/CalibrationRepository';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { FinalResult } from '../../domain/entities/FinalResult';
import { Loaded } from '../../domain/entities/Loaded';
import { NoteLinkRepository } from '../../domain/entities/NoteLinkRepository';
import { StageRepository } from '../../domain/entities/StageRepository';
import { fitCalibration, identityCalibration } from '../../domain/services/Calibration';
import { resolveQuery } from './resolveQuery';
import { StageOutcome } from './StageOutcome';

export interface RunJudgeInput {
    rescoredPath: string;
    corpusPath: string;
    outDir: string;
    query?: string;
    linksPath?: string;
    calibrationPath?: string;
    corpus?: Loaded<ChunkCorpus>;
    signal?: AbortSignal;
}

export class RunJudge {
    constructor(
        private repositories: RepositoryProvider,
        private scoring: ScoringProviderFactory,
        private config: RetrievalConfig
    ) {}

    async execute(input: RunJudgeInput): Promise<StageOutcome<FinalResult>> {
        const startTime = Date.now();
        const stageRepository = this.repositories.get(StageRepository);

        const query = await resolveQuery(stageRepository, input.query, input.rescoredPath);
        const corpus = input.corpus ?? (await this.repositories.get(ChunkRepository).loadCorpus(input.corpusPath));
        const rescored = await stageRepository.readRescored(input.rescoredPath, corpus.value);

        const skipped: Record<string, number> = { corpus: corpus.skipped, rescored: rescored.skipped };

        const links = input.linksPath
            ? await this.repositories.get(NoteLinkRepository).load(input.linksPath)
            : undefined;
        if (links) skipped.links = links.skipped;

        let calibration = identityCalibration('no calibration reference set');
        if (input.calibrationPath) {
            const reference = await this.repositories.get(CalibrationRepository).load(input.calibrationPath);
            skipped.calibration = reference.skipped;
            calibration = fitCalibration(reference.value, this.config.calibrationMethod);
        }

        const judge = new JudgeService(this.scoring.createPairwiseScorer(this.config));
        const result = await judge.run(query, rescored.value, corpus.value, calibration, links?.value, this.config, input.signal);

        input.signal?.throwIfAborted();
        const outputPath = await stageRepository.writeFinal(input.outDir, result.results);
        const summary: StageSummary = {
            stage: 'judge',
            query,
            inputCount: rescored.value.length,
            outputCount: result.results.length,
            k: this.config.kC,
            skipped,
            timing: { ...result.timing, total: Date.now() - startTime },
            calibrated: result.calibrated,
            calibrationMethod: calibration.method,
            patientUidAttached: result.patientUidAttached,
        };
        input.signal?.throwIfAborted();
        await stageRepository.writeSummary(input.outDir, summary);

        return { results: result.results, outputPath, summary };
    }
}
