import { join } from 'path';
import { StageName } from '@clinical-funnel/types';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { PipelineTimeoutError } from '../../domain/errors/AppError';
import { RunScout } from './RunScout';
import { RunInspect } from './RunInspect';
import { RunJudge } from './RunJudge';
import { StageOutcome } from './StageOutcome';
import { Candidate } from '../../domain/entities/Candidate';
import { RescoredCandidate } from '../../domain/entities/RescoredCandidate';
import { FinalResult } from '../../domain/entities/FinalResult';
import logger from '../../infrastructure/logger';

export interface RunPipelineInput {
    corpusPath: string;
    query: string;
    outDir: string;
    denseIndexPath?: string;
    linksPath?: string;
    calibrationPath?: string;
    timeoutMs?: number;
}

export interface PipelineOutcome {
    scout: StageOutcome<Candidate>;
    inspect: StageOutcome<RescoredCandidate>;
    judge: StageOutcome<FinalResult>;
}

/**
 * Scout, Inspector and Judge in sequence, each writing into its own
 * subdirectory of outDir. A stage starts only after the previous one has
 * written its output.
 */
export class RunPipeline {
    constructor(
        private repositories: RepositoryProvider,
        private runScout: RunScout,
        private runInspect: RunInspect,
        private runJudge: RunJudge
    ) {}

    async execute(input: RunPipelineInput): Promise<PipelineOutcome> {
        const controller = new AbortController();
        const progress: PipelineProgress = { stage: 'scout', signal: controller.signal };
        if (input.timeoutMs === undefined) {
            return this.runStages(input, progress);
        }

        const timeoutMs = input.timeoutMs;
        let timer: NodeJS.Timeout | undefined;

        const timeoutPromise = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new PipelineTimeoutError(timeoutMs, progress.stage);
                controller.abort(error);
                reject(error);
            }, timeoutMs);
        });

        try {
            return await Promise.race([this.runStages(input, progress), timeoutPromise]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async runStages(input: RunPipelineInput, progress: PipelineProgress): Promise<PipelineOutcome> {
        const startTime = Date.now();
        const corpus = await this.repositories.get(ChunkRepository).loadCorpus(input.corpusPath);

        this.enter(progress, 'scout');
        const scout = await this.runScout.execute({
            corpusPath: input.corpusPath,
            query: input.query,
            outDir: join(input.outDir, 'scout'),
            denseIndexPath: input.denseIndexPath,
            corpus,
            signal: progress.signal,
        });

        this.enter(progress, 'inspect');
        const inspect = await this.runInspect.execute({
            candidatesPath: scout.outputPath,
            corpusPath: input.corpusPath,
            outDir: join(input.outDir, 'inspect'),
            query: input.query,
            corpus,
            signal: progress.signal,
        });

        this.enter(progress, 'judge');
        const judge = await this.runJudge.execute({
            rescoredPath: inspect.outputPath,
            corpusPath: input.corpusPath,
            outDir: join(input.outDir, 'judge'),
            query: input.query,
            linksPath: input.linksPath,
            calibrationPath: input.calibrationPath,
            corpus,
            signal: progress.signal,
        });

        logger.info('Pipeline completed', {
            query: input.query.substring(0, 50),
            candidates: scout.results.length,
            rescored: inspect.results.length,
            final: judge.results.length,
            latency: Date.now() - startTime,
        });

        return { scout, inspect, judge };
    }

    // Stops a run whose deadline already passed from starting further stages.
    private enter(progress: PipelineProgress, stage: StageName): void {
        progress.signal.throwIfAborted();
        progress.stage = stage;
    }
}

interface PipelineProgress {
    stage: StageName;
    signal: AbortSignal;
}
