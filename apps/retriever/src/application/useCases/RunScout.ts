import { StageSummary } from '@clinical-funnel/types';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import { ScoringProviderFactory } from '../providers/ScoringProviderFactory';
import { RetrievalConfig } from '../config/retrievalConfig';
import { ScoutService } from '../services/ScoutService';
import { Candidate } from '../../domain/entities/Candidate';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { Loaded } from '../../domain/entities/Loaded';
import { StageRepository } from '../../domain/entities/StageRepository';
import { StageOutcome } from './StageOutcome';

export interface RunScoutInput {
    corpusPath: string;
    query: string;
    outDir: string;
    denseIndexPath?: string;
    /** Reuse an already loaded corpus instead of reading corpusPath again. */
    corpus?: Loaded<ChunkCorpus>;
    /** Aborting stops the stage before it writes any output. */
    signal?: AbortSignal;
}

export class RunScout {
    constructor(
        private repositories: RepositoryProvider,
        private scoring: ScoringProviderFactory,
        private config: RetrievalConfig
    ) {}

    async execute(input: RunScoutInput): Promise<StageOutcome<Candidate>> {
        const startTime = Date.now();
        const chunkRepository = this.repositories.get(ChunkRepository);

        const corpus = input.corpus ?? (await chunkRepository.loadCorpus(input.corpusPath));
        const vectors = input.denseIndexPath
            ? await chunkRepository.loadDenseVectors(input.denseIndexPath)
            : undefined;

        const indexStart = Date.now();
        const [lexicalIndex, denseIndex] = await Promise.all([
            this.scoring.createLexicalIndex(corpus.value, this.config),
            this.scoring.createDenseIndex(corpus.value, this.config, vectors?.value, input.denseIndexPath),
        ]);
        const indexMs = Date.now() - indexStart;

        const scout = new ScoutService(lexicalIndex, denseIndex);
        const result = await scout.run(input.query, corpus.value, this.config);

        const stageRepository = this.repositories.get(StageRepository);
        input.signal?.throwIfAborted();
        const outputPath = await stageRepository.writeCandidates(input.outDir, result.candidates);

        const skipped: Record<string, number> = { corpus: corpus.skipped };
        if (vectors) skipped.denseVectors = vectors.skipped;

        const summary: StageSummary = {
            stage: 'scout',
            query: input.query,
            inputCount: corpus.value.size,
            outputCount: result.candidates.length,
            k: this.config.kA,
            skipped,
            timing: {
                index: indexMs,
                ...result.timing,
                total: Date.now() - startTime,
            },
        };
        input.signal?.throwIfAborted();
        await stageRepository.writeSummary(input.outDir, summary);

        return { results: result.candidates, outputPath, summary };
    }
}
