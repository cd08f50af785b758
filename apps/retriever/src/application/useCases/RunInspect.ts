import { StageSummary } from '@clinical-funnel/types';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import { ScoringProviderFactory } from '../providers/ScoringProviderFactory';
import { RetrievalConfig } from '../config/retrievalConfig';
import { InspectorService } from '../services/InspectorService';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { Loaded } from '../../domain/entities/Loaded';
import { RescoredCandidate } from '../../domain/entities/RescoredCandidate';
import { StageRepository } from '../../domain/entities/StageRepository';
import { resolveQuery } from './resolveQuery';
import { StageOutcome } from './StageOutcome';

export interface RunInspectInput {
    candidatesPath: string;
    corpusPath: string;
    outDir: string;
    query?: string;
    corpus?: Loaded<ChunkCorpus>;
    signal?: AbortSignal;
}

export class RunInspect {
    constructor(
        private repositories: RepositoryProvider,
        private scoring: ScoringProviderFactory,
        private config: RetrievalConfig
    ) {}

    async execute(input: RunInspectInput): Promise<StageOutcome<RescoredCandidate>> {
        const startTime = Date.now();
        const stageRepository = this.repositories.get(StageRepository);

        const query = await resolveQuery(stageRepository, input.query, input.candidatesPath);
        const corpus = input.corpus ?? (await this.repositories.get(ChunkRepository).loadCorpus(input.corpusPath));
        const candidates = await stageRepository.readCandidates(input.candidatesPath);

        const inspector = new InspectorService(this.scoring.createInteractionScorer(this.config));
        const result = await inspector.run(query, candidates.value, corpus.value, this.config, input.signal);

        input.signal?.throwIfAborted();
        const outputPath = await stageRepository.writeRescored(input.outDir, result.rescored);
        const summary: StageSummary = {
            stage: 'inspect',
            query,
            inputCount: candidates.value.length,
            outputCount: result.rescored.length,
            k: this.config.kB,
            skipped: { corpus: corpus.skipped, candidates: candidates.skipped },
            timing: { ...result.timing, total: Date.now() - startTime },
        };
        input.signal?.throwIfAborted();
        await stageRepository.writeSummary(input.outDir, summary);

        return { results: result.rescored, outputPath, summary };
    }
}
