import { JsonlRepositoryProvider } from './repositories/RepositoryProvider';
import { SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import { ChunkRepository } from '../domain/entities/ChunkRepository';
import { JsonlChunkRepository } from './repositories/JsonlChunkRepository';
import { NoteLinkRepository } from '../domain/entities/NoteLinkRepository';
import { JsonlNoteLinkRepository } from './repositories/JsonlNoteLinkRepository';
import { CalibrationRepository } from '../domain/entities/CalibrationRepository';
import { JsonlCalibrationRepository } from './repositories/JsonlCalibrationRepository';
import { StageRepository } from '../domain/entities/StageRepository';
import { JsonlStageRepository } from './repositories/JsonlStageRepository';
import { ScoringProviderFactory } from '../application/providers/ScoringProviderFactory';
import { DefaultScoringFactory } from './providers/DefaultScoringFactory';
import { RetrievalConfig } from '../application/config/retrievalConfig';
import { RunScout } from '../application/useCases/RunScout';
import { RunInspect } from '../application/useCases/RunInspect';
import { RunJudge } from '../application/useCases/RunJudge';
import { RunPipeline } from '../application/useCases/RunPipeline';

export class Core {
    public repositories = new JsonlRepositoryProvider();
    public useCases = new UseCaseProvider();

    constructor(
        private config: RetrievalConfig,
        private scoring: ScoringProviderFactory = new DefaultScoringFactory()
    ) {
        this.initializeRepositories();
        this.initializeServices();
    }

    private initializeRepositories() {
        this.repositories.register(ChunkRepository, () => new JsonlChunkRepository());
        this.repositories.register(NoteLinkRepository, () => new JsonlNoteLinkRepository());
        this.repositories.register(CalibrationRepository, () => new JsonlCalibrationRepository());
        this.repositories.register(StageRepository, () => new JsonlStageRepository());
    }

    private initializeServices() {
        this.useCases.register(RunScout, () => new RunScout(this.repositories, this.scoring, this.config));
        this.useCases.register(RunInspect, () => new RunInspect(this.repositories, this.scoring, this.config));
        this.useCases.register(RunJudge, () => new RunJudge(this.repositories, this.scoring, this.config));
        this.useCases.register(RunPipeline, () => new RunPipeline(
            this.repositories,
            this.useCases.get(RunScout),
            this.useCases.get(RunInspect),
            this.useCases.get(RunJudge),
        ));
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
