export { Core } from './infrastructure/Core';
export { main } from './cli';
export * from './application/config/retrievalConfig';
export { RunScout } from './application/useCases/RunScout';
export { RunInspect } from './application/useCases/RunInspect';
export { RunJudge } from './application/useCases/RunJudge';
export { RunPipeline } from './application/useCases/RunPipeline';
export { ScoutService } from './application/services/ScoutService';
export { InspectorService } from './application/services/InspectorService';
export { JudgeService } from './application/services/JudgeService';
export * from './domain/services/ScoreFusion';
export * from './domain/services/Calibration';
export * from './domain/errors/AppError';
