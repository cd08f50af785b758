import { StageSummary } from '@clinical-funnel/types';
import { Candidate } from './Candidate';
import { RescoredCandidate } from './RescoredCandidate';
import { FinalResult } from './FinalResult';
import { Loaded } from './Loaded';
import { ChunkCorpus } from './ChunkCorpus';

export const STAGE_FILES = {
    scout: 'candidates.jsonl',
    inspect: 'rescored.jsonl',
    judge: 'final.jsonl',
    summary: 'summary.json',
} as const;

/**
 * File-level hand-off between stages. Readers de-duplicate by chunk id,
 * keeping the first occurrence.
 */
export abstract class StageRepository {
    abstract readCandidates(path: string): Promise<Loaded<Candidate[]>>;
    abstract writeCandidates(outDir: string, candidates: readonly Candidate[]): Promise<string>;
    abstract readRescored(path: string, corpus: ChunkCorpus): Promise<Loaded<RescoredCandidate[]>>;
    abstract writeRescored(outDir: string, rescored: readonly RescoredCandidate[]): Promise<string>;
    abstract writeFinal(outDir: string, results: readonly FinalResult[]): Promise<string>;
    abstract writeSummary(outDir: string, summary: StageSummary): Promise<void>;
    abstract readSummary(dir: string): Promise<StageSummary | undefined>;
}
