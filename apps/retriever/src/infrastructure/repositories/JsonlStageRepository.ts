import { join } from 'path';
import { readFile } from 'fs/promises';
import {
    inspectRecordSchema,
    InspectRecord,
    JudgeRecord,
    scoutRecordSchema,
    ScoutRecord,
    StageSummary,
    stageSummarySchema,
} from '@clinical-funnel/types';
import { STAGE_FILES, StageRepository } from '../../domain/entities/StageRepository';
import { Candidate } from '../../domain/entities/Candidate';
import { RescoredCandidate } from '../../domain/entities/RescoredCandidate';
import { FinalResult } from '../../domain/entities/FinalResult';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { Loaded } from '../../domain/entities/Loaded';
import { StageIoError } from '../../domain/errors/AppError';
import { readJsonl, writeJsonl, writeText } from '../io/jsonl';
import logger from '../logger';

function dedupeById<T extends { chunk_id: string }>(records: readonly T[], source: string): { unique: T[]; duplicates: number } {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const record of records) {
        if (seen.has(record.chunk_id)) {
            logger.warn('Skipping duplicate candidate', { source, chunkId: record.chunk_id });
            continue;
        }
        seen.add(record.chunk_id);
        unique.push(record);
    }
    return { unique, duplicates: records.length - unique.length };
}

export function toScoutRecord(candidate: Candidate): ScoutRecord {
    return {
        chunk_id: candidate.chunkId,
        s_lexical: candidate.lexicalScore,
        s_dense: candidate.denseScore,
        fusion_score: candidate.fusionScore,
        source_note_id: candidate.sourceNoteId,
    };
}

export function toInspectRecord(candidate: RescoredCandidate): InspectRecord {
    const record: InspectRecord = {
        chunk_id: candidate.chunkId,
        s_interaction: candidate.interactionScore,
        fusion_score: candidate.fusionScore,
    };
    if (candidate.evidence) {
        record.evidence = candidate.evidence.map((span) => ({
            token: span.token,
            weight: span.weight,
            position: span.position,
        }));
    }
    return record;
}

export function toJudgeRecord(result: FinalResult): JudgeRecord {
    return {
        chunk_id: result.chunkId,
        calibrated_score: result.calibratedScore,
        raw_score: result.rawScore,
        patient_uid: result.patientUid,
        pointer: {
            source_note_id: result.pointer.sourceNoteId,
            offset: result.pointer.offset,
        },
    };
}

export class JsonlStageRepository extends StageRepository {
    async readCandidates(path: string): Promise<Loaded<Candidate[]>> {
        const { records, skipped } = await readJsonl(path, scoutRecordSchema);
        const { unique, duplicates } = dedupeById(records, path);
        return {
            value: unique.map(
                (r) => new Candidate(r.chunk_id, r.source_note_id, r.s_lexical, r.s_dense, r.fusion_score)
            ),
            skipped: skipped + duplicates,
        };
    }

    async writeCandidates(outDir: string, candidates: readonly Candidate[]): Promise<string> {
        const path = join(outDir, STAGE_FILES.scout);
        await writeJsonl(path, candidates.map(toScoutRecord));
        return path;
    }

    async readRescored(path: string, corpus: ChunkCorpus): Promise<Loaded<RescoredCandidate[]>> {
        const { records, skipped } = await readJsonl(path, inspectRecordSchema);
        const { unique, duplicates } = dedupeById(records, path);
        return {
            value: unique.map(
                (r) =>
                    new RescoredCandidate(
                        r.chunk_id,
                        corpus.require(r.chunk_id).sourceNoteId,
                        r.s_interaction,
                        r.fusion_score,
                        r.evidence
                    )
            ),
            skipped: skipped + duplicates,
        };
    }

    async writeRescored(outDir: string, rescored: readonly RescoredCandidate[]): Promise<string> {
        const path = join(outDir, STAGE_FILES.inspect);
        await writeJsonl(path, rescored.map(toInspectRecord));
        return path;
    }

    async writeFinal(outDir: string, results: readonly FinalResult[]): Promise<string> {
        const path = join(outDir, STAGE_FILES.judge);
        await writeJsonl(path, results.map(toJudgeRecord));
        return path;
    }

    async writeSummary(outDir: string, summary: StageSummary): Promise<void> {
        await writeText(join(outDir, STAGE_FILES.summary), JSON.stringify(summary, null, 2) + '\n');
    }

    async readSummary(dir: string): Promise<StageSummary | undefined> {
        const path = join(dir, STAGE_FILES.summary);
        let text: string;
        try {
            text = await readFile(path, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) return undefined;
            throw new StageIoError(
                `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
                path
            );
        }

        try {
            return stageSummarySchema.parse(JSON.parse(text));
        } catch (error) {
            logger.warn('Ignoring unreadable stage summary', {
                path,
                reason: error instanceof Error ? error.message : String(error),
            });
            return undefined;
        }
    }
}

function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
