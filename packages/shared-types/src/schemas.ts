import { z } from 'zod';

export const chunkRecordSchema = z.object({
  chunk_id: z.string().min(1, 'chunk_id cannot be empty'),
  source_note_id: z.string().min(1, 'source_note_id cannot be empty'),
  text: z.string(),
  offset: z.number().int().nonnegative(),
});

export const noteLinkSchema = z.object({
  note_uid: z.string().min(1, 'note_uid cannot be empty'),
  patient_uid: z.string().min(1, 'patient_uid cannot be empty'),
});

export const denseVectorSchema = z.object({
  chunk_id: z.string().min(1),
  vector: z.array(z.number()).min(1, 'vector cannot be empty'),
});

export const calibrationPointSchema = z.object({
  score: z.number(),
  label: z.union([z.literal(0), z.literal(1), z.boolean()]).transform((label) => (label === true || label === 1 ? 1 : 0)),
});

const unitScore = z.number().min(0).max(1);

export const scoutRecordSchema = z.object({
  chunk_id: z.string().min(1),
  s_lexical: unitScore,
  s_dense: unitScore,
  fusion_score: unitScore,
  source_note_id: z.string(),
});

export const evidenceSpanSchema = z.object({
  token: z.string(),
  weight: z.number(),
  position: z.number().int().nonnegative(),
});

export const inspectRecordSchema = z.object({
  chunk_id: z.string().min(1),
  s_interaction: unitScore,
  fusion_score: unitScore,
  evidence: z.array(evidenceSpanSchema).optional(),
});

export const judgeRecordSchema = z.object({
  chunk_id: z.string().min(1),
  calibrated_score: unitScore,
  raw_score: z.number(),
  patient_uid: z.string().nullable(),
  pointer: z.object({
    source_note_id: z.string(),
    offset: z.number().int().nonnegative(),
  }),
});

const positiveInt = z.number().int().positive();

export const stageNameSchema = z.enum(['scout', 'inspect', 'judge']);

/**
 * Diagnostics written next to every stage output as summary.json
 */
export const stageSummarySchema = z.object({
  stage: stageNameSchema,
  query: z.string(),
  inputCount: z.number().int().nonnegative(),
  outputCount: z.number().int().nonnegative(),
  k: positiveInt,
  skipped: z.record(z.number().int().nonnegative()),
  timing: z.record(z.number()),
  calibrated: z.boolean().optional(),
  calibrationMethod: z.string().optional(),
  patientUidAttached: z.number().int().nonnegative().optional(),
});

/**
 * Shape of the retrieval configuration file. Key names follow the on-disk
 * contract shared with the other pipeline tools.
 */
export const retrievalConfigFileSchema = z
  .object({
    K_A: positiveInt,
    K_B: positiveInt,
    K_C: positiveInt,
    lexical_k1: z.number().nonnegative(),
    lexical_b: z.number().min(0).max(1),
    fusion_weight_lexical: z.number().min(0).max(1),
    fusion_weight_dense: z.number().min(0).max(1),
    workers: positiveInt,
    evidence_limit: positiveInt,
    include_evidence: z.boolean(),
    calibration_method: z.enum(['isotonic', 'platt']),
    dense_provider: z.enum(['hashing', 'ollama']),
    dense_dimensions: positiveInt,
    pairwise_provider: z.enum(['heuristic', 'ollama']),
  })
  .partial()
  .strict();

export type ChunkRecord = z.infer<typeof chunkRecordSchema>;
export type NoteLinkRecord = z.infer<typeof noteLinkSchema>;
export type DenseVectorRecord = z.infer<typeof denseVectorSchema>;
export type CalibrationPointRecord = z.infer<typeof calibrationPointSchema>;
export type ScoutRecord = z.infer<typeof scoutRecordSchema>;
export type EvidenceSpanRecord = z.infer<typeof evidenceSpanSchema>;
export type InspectRecord = z.infer<typeof inspectRecordSchema>;
export type JudgeRecord = z.infer<typeof judgeRecordSchema>;
export type StageName = z.infer<typeof stageNameSchema>;
export type StageSummary = z.infer<typeof stageSummarySchema>;
export type RetrievalConfigFile = z.infer<typeof retrievalConfigFileSchema>;
