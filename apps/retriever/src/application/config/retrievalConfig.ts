import 'dotenv/config';
import { readFileSync } from 'fs';
import { ZodError } from 'zod';
import { RetrievalConfigFile, retrievalConfigFileSchema } from '@clinical-funnel/types';
import { ConfigurationError } from '../../domain/errors/AppError';
import { assertFusionWeights, FusionWeights } from '../../domain/services/ScoreFusion';
import { CalibrationMethod } from '../../domain/services/Calibration';

/**
 * Retrieval configuration threaded explicitly through every stage
 */
export interface RetrievalConfig {
    readonly kA: number;
    readonly kB: number;
    readonly kC: number;
    readonly lexical: { readonly k1: number; readonly b: number };
    readonly fusion: FusionWeights;
    readonly workers: number;
    readonly evidenceLimit: number;
    readonly includeEvidence: boolean;
    readonly calibrationMethod: CalibrationMethod;
    readonly dense: { readonly provider: 'hashing' | 'ollama'; readonly dimensions: number };
    readonly pairwise: { readonly provider: 'heuristic' | 'ollama' };
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
    kA: 200,
    kB: 50,
    kC: 10,
    lexical: { k1: 0.9, b: 0.4 },
    fusion: { lexical: 0.5, dense: 0.5 },
    workers: 4,
    evidenceLimit: 10,
    includeEvidence: true,
    calibrationMethod: 'isotonic',
    dense: { provider: 'hashing', dimensions: 256 },
    pairwise: { provider: 'heuristic' },
};

const ENV_KEYS: Record<string, keyof RetrievalConfigFile> = {
    RETRIEVAL_K_A: 'K_A',
    RETRIEVAL_K_B: 'K_B',
    RETRIEVAL_K_C: 'K_C',
    RETRIEVAL_LEXICAL_K1: 'lexical_k1',
    RETRIEVAL_LEXICAL_B: 'lexical_b',
    RETRIEVAL_FUSION_WEIGHT_LEXICAL: 'fusion_weight_lexical',
    RETRIEVAL_FUSION_WEIGHT_DENSE: 'fusion_weight_dense',
    RETRIEVAL_WORKERS: 'workers',
};

/**
 * Validates the cross-field constraints zod cannot express on its own.
 * Throws ConfigurationError before any stage runs.
 */
export function validateRetrievalConfig(config: RetrievalConfig): void {
    const { kA, kB, kC } = config;
    for (const [name, value] of [['K_A', kA], ['K_B', kB], ['K_C', kC]] as const) {
        if (!Number.isInteger(value) || value < 1) {
            throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
        }
    }
    if (kA < kB) {
        throw new ConfigurationError(`K_A (${kA}) must be greater than or equal to K_B (${kB})`);
    }
    if (kB < kC) {
        throw new ConfigurationError(`K_B (${kB}) must be greater than or equal to K_C (${kC})`);
    }
    if (!Number.isInteger(config.workers) || config.workers < 1) {
        throw new ConfigurationError(`workers must be a positive integer, got ${config.workers}`);
    }
    assertFusionWeights(config.fusion);
}

export function createRetrievalConfig(file: RetrievalConfigFile = {}): RetrievalConfig {
    const base = DEFAULT_RETRIEVAL_CONFIG;
    const config: RetrievalConfig = {
        kA: file.K_A ?? base.kA,
        kB: file.K_B ?? base.kB,
        kC: file.K_C ?? base.kC,
        lexical: {
            k1: file.lexical_k1 ?? base.lexical.k1,
            b: file.lexical_b ?? base.lexical.b,
        },
        fusion: {
            lexical: file.fusion_weight_lexical ?? base.fusion.lexical,
            dense: file.fusion_weight_dense ?? base.fusion.dense,
        },
        workers: file.workers ?? base.workers,
        evidenceLimit: file.evidence_limit ?? base.evidenceLimit,
        includeEvidence: file.include_evidence ?? base.includeEvidence,
        calibrationMethod: file.calibration_method ?? base.calibrationMethod,
        dense: {
            provider: file.dense_provider ?? base.dense.provider,
            dimensions: file.dense_dimensions ?? base.dense.dimensions,
        },
        pairwise: { provider: file.pairwise_provider ?? base.pairwise.provider },
    };

    validateRetrievalConfig(config);
    return Object.freeze(config);
}

function parseConfigFile(raw: unknown, source: string): RetrievalConfigFile {
    try {
        return retrievalConfigFileSchema.parse(raw);
    } catch (error) {
        if (error instanceof ZodError) {
            const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConfigurationError(`Invalid configuration in ${source}: ${issues.join('; ')}`);
        }
        throw error;
    }
}

function readConfigFile(configPath: string): unknown {
    let text: string;
    try {
        text = readFileSync(configPath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(
            `Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new ConfigurationError(
            `Configuration file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, number> {
    const overrides: Record<string, number> = {};
    for (const [envKey, fileKey] of Object.entries(ENV_KEYS)) {
        const value = env[envKey];
        if (value === undefined || value.trim() === '') continue;
        const parsed = Number(value);
        if (!Number.isFinite(parsed)) {
            throw new ConfigurationError(`${envKey} must be numeric, got "${value}"`);
        }
        overrides[fileKey] = parsed;
    }
    return overrides;
}

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then the JSON file, then RETRIEVAL_* environment variables.
 */
export function loadRetrievalConfig(options: LoadConfigOptions = {}): RetrievalConfig {
    const fromFile = options.configPath ? readConfigFile(options.configPath) : {};
    if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
        throw new ConfigurationError(`Configuration file ${options.configPath} must contain a JSON object`);
    }

    const merged = { ...fromFile, ...readEnvOverrides(options.env ?? process.env) };
    return createRetrievalConfig(parseConfigFile(merged, options.configPath ?? 'environment'));
}
