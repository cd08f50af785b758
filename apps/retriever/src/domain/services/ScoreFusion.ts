import { ConfigurationError } from '../errors/AppError';

export const WEIGHT_EPSILON = 1e-6;

export interface FusionWeights {
    readonly lexical: number;
    readonly dense: number;
}

export interface Identified {
    readonly chunkId: string;
}

export type ScoreKey<T> = (item: T) => number;

/**
 * Min-max scaling into [0, 1]. A uniform list (including a single element or
 * all zeros) maps every member to 1.0 rather than dividing by zero.
 */
export function minMaxNormalize(scores: readonly number[]): number[] {
    if (scores.length === 0) return [];

    let min = Infinity;
    let max = -Infinity;
    for (const score of scores) {
        if (score < min) min = score;
        if (score > max) max = score;
    }

    if (max === min) {
        return scores.map(() => 1.0);
    }

    const range = max - min;
    return scores.map((score) => clampUnit((score - min) / range));
}

export function assertFusionWeights(weights: FusionWeights): void {
    const { lexical, dense } = weights;
    if (!Number.isFinite(lexical) || !Number.isFinite(dense) || lexical < 0 || dense < 0) {
        throw new ConfigurationError(`Fusion weights must be non-negative numbers, got ${lexical}/${dense}`);
    }
    if (Math.abs(lexical + dense - 1) > WEIGHT_EPSILON) {
        throw new ConfigurationError(
            `Fusion weights must sum to 1.0, got ${lexical} + ${dense} = ${lexical + dense}`
        );
    }
}

/**
 * Weighted sum of two already-normalized score columns.
 */
export function fuseWeighted(
    lexical: readonly number[],
    dense: readonly number[],
    weights: FusionWeights
): number[] {
    assertFusionWeights(weights);
    if (lexical.length !== dense.length) {
        throw new ConfigurationError(
            `Cannot fuse score lists of different length (${lexical.length} vs ${dense.length})`
        );
    }
    return lexical.map((score, i) => clampUnit(weights.lexical * score + weights.dense * (dense[i] ?? 0)));
}

export function compareChunkIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Canonical ordering shared by every stage: each score key descending in the
 * order given, then chunkId ascending. Returns a new array.
 */
export function rankByScore<T extends Identified>(items: readonly T[], ...keys: ScoreKey<T>[]): T[] {
    return [...items].sort((a, b) => {
        for (const key of keys) {
            const diff = key(b) - key(a);
            if (diff !== 0) return diff;
        }
        return compareChunkIds(a.chunkId, b.chunkId);
    });
}

export function clampUnit(value: number): number {
    if (value <= 0) return 0;
    if (value >= 1) return 1;
    return value;
}
