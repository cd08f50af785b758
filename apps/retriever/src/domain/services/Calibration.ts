import { clampUnit } from './ScoreFusion';

export type CalibrationMethod = 'isotonic' | 'platt';

export interface CalibrationPoint {
    readonly score: number;
    readonly label: number;
}

export interface CalibrationMap {
    readonly method: CalibrationMethod | 'identity';
    /** False when the fit was degenerate and raw scores pass through unchanged. */
    readonly calibrated: boolean;
    readonly reason?: string;
    apply(raw: number): number;
}

interface Block {
    sumLabel: number;
    weight: number;
    minScore: number;
    maxScore: number;
}

const PLATT_MAX_ITERATIONS = 100;
const PLATT_MIN_STEP = 1e-10;
const PLATT_GRADIENT_TOLERANCE = 1e-5;
const PLATT_RIDGE = 1e-12;

export function identityCalibration(reason: string): CalibrationMap {
    return {
        method: 'identity',
        calibrated: false,
        reason,
        apply: (raw) => clampUnit(raw),
    };
}

/**
 * Fits a non-decreasing map from raw scorer output to [0, 1]. Any reference
 * set the method cannot fit meaningfully yields the identity map, flagged as
 * uncalibrated.
 */
export function fitCalibration(
    points: readonly CalibrationPoint[],
    method: CalibrationMethod
): CalibrationMap {
    const usable = points.filter((p) => Number.isFinite(p.score));
    if (usable.length === 0) {
        return identityCalibration('no calibration reference set');
    }

    const positives = usable.filter((p) => p.label === 1).length;
    if (positives === 0 || positives === usable.length) {
        return identityCalibration('calibration reference set contains a single class');
    }

    const first = usable[0]?.score;
    if (usable.every((p) => p.score === first)) {
        return identityCalibration('calibration reference scores do not vary');
    }

    return method === 'platt' ? fitPlatt(usable, positives) : fitIsotonic(usable);
}

function fitIsotonic(points: readonly CalibrationPoint[]): CalibrationMap {
    const sorted = [...points].sort((a, b) => a.score - b.score);

    // Equal scores are pooled up front so they always share one output.
    const blocks: Block[] = [];
    for (const point of sorted) {
        const last = blocks[blocks.length - 1];
        if (last && last.maxScore === point.score) {
            last.sumLabel += point.label;
            last.weight += 1;
        } else {
            blocks.push({ sumLabel: point.label, weight: 1, minScore: point.score, maxScore: point.score });
        }

        while (blocks.length >= 2) {
            const right = blocks[blocks.length - 1];
            const left = blocks[blocks.length - 2];
            if (!right || !left || left.sumLabel / left.weight <= right.sumLabel / right.weight) break;
            left.sumLabel += right.sumLabel;
            left.weight += right.weight;
            left.maxScore = right.maxScore;
            blocks.pop();
        }
    }

    const centres = blocks.map((b) => (b.minScore + b.maxScore) / 2);
    const values = blocks.map((b) => clampUnit(b.sumLabel / b.weight));

    return {
        method: 'isotonic',
        calibrated: true,
        apply: (raw) => interpolate(centres, values, raw),
    };
}

function interpolate(xs: readonly number[], ys: readonly number[], x: number): number {
    const lastIndex = xs.length - 1;
    const firstX = xs[0] ?? 0;
    const lastX = xs[lastIndex] ?? 0;
    if (x <= firstX) return ys[0] ?? 0;
    if (x >= lastX) return ys[lastIndex] ?? 0;

    let hi = 1;
    while (hi < lastIndex && (xs[hi] ?? 0) < x) hi++;
    const x0 = xs[hi - 1] ?? 0;
    const x1 = xs[hi] ?? 0;
    const y0 = ys[hi - 1] ?? 0;
    const y1 = ys[hi] ?? 0;
    if (x === x1 || x1 === x0) return y1;
    return clampUnit(y0 + ((x - x0) / (x1 - x0)) * (y1 - y0));
}

function softplus(z: number): number {
    return Math.max(z, 0) + Math.log1p(Math.exp(-Math.abs(z)));
}

function sigmoid(z: number): number {
    if (z >= 0) return 1 / (1 + Math.exp(-z));
    const e = Math.exp(z);
    return e / (1 + e);
}

/**
 * Platt scaling, p = sigmoid(a * raw + b), fitted by Newton's method with
 * backtracking on Platt's smoothed targets.
 */
function fitPlatt(points: readonly CalibrationPoint[], positives: number): CalibrationMap {
    const negatives = points.length - positives;
    const hiTarget = (positives + 1) / (positives + 2);
    const loTarget = 1 / (negatives + 2);
    const targets = points.map((p) => (p.label === 1 ? hiTarget : loTarget));
    const xs = points.map((p) => p.score);

    const loss = (a: number, b: number): number => {
        let total = 0;
        for (let i = 0; i < xs.length; i++) {
            const z = a * (xs[i] ?? 0) + b;
            const t = targets[i] ?? 0;
            total += t * softplus(-z) + (1 - t) * softplus(z);
        }
        return total;
    };

    let a = 0;
    let b = Math.log((positives + 1) / (negatives + 1));
    let current = loss(a, b);

    for (let iteration = 0; iteration < PLATT_MAX_ITERATIONS; iteration++) {
        let ga = 0;
        let gb = 0;
        let haa = PLATT_RIDGE;
        let hab = 0;
        let hbb = PLATT_RIDGE;
        for (let i = 0; i < xs.length; i++) {
            const x = xs[i] ?? 0;
            const p = sigmoid(a * x + b);
            const residual = p - (targets[i] ?? 0);
            const w = p * (1 - p);
            ga += residual * x;
            gb += residual;
            haa += w * x * x;
            hab += w * x;
            hbb += w;
        }

        if (Math.abs(ga) < PLATT_GRADIENT_TOLERANCE && Math.abs(gb) < PLATT_GRADIENT_TOLERANCE) break;

        const det = haa * hbb - hab * hab;
        if (det <= 0) break;
        const da = -(hbb * ga - hab * gb) / det;
        const db = -(haa * gb - hab * ga) / det;

        let step = 1;
        let improved = false;
        while (step >= PLATT_MIN_STEP) {
            const candidate = loss(a + step * da, b + step * db);
            if (candidate < current) {
                a += step * da;
                b += step * db;
                current = candidate;
                improved = true;
                break;
            }
            step /= 2;
        }
        if (!improved) break;
    }

    if (!(a > 0) || !Number.isFinite(b)) {
        return identityCalibration('platt fit produced a non-increasing slope');
    }

    return {
        method: 'platt',
        calibrated: true,
        apply: (raw) => clampUnit(sigmoid(a * raw + b)),
    };
}

/**
 * Applies a map to a batch and enforces that a strictly lower raw score never
 * receives a strictly higher calibrated score, whatever the map does.
 */
export function calibrateBatch(map: CalibrationMap, raws: readonly number[]): number[] {
    const calibrated = raws.map((raw) => clampUnit(map.apply(raw)));
    const order = raws.map((_, i) => i).sort((i, j) => (raws[i] ?? 0) - (raws[j] ?? 0));

    let runningMax = 0;
    for (const index of order) {
        const value = Math.max(calibrated[index] ?? 0, runningMax);
        calibrated[index] = value;
        runningMax = value;
    }

    return calibrated;
}
