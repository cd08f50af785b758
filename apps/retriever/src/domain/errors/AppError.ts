export class AppError extends Error {
    constructor(
        message: string,
        public readonly exitCode: number = 1
    ) {
        super(message);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 2);
    }
}

export class StageIoError extends AppError {
    constructor(message: string, public readonly path?: string) {
        super(message, 3);
    }
}

/**
 * Raised by the record parsers for a single malformed line. Readers catch it,
 * skip the line and count it; it never aborts a run.
 */
export class InputSchemaError extends AppError {
    constructor(
        message: string,
        public readonly source: string,
        public readonly line: number
    ) {
        super(message, 3);
    }
}

export class ScorerFailure extends AppError {
    constructor(
        public readonly stage: string,
        public readonly processed: number,
        cause: unknown,
        public readonly chunkId?: string
    ) {
        super(
            `Stage ${stage} failed${chunkId ? ` scoring chunk ${chunkId}` : ''} after ${processed} candidates: ${
                cause instanceof Error ? cause.message : String(cause)
            }`,
            4
        );
    }
}

export class PipelineTimeoutError extends AppError {
    constructor(timeoutMs: number, stage: string) {
        super(`Pipeline run exceeded ${timeoutMs}ms during stage ${stage}`, 5);
    }
}
