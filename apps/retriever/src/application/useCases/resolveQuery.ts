import { dirname } from 'path';
import { StageRepository } from '../../domain/entities/StageRepository';
import { ConfigurationError } from '../../domain/errors/AppError';

/**
 * An explicit query wins; otherwise the query recorded in summary.json next to
 * the stage input is reused.
 */
export async function resolveQuery(
    stageRepository: StageRepository,
    explicit: string | undefined,
    inputPath: string
): Promise<string> {
    if (explicit !== undefined) return explicit;

    const summary = await stageRepository.readSummary(dirname(inputPath));
    if (!summary) {
        throw new ConfigurationError(
            `No query given and no summary.json found beside ${inputPath}; pass --query`
        );
    }
    return summary.query;
}
