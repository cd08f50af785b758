import { StageSummary } from '@clinical-funnel/types';

export interface StageOutcome<T> {
    results: T[];
    outputPath: string;
    summary: StageSummary;
}
