import { calibrationPointSchema } from '@clinical-funnel/types';
import { CalibrationRepository } from '../../domain/entities/CalibrationRepository';
import { CalibrationPoint } from '../../domain/services/Calibration';
import { Loaded } from '../../domain/entities/Loaded';
import { readJsonl } from '../io/jsonl';

export class JsonlCalibrationRepository extends CalibrationRepository {
    async load(path: string): Promise<Loaded<CalibrationPoint[]>> {
        const { records, skipped } = await readJsonl(path, calibrationPointSchema);
        return { value: records, skipped };
    }
}
