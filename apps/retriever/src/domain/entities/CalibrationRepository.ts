import { CalibrationPoint } from '../services/Calibration';
import { Loaded } from './Loaded';

export abstract class CalibrationRepository {
    abstract load(path: string): Promise<Loaded<CalibrationPoint[]>>;
}
