import { noteLinkSchema } from '@clinical-funnel/types';
import { NoteLinkRepository } from '../../domain/entities/NoteLinkRepository';
import { NoteLinkTable } from '../../domain/entities/NoteLinkTable';
import { Loaded } from '../../domain/entities/Loaded';
import { readJsonl } from '../io/jsonl';

export class JsonlNoteLinkRepository extends NoteLinkRepository {
    async load(path: string): Promise<Loaded<NoteLinkTable>> {
        const { records, skipped } = await readJsonl(path, noteLinkSchema);
        const table = new NoteLinkTable(
            records.map((record) => ({ noteUid: record.note_uid, patientUid: record.patient_uid }))
        );
        return { value: table, skipped };
    }
}
