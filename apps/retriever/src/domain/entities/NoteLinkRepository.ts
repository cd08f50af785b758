import { Loaded } from './Loaded';
import { NoteLinkTable } from './NoteLinkTable';

export abstract class NoteLinkRepository {
    abstract load(path: string): Promise<Loaded<NoteLinkTable>>;
}
