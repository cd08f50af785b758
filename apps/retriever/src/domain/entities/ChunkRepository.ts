import { ChunkCorpus } from './ChunkCorpus';
import { Loaded } from './Loaded';

export abstract class ChunkRepository {
    /** A single JSONL file, or a directory searched recursively for chunks.jsonl. */
    abstract loadCorpus(path: string): Promise<Loaded<ChunkCorpus>>;
    /** Precomputed chunk vectors of a dense index directory, if it has any. */
    abstract loadDenseVectors(indexPath: string): Promise<Loaded<Map<string, number[]>>>;
}
