import { Chunk } from './Chunk';
import { StageIoError } from '../errors/AppError';

/**
 * Read-only view over the canonical chunks of one corpus snapshot.
 */
export class ChunkCorpus {
    private readonly byId: ReadonlyMap<string, Chunk>;

    constructor(chunks: Iterable<Chunk>) {
        const byId = new Map<string, Chunk>();
        for (const chunk of chunks) {
            if (!byId.has(chunk.id)) {
                byId.set(chunk.id, chunk);
            }
        }
        this.byId = byId;
    }

    get size(): number {
        return this.byId.size;
    }

    get(chunkId: string): Chunk | undefined {
        return this.byId.get(chunkId);
    }

    require(chunkId: string): Chunk {
        const chunk = this.byId.get(chunkId);
        if (!chunk) {
            throw new StageIoError(`Chunk ${chunkId} is not present in the corpus`);
        }
        return chunk;
    }

    /** Chunks in ascending id order, so index construction never depends on file order. */
    all(): Chunk[] {
        return Array.from(this.byId.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }
}
