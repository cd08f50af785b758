import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { Stats } from 'fs';
import { chunkRecordSchema, denseVectorSchema } from '@clinical-funnel/types';
import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';
import { Chunk } from '../../domain/entities/Chunk';
import { Loaded } from '../../domain/entities/Loaded';
import { StageIoError } from '../../domain/errors/AppError';
import { readJsonl } from '../io/jsonl';
import logger from '../logger';

const CORPUS_FILE = 'chunks.jsonl';
const VECTORS_FILE = 'vectors.jsonl';

async function statPath(path: string): Promise<Stats> {
    try {
        return await stat(path);
    } catch (error) {
        throw new StageIoError(
            `Cannot access ${path}: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }
}

async function findFiles(dir: string, fileName: string): Promise<string[]> {
    const found: string[] = [];
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
            found.push(...(await findFiles(full, fileName)));
        } else if (entry.isFile() && entry.name === fileName) {
            found.push(full);
        }
    }
    return found;
}

export class JsonlChunkRepository extends ChunkRepository {
    async loadCorpus(path: string): Promise<Loaded<ChunkCorpus>> {
        const info = await statPath(path);
        const files = info.isDirectory() ? await findFiles(path, CORPUS_FILE) : [path];
        if (files.length === 0) {
            throw new StageIoError(`No ${CORPUS_FILE} found under ${path}`, path);
        }

        const chunks: Chunk[] = [];
        const seen = new Set<string>();
        let skipped = 0;

        for (const file of files) {
            const result = await readJsonl(file, chunkRecordSchema);
            skipped += result.skipped;

            for (const record of result.records) {
                if (seen.has(record.chunk_id)) {
                    skipped++;
                    logger.warn('Skipping duplicate chunk id', { source: file, chunkId: record.chunk_id });
                    continue;
                }
                seen.add(record.chunk_id);
                chunks.push(new Chunk(record.chunk_id, record.source_note_id, record.text, record.offset));
            }
        }

        logger.info('Corpus loaded', { path, files: files.length, chunks: chunks.length, skipped });
        return { value: new ChunkCorpus(chunks), skipped };
    }

    async loadDenseVectors(indexPath: string): Promise<Loaded<Map<string, number[]>>> {
        const info = await statPath(indexPath);
        const file = info.isDirectory() ? join(indexPath, VECTORS_FILE) : indexPath;

        if (info.isDirectory()) {
            const vectorsExist = await stat(file).then(
                (s) => s.isFile(),
                () => false
            );
            if (!vectorsExist) {
                logger.info('Dense index has no precomputed vectors, embedding corpus', { indexPath });
                return { value: new Map(), skipped: 0 };
            }
        }

        const result = await readJsonl(file, denseVectorSchema);
        const vectors = new Map<string, number[]>();
        for (const record of result.records) {
            if (!vectors.has(record.chunk_id)) {
                vectors.set(record.chunk_id, record.vector);
            }
        }
        return { value: vectors, skipped: result.skipped };
    }
}
