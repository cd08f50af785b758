import { mkdtemp, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { Chunk } from '../src/domain/entities/Chunk';
import { ChunkCorpus } from '../src/domain/entities/ChunkCorpus';

export function corpusOf(...chunks: Array<[id: string, noteId: string, text: string, offset?: number]>): ChunkCorpus {
    return new ChunkCorpus(chunks.map(([id, noteId, text, offset]) => new Chunk(id, noteId, text, offset ?? 0)));
}

export async function createTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'clinical-funnel-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export async function writeLines(path: string, lines: readonly (string | object)[]): Promise<string> {
    await mkdir(dirname(path), { recursive: true });
    const body = lines.map((line) => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n');
    await writeFile(path, body + '\n', 'utf-8');
    return path;
}

export const SAMPLE_CHUNKS = [
    { chunk_id: 'c01', source_note_id: 'n1', text: 'Patient reports chest pain radiating to the left arm since morning.', offset: 0 },
    { chunk_id: 'c02', source_note_id: 'n1', text: 'ECG shows ST elevation; chest pain persists despite nitroglycerin.', offset: 68 },
    { chunk_id: 'c03', source_note_id: 'n2', text: 'No chest pain reported. Mild cough and low grade fever.', offset: 0 },
    { chunk_id: 'c04', source_note_id: 'n2', text: 'Follow up for diabetes management, metformin dose adjusted.', offset: 56 },
    { chunk_id: 'c05', source_note_id: 'n3', text: 'Shortness of breath on exertion, chest tightness at night.', offset: 0 },
    { chunk_id: 'c06', source_note_id: 'n3', text: 'Knee pain after a fall, ice and rest advised.', offset: 60 },
    { chunk_id: 'c07', source_note_id: 'n4', text: 'Pain in chest wall reproducible on palpation, likely musculoskeletal.', offset: 0 },
    { chunk_id: 'c08', source_note_id: 'n5', text: 'Routine vaccination visit, no complaints.', offset: 0 },
];

export const SAMPLE_LINKS = [
    { note_uid: 'n1', patient_uid: 'p-100' },
    { note_uid: 'n2', patient_uid: 'p-200' },
    { note_uid: 'n3', patient_uid: 'p-300' },
];
