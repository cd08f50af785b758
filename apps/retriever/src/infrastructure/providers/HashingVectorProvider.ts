import { VectorProvider } from '../../application/providers/VectorProvider';
import { tokenize } from '../../application/utils/tokenize';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
    let hash = FNV_OFFSET;
    for (let i = 0; i < text.length; i++) {
        hash ^= text.charCodeAt(i);
        hash = Math.imul(hash, FNV_PRIME) >>> 0;
    }
    return hash >>> 0;
}

/**
 * Deterministic in-process embedder: hashed unigram and character-trigram
 * counts, L2 normalized. Needs no model server, so it is the default dense
 * backend and the one the tests rely on.
 */
export class HashingVectorProvider implements VectorProvider {
    constructor(private readonly dimensions: number = 256) {}

    async generateEmbedding(text: string): Promise<number[]> {
        return this.embed(text);
    }

    embed(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);

        for (const token of tokenize(text)) {
            vector[fnv1a(`w:${token}`) % this.dimensions] += 1;

            const padded = `#${token}#`;
            for (let i = 0; i + 3 <= padded.length; i++) {
                vector[fnv1a(`g:${padded.slice(i, i + 3)}`) % this.dimensions] += 0.5;
            }
        }

        const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
        return norm === 0 ? vector : vector.map((value) => value / norm);
    }
}
