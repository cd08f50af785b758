import { LexicalIndex, ScoredHit } from '../../application/providers/ScoringProvider';
import { tokenize, uniqueTokens } from '../../application/utils/tokenize';
import { compareChunkIds } from '../../domain/services/ScoreFusion';
import { ChunkCorpus } from '../../domain/entities/ChunkCorpus';

export interface Bm25Document {
    chunkId: string;
    tokens: string[];
}

export interface Bm25Parameters {
    k1: number;
    b: number;
}

export class Bm25LexicalIndex implements LexicalIndex {
    private readonly termFreqByDoc = new Map<string, Map<string, number>>();
    private readonly docFreq = new Map<string, number>();
    private readonly docLength = new Map<string, number>();
    private readonly avgDocLength: number;

    constructor(
        private readonly documents: readonly Bm25Document[],
        private readonly params: Bm25Parameters
    ) {
        let totalLength = 0;
        for (const doc of documents) {
            const freq = new Map<string, number>();
            for (const token of doc.tokens) {
                freq.set(token, (freq.get(token) ?? 0) + 1);
            }
            this.termFreqByDoc.set(doc.chunkId, freq);
            this.docLength.set(doc.chunkId, doc.tokens.length);
            totalLength += doc.tokens.length;

            for (const token of new Set(doc.tokens)) {
                this.docFreq.set(token, (this.docFreq.get(token) ?? 0) + 1);
            }
        }

        this.avgDocLength = documents.length > 0 ? totalLength / documents.length : 0;
    }

    static fromCorpus(corpus: ChunkCorpus, params: Bm25Parameters): Bm25LexicalIndex {
        const documents = corpus.all().map((chunk) => ({ chunkId: chunk.id, tokens: tokenize(chunk.text) }));
        return new Bm25LexicalIndex(documents, params);
    }

    idf(token: string): number {
        const totalDocs = this.documents.length;
        if (totalDocs === 0) return 0;
        const df = this.docFreq.get(token) ?? 0;
        return Math.log(1 + (totalDocs - df + 0.5) / (df + 0.5));
    }

    scoreDocument(chunkId: string, queryTokens: readonly string[]): number {
        const tf = this.termFreqByDoc.get(chunkId);
        const length = this.docLength.get(chunkId) ?? 0;
        if (!tf || length === 0) return 0;

        const { k1, b } = this.params;
        let score = 0;
        for (const token of queryTokens) {
            const freq = tf.get(token) ?? 0;
            if (freq <= 0) continue;

            const numerator = freq * (k1 + 1);
            const denominator = freq + k1 * (1 - b + b * (length / Math.max(this.avgDocLength, 1e-9)));
            score += this.idf(token) * (numerator / denominator);
        }
        return score;
    }

    async search(query: string, limit: number): Promise<ScoredHit[]> {
        const queryTokens = uniqueTokens(tokenize(query));
        if (queryTokens.length === 0) return [];

        const hits: ScoredHit[] = [];
        for (const doc of this.documents) {
            const score = this.scoreDocument(doc.chunkId, queryTokens);
            if (score > 0) {
                hits.push({ chunkId: doc.chunkId, score });
            }
        }

        return hits
            .sort((a, b) => b.score - a.score || compareChunkIds(a.chunkId, b.chunkId))
            .slice(0, limit);
    }
}
