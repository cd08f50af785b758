import 'dotenv/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { VectorProvider } from '../../application/providers/VectorProvider';
import logger from '../logger';

export interface OllamaEmbeddingOptions {
    model?: string;
    baseUrl?: string;
}

/**
 * Dense backend served by a local Ollama embedding model. Chunk and query
 * vectors must come from the same model for the dense index to accept them.
 */
export class OllamaVectorProvider implements VectorProvider {
    private readonly embeddings: OllamaEmbeddings;
    readonly model: string;

    constructor(options: OllamaEmbeddingOptions = {}) {
        this.model = options.model || process.env.OLLAMA_EMBEDDING_MODEL || 'nomic-embed-text';
        this.embeddings = new OllamaEmbeddings({
            model: this.model,
            baseUrl: options.baseUrl || process.env.OLLAMA_BASE_URL || 'http://127.0.0.1:11434',
        });
    }

    async generateEmbedding(text: string): Promise<number[]> {
        const vector = await this.embeddings.embedQuery(text);

        if (vector.length === 0 || !vector.every((value) => Number.isFinite(value))) {
            throw new Error(`Embedding model ${this.model} returned an unusable vector for "${text.substring(0, 50)}"`);
        }

        logger.debug('generateEmbedding completed', { model: this.model, dimensions: vector.length });
        return vector;
    }
}
