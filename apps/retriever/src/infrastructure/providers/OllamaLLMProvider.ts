import 'dotenv/config';
import { ChatOllama } from '@langchain/ollama';
import { HumanMessage } from '@langchain/core/messages';
import { LLMProvider } from '../../application/providers/LLMProvider';
import logger from '../logger';

export class OllamaLLMProvider implements LLMProvider {
    private model: ChatOllama;

    constructor() {
        this.model = new ChatOllama({
            model: process.env.OLLAMA_MODEL || "phi3:mini",
            baseUrl: process.env.OLLAMA_BASE_URL || "http://127.0.0.1:11434",
            temperature: 0,
        });
    }

    async scoreRelevance(query: string, document: string): Promise<number> {
        const prompt = `You are a clinical relevance assessor. Rate how relevant the following excerpt of a clinical note is to the search query.

Query: ${query}

Excerpt: ${document}

Give a relevance score between 0 and 1, where:
- 0 = completely irrelevant
- 0.5 = partially relevant
- 1 = highly relevant and directly answers the query

Reply ONLY with a decimal number between 0 and 1, with no other text.`;

        const response = await this.model.invoke([new HumanMessage(prompt)]);
        const content = typeof response.content === 'string' ? response.content : JSON.stringify(response.content);
        const score = parseScore(content);

        logger.debug('scoreRelevance completed', { query: query.substring(0, 50), score });
        return score;
    }
}

/**
 * Pulls the first number out of a model reply. A reply without a number, or
 * with one outside [0, 1], is an error: the caller must not invent a score.
 */
export function parseScore(response: string): number {
    const cleaned = response.trim();
    const numberMatch = cleaned.match(/-?(?:\d+(?:\.\d*)?|\.\d+)/);

    if (!numberMatch) {
        throw new Error(`Could not parse a relevance score from "${cleaned.substring(0, 80)}"`);
    }

    const score = parseFloat(numberMatch[0]);
    if (isNaN(score)) {
        throw new Error(`Parsed relevance score is NaN for "${cleaned.substring(0, 80)}"`);
    }

    if (score < 0 || score > 1) {
        throw new Error(`Relevance score ${score} is outside [0, 1] in "${cleaned.substring(0, 80)}"`);
    }

    return score;
}
