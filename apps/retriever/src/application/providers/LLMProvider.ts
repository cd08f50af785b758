export interface LLMProvider {
    scoreRelevance(query: string, document: string): Promise<number>;
}
