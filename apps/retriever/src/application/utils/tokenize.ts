import stopwordList from '../../../data/stopwords.json';

const WORD_RE = /[\p{L}\p{N}_]+/gu;

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export interface Token {
    text: string;
    /** Index of the word in the full token stream, stopwords included. */
    position: number;
}

export function isStopword(word: string): boolean {
    return STOPWORDS.has(word);
}

export function tokenizeWithPositions(input: string): Token[] {
    const normalized = input.normalize('NFKC').toLowerCase();
    const words = normalized.match(WORD_RE) ?? [];

    const tokens: Token[] = [];
    words.forEach((word, position) => {
        if (!STOPWORDS.has(word)) {
            tokens.push({ text: word, position });
        }
    });
    return tokens;
}

export function tokenize(input: string): string[] {
    return tokenizeWithPositions(input).map((token) => token.text);
}

/** Distinct tokens in first-seen order. */
export function uniqueTokens(tokens: readonly string[]): string[] {
    return Array.from(new Set(tokens));
}
