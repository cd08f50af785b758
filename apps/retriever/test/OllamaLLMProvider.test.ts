import { describe, it, expect, vi, beforeEach } from 'vitest';

const { invoke } = vi.hoisted(() => ({ invoke: vi.fn() }));

vi.mock('@langchain/ollama', () => ({
    ChatOllama: class {
        invoke = invoke;
    },
}));

import { OllamaLLMProvider, parseScore } from '../src/infrastructure/providers/OllamaLLMProvider';
import { LLMPairwiseScorer } from '../src/infrastructure/providers/LLMPairwiseScorer';
import { JudgeService } from '../src/application/services/JudgeService';
import { createRetrievalConfig } from '../src/application/config/retrievalConfig';
import { identityCalibration } from '../src/domain/services/Calibration';
import { ScorerFailure } from '../src/domain/errors/AppError';
import { corpusOf } from './helpers';

describe('OllamaLLMProvider', () => {
    beforeEach(() => {
        invoke.mockReset();
    });

    describe('parseScore', () => {
        it('should read the first number in the reply', () => {
            expect(parseScore('0.85')).toBe(0.85);
            expect(parseScore('Score: 0.4 (partially relevant)')).toBe(0.4);
        });

        it('should read a fraction without a leading zero', () => {
            expect(parseScore('.85')).toBe(0.85);
            expect(parseScore('Relevance: .5')).toBe(0.5);
        });

        it('should refuse scores outside [0, 1]', () => {
            expect(() => parseScore('7')).toThrow('Relevance score 7 is outside [0, 1] in "7"');
            expect(() => parseScore('-0.3')).toThrow('Relevance score -0.3 is outside [0, 1] in "-0.3"');
        });

        it('should refuse replies without a number', () => {
            expect(() => parseScore('highly relevant')).toThrow('Could not parse a relevance score from "highly relevant"');
        });
    });

    it('should score relevance through the chat model', async () => {
        invoke.mockResolvedValue({ content: ' 0.9\n' });
        const scorer = new LLMPairwiseScorer(new OllamaLLMProvider());

        expect(await scorer.score('chest pain', 'Patient reports chest pain.')).toBe(0.9);
        expect(invoke).toHaveBeenCalledTimes(1);
    });

    it('should surface an unparsable reply as an error', async () => {
        invoke.mockResolvedValue({ content: 'I cannot say' });
        const scorer = new LLMPairwiseScorer(new OllamaLLMProvider());

        await expect(scorer.score('chest pain', 'text')).rejects.toThrow('Could not parse a relevance score');
    });

    it('should surface an out-of-range reply as a Judge failure', async () => {
        invoke.mockResolvedValue({ content: '-0.3' });
        const judge = new JudgeService(new LLMPairwiseScorer(new OllamaLLMProvider()));

        const corpus = corpusOf(['c1', 'n1', 'Chest pain.']);

        const error = await judge
            .run('chest pain', [{ chunkId: 'c1' }], corpus, identityCalibration('none'), undefined, createRetrievalConfig())
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ScorerFailure);
        expect(error).toHaveProperty('stage', 'judge');
        expect(error).toHaveProperty('chunkId', 'c1');
    });
});
