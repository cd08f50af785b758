import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { main } from '../src/cli';
import { DefaultScoringFactory } from '../src/infrastructure/providers/DefaultScoringFactory';
import { PairwiseScorer } from '../src/application/providers/ScoringProvider';
import logger from '../src/infrastructure/logger';
import { createTempDir, removeTempDir, SAMPLE_CHUNKS, SAMPLE_LINKS, writeLines } from './helpers';

class OfflineJudgeFactory extends DefaultScoringFactory {
    createPairwiseScorer(): PairwiseScorer {
        return { score: async () => Promise.reject(new Error('judge offline')) };
    }
}

describe('clinical-funnel CLI', () => {
    let dir: string;
    let corpusPath: string;
    let linksPath: string;
    let lines: string[];

    const run = (argv: string[], scoring?: DefaultScoringFactory): Promise<number> =>
        main(argv, { stdout: (line) => lines.push(line), env: {}, scoring });

    beforeEach(async () => {
        dir = await createTempDir();
        corpusPath = await writeLines(join(dir, 'chunks.jsonl'), SAMPLE_CHUNKS);
        linksPath = await writeLines(join(dir, 'links.jsonl'), SAMPLE_LINKS);
        lines = [];
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    it('should run the whole funnel and print where the results are', async () => {
        const outDir = join(dir, 'out');

        const code = await run(['run', corpusPath, 'chest pain', outDir, '--links', linksPath]);

        expect(code).toBe(0);
        expect(lines).toHaveLength(1);
        const printed = JSON.parse(lines[0] ?? '{}');
        expect(printed.output).toBe(join(outDir, 'judge', 'final.jsonl'));
        expect(printed.calibrated).toBe(false);
        expect(printed.counts.judge).toBeGreaterThanOrEqual(6);

        const first = JSON.parse((await readFile(printed.output, 'utf-8')).split('\n')[0] ?? '{}');
        expect(first).toMatchObject({ chunk_id: 'c01', patient_uid: 'p-100' });
    });

    it('should chain single-stage commands through their output files', async () => {
        const scoutDir = join(dir, 'scout');
        const inspectDir = join(dir, 'inspect');
        const judgeDir = join(dir, 'judge');

        expect(await run(['scout', corpusPath, 'knee pain', scoutDir])).toBe(0);
        expect(await run(['inspect', join(scoutDir, 'candidates.jsonl'), corpusPath, inspectDir])).toBe(0);
        expect(
            await run([
                'judge',
                join(inspectDir, 'rescored.jsonl'),
                corpusPath,
                judgeDir,
                '--links',
                linksPath,
                '--query',
                'knee pain',
            ])
        ).toBe(0);

        const final = (await readFile(join(judgeDir, 'final.jsonl'), 'utf-8')).split('\n');
        expect(JSON.parse(final[0] ?? '{}')).toMatchObject({
            chunk_id: 'c06',
            patient_uid: 'p-300',
            pointer: { source_note_id: 'n3', offset: 60 },
        });
    });

    it('should print usage without a command', async () => {
        expect(await run([])).toBe(0);
        expect(lines[0]).toContain('Usage: clinical-funnel <command> [options]');
    });

    it('should exit with 2 on configuration errors', async () => {
        expect(await run(['rank', corpusPath])).toBe(2);
        expect(await run(['scout', corpusPath])).toBe(2);
        expect(await run(['run', corpusPath, 'q', dir, '--timeout-ms', 'soon'])).toBe(2);
        expect(await run(['scout', corpusPath, 'q', dir, '--unknown-flag'])).toBe(2);
        expect(
            await main(['scout', corpusPath, 'q', dir], { stdout: () => undefined, env: { RETRIEVAL_K_A: '5' } })
        ).toBe(2);
    });

    it('should exit with 3 when an input cannot be read', async () => {
        expect(await run(['scout', join(dir, 'missing.jsonl'), 'q', join(dir, 'out')])).toBe(3);
        expect(logger.error).toHaveBeenCalledWith(
            expect.stringContaining('Cannot access'),
            expect.objectContaining({ error: 'StageIoError', exitCode: 3 })
        );
    });

    it('should exit with 4 when a scorer fails', async () => {
        const code = await run(['run', corpusPath, 'chest pain', join(dir, 'out')], new OfflineJudgeFactory());

        expect(code).toBe(4);
        expect(logger.error).toHaveBeenCalledWith(
            expect.stringMatching(/^Stage judge failed scoring chunk .+ after 0 candidates: judge offline$/),
            expect.objectContaining({ error: 'ScorerFailure', exitCode: 4 })
        );
    });
});
