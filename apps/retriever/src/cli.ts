import { parseArgs } from 'util';
import { Core } from './infrastructure/Core';
import { loadRetrievalConfig, RetrievalConfig } from './application/config/retrievalConfig';
import { ScoringProviderFactory } from './application/providers/ScoringProviderFactory';
import { RunScout } from './application/useCases/RunScout';
import { RunInspect } from './application/useCases/RunInspect';
import { RunJudge } from './application/useCases/RunJudge';
import { RunPipeline } from './application/useCases/RunPipeline';
import { AppError, ConfigurationError } from './domain/errors/AppError';
import logger from './infrastructure/logger';

const USAGE = `Usage: clinical-funnel <command> [options]

Commands:
  scout   <chunks> <query> <outDir> [--dense-index <dir>]
  inspect <candidates.jsonl> <chunks> <outDir> [--query <q>]
  judge   <rescored.jsonl> <chunks> <outDir> [--query <q>] [--links <file>] [--calibration <file>]
  run     <chunks> <query> <outDir> [--dense-index <dir>] [--links <file>] [--calibration <file>] [--timeout-ms <n>]

Every command accepts --config <file>.`;

const OPTIONS = {
    config: { type: 'string' },
    'dense-index': { type: 'string' },
    query: { type: 'string' },
    links: { type: 'string' },
    calibration: { type: 'string' },
    'timeout-ms': { type: 'string' },
    help: { type: 'boolean', short: 'h' },
} as const;

export interface CliIo {
    stdout: (line: string) => void;
    env?: NodeJS.ProcessEnv;
    /** Overrides the scoring backends, used by tests. */
    scoring?: ScoringProviderFactory;
}

function positionals(values: readonly string[], names: readonly string[], command: string): string[] {
    if (values.length !== names.length) {
        throw new ConfigurationError(
            `${command} expects ${names.length} arguments (${names.join(', ')}), got ${values.length}`
        );
    }
    return [...values];
}

function parseTimeout(raw: string | undefined): number | undefined {
    if (raw === undefined) return undefined;
    const timeoutMs = Number(raw);
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
        throw new ConfigurationError(`--timeout-ms must be a positive integer, got "${raw}"`);
    }
    return timeoutMs;
}

async function dispatch(argv: readonly string[], io: CliIo): Promise<void> {
    const { values, positionals: args } = parseArgs({
        args: [...argv],
        options: OPTIONS,
        allowPositionals: true,
        strict: true,
    });

    const [command, ...rest] = args;
    if (values.help || command === undefined) {
        io.stdout(USAGE);
        return;
    }

    const config: RetrievalConfig = loadRetrievalConfig({ configPath: values.config, env: io.env });
    const core = new Core(config, io.scoring);

    switch (command) {
        case 'scout': {
            const [corpusPath = '', query = '', outDir = ''] = positionals(rest, ['chunks', 'query', 'outDir'], command);
            const outcome = await core.getUseCase(RunScout).execute({
                corpusPath,
                query,
                outDir,
                denseIndexPath: values['dense-index'],
            });
            io.stdout(JSON.stringify({ output: outcome.outputPath, count: outcome.summary.outputCount }));
            return;
        }
        case 'inspect': {
            const [candidatesPath = '', corpusPath = '', outDir = ''] = positionals(
                rest,
                ['candidates', 'chunks', 'outDir'],
                command
            );
            const outcome = await core.getUseCase(RunInspect).execute({
                candidatesPath,
                corpusPath,
                outDir,
                query: values.query,
            });
            io.stdout(JSON.stringify({ output: outcome.outputPath, count: outcome.summary.outputCount }));
            return;
        }
        case 'judge': {
            const [rescoredPath = '', corpusPath = '', outDir = ''] = positionals(
                rest,
                ['rescored', 'chunks', 'outDir'],
                command
            );
            const outcome = await core.getUseCase(RunJudge).execute({
                rescoredPath,
                corpusPath,
                outDir,
                query: values.query,
                linksPath: values.links,
                calibrationPath: values.calibration,
            });
            io.stdout(
                JSON.stringify({
                    output: outcome.outputPath,
                    count: outcome.summary.outputCount,
                    calibrated: outcome.summary.calibrated,
                })
            );
            return;
        }
        case 'run': {
            const [corpusPath = '', query = '', outDir = ''] = positionals(rest, ['chunks', 'query', 'outDir'], command);
            const outcome = await core.getUseCase(RunPipeline).execute({
                corpusPath,
                query,
                outDir,
                denseIndexPath: values['dense-index'],
                linksPath: values.links,
                calibrationPath: values.calibration,
                timeoutMs: parseTimeout(values['timeout-ms']),
            });
            io.stdout(
                JSON.stringify({
                    output: outcome.judge.outputPath,
                    counts: {
                        scout: outcome.scout.summary.outputCount,
                        inspect: outcome.inspect.summary.outputCount,
                        judge: outcome.judge.summary.outputCount,
                    },
                    calibrated: outcome.judge.summary.calibrated,
                })
            );
            return;
        }
        default:
            throw new ConfigurationError(`Unknown command "${command}"\n\n${USAGE}`);
    }
}

/**
 * Runs one CLI invocation and resolves to the process exit code.
 */
export async function main(argv: readonly string[], io: CliIo = { stdout: (line) => console.log(line) }): Promise<number> {
    try {
        await dispatch(argv, io);
        return 0;
    } catch (error) {
        if (error instanceof AppError) {
            logger.error(error.message, { error: error.name, exitCode: error.exitCode });
            return error.exitCode;
        }
        if (error instanceof Error && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS')) {
            logger.error(error.message, { error: 'ArgumentError', exitCode: 2 });
            return 2;
        }
        logger.error('Unexpected failure', { error });
        return 1;
    }
}
