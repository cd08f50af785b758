import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ZodType, ZodTypeDef } from 'zod';
import { InputSchemaError, StageIoError } from '../../domain/errors/AppError';
import logger from '../logger';

export interface JsonlReadResult<T> {
    records: T[];
    skipped: number;
}

export async function readText(path: string): Promise<string> {
    try {
        return await readFile(path, 'utf-8');
    } catch (error) {
        throw new StageIoError(
            `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }
}

export function parseJsonlLine<T>(
    line: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    source: string,
    lineNumber: number
): T {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch (error) {
        throw new InputSchemaError(
            `Line ${lineNumber} of ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            source,
            lineNumber
        );
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new InputSchemaError(`Line ${lineNumber} of ${source} failed validation: ${issues.join('; ')}`, source, lineNumber);
    }
    return parsed.data;
}

/**
 * Parses line-delimited JSON. Lines that fail to parse or validate are
 * skipped and counted; blank lines are ignored.
 */
export function parseJsonl<T>(
    text: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    source: string
): JsonlReadResult<T> {
    const records: T[] = [];
    let skipped = 0;

    text.split(/\r?\n/).forEach((line, index) => {
        if (line.trim() === '') return;
        try {
            records.push(parseJsonlLine(line, schema, source, index + 1));
        } catch (error) {
            if (!(error instanceof InputSchemaError)) throw error;
            skipped++;
            logger.warn('Skipping malformed input line', { source, line: error.line, reason: error.message });
        }
    });

    return { records, skipped };
}

export async function readJsonl<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>
): Promise<JsonlReadResult<T>> {
    return parseJsonl(await readText(path), schema, path);
}

export function serializeJsonl(records: readonly unknown[]): string {
    return records.map((record) => JSON.stringify(record) + '\n').join('');
}

export async function writeText(path: string, content: string): Promise<void> {
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, content, 'utf-8');
    } catch (error) {
        throw new StageIoError(
            `Cannot write ${path}: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }
}

export async function writeJsonl(path: string, records: readonly unknown[]): Promise<void> {
    await writeText(path, serializeJsonl(records));
}
