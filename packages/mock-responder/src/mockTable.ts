/**
 * @file mockTable.ts
 * @description Loads the static dataref table the mock responder answers from.
 * @module DataRefBridge/MockResponder
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError, DataRefName, DataRefType, DataRefValue, extractErrorInfo } from '@datarefbridge/shared';

const valueSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal(DataRefType.Int), value: z.number().int() }),
    z.object({ type: z.literal(DataRefType.Float), value: z.number() }),
    z.object({ type: z.literal(DataRefType.IntArray), value: z.array(z.number().int()) }),
    z.object({ type: z.literal(DataRefType.FloatArray), value: z.array(z.number()) }),
]);

const tableSchema = z.record(z.string().min(1), valueSchema);

/**
 * Validates a parsed table object: dataref name to `{ type, value }`.
 * @throws ConfigError listing every invalid entry.
 */
export function parseMockTable(raw: unknown): Map<DataRefName, DataRefValue> {
    const result = tableSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError('Invalid mock table', issues);
    }
    return new Map(Object.entries(result.data));
}

/**
 * Reads and validates a JSON table file.
 * @throws ConfigError
 */
export async function loadMockTable(path: string): Promise<Map<DataRefName, DataRefValue>> {
    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(path, 'utf8'));
    } catch (error) {
        throw new ConfigError(`Cannot load mock table ${path}: ${extractErrorInfo(error).message}`);
    }
    return parseMockTable(raw);
}
