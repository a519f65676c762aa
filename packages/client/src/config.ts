/**
 * @file config.ts
 * @description Loads and validates the polling client's configuration from a JSON file and the environment.
 * @module DataRefBridge/Client
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import {
    ConfigError,
    DATAREF_TYPES,
    DataRefSubscription,
    DEFAULT_RESPONDER_PORT,
    extractErrorInfo,
    FIELD_SEPARATOR,
    isDataRefType,
    LOG_LEVEL_NAMES,
    LogLevelName,
} from '@datarefbridge/shared';
import { ClientMode } from './core/services/DataRefClient';

const subscriptionSchema = z.object({
    name: z.string()
        .min(1)
        .refine(name => !name.includes(FIELD_SEPARATOR), { message: `must not contain '${FIELD_SEPARATOR}'` }),
    type: z.string().refine(isDataRefType, { message: `must be one of ${DATAREF_TYPES.join(', ')}` }),
    label: z.string().min(1).optional(),
});

const configSchema = z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_RESPONDER_PORT),
    readTimeoutMs: z.coerce.number().int().positive().default(3000),
    pollIntervalMs: z.coerce.number().int().positive().default(3000),
    mode: z.enum(['receive-loop', 'per-call']).default('receive-loop'),
    logLevel: z.enum(LOG_LEVEL_NAMES).default('INFO'),
    datarefs: z.array(subscriptionSchema).min(1).default([
        { name: 'sim/cockpit2/controls/parking_brake_ratio', type: 'float', label: 'Parking Brake Ratio' },
    ]),
}).strict();

/**
 * Validated client configuration.
 */
export interface ClientConfig {
    host: string;
    port: number;
    readTimeoutMs: number;
    pollIntervalMs: number;
    mode: ClientMode;
    logLevel: LogLevelName;
    datarefs: DataRefSubscription[];
}

/** Environment variables that override file settings. */
export const ENV_OVERRIDES = {
    DATAREF_HOST: 'host',
    DATAREF_PORT: 'port',
    DATAREF_READ_TIMEOUT_MS: 'readTimeoutMs',
    DATAREF_POLL_INTERVAL_MS: 'pollIntervalMs',
    DATAREF_MODE: 'mode',
    DATAREF_LOG_LEVEL: 'logLevel',
} as const;

function applyEnvironment(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const merged = { ...raw };
    for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
        const value = env[variable];
        if (value !== undefined && value !== '') {
            merged[key] = value;
        }
    }
    return merged;
}

/**
 * Validates an already parsed configuration object, after applying environment overrides.
 * @throws ConfigError listing every invalid setting.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): ClientConfig {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigError('Configuration must be a JSON object');
    }
    const result = configSchema.safeParse(applyEnvironment({ ...raw }, env));
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError('Invalid configuration', issues);
    }
    return result.data;
}

/**
 * Loads the configuration file, if given, and applies environment overrides and defaults.
 * @param path Path of a JSON configuration file; omit to use defaults and the environment only.
 * @throws ConfigError when the file cannot be read, is not JSON, or does not validate.
 */
export async function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): Promise<ClientConfig> {
    if (!path) {
        return parseConfig({}, env);
    }

    let text: string;
    try {
        text = await fs.readFile(path, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read configuration file ${path}: ${extractErrorInfo(error).message}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Configuration file ${path} is not valid JSON: ${extractErrorInfo(error).message}`);
    }
    return parseConfig(raw, env);
}
