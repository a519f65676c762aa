#!/usr/bin/env node
/**
 * @file main.ts
 * @description Runs the mock responder. Usage: `datarefbridge-mock [table.json] [port]`
 * @module DataRefBridge/MockResponder
 */

import * as path from 'path';
import { ConsoleLoggerOutput, DEFAULT_RESPONDER_PORT, extractErrorInfo, Logger } from '@datarefbridge/shared';
import { loadMockTable } from './mockTable';
import { MockResponder } from './MockResponder';

const logger = new Logger('Main');

export const DEFAULT_TABLE_PATH = path.join(__dirname, '..', 'config', 'mock-datarefs.json');

async function main(): Promise<void> {
    Logger.setOutput(new ConsoleLoggerOutput());

    const tablePath = process.argv[2] ?? DEFAULT_TABLE_PATH;
    const port = Number(process.argv[3] ?? DEFAULT_RESPONDER_PORT);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`Invalid port: ${process.argv[3]}`);
    }

    const table = await loadMockTable(tablePath);
    logger.info(`Loaded ${table.size} dataref(s) from ${tablePath}.`);

    const responder = new MockResponder(table);
    await responder.start(port);

    const shutdown = () => {
        responder.stop().then(() => process.exit(0), (error: unknown) => {
            logger.error('Shutdown failed:', error);
            process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error(`Fatal: ${extractErrorInfo(error).message}`);
        process.exit(1);
    });
}
