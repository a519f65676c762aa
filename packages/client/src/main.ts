#!/usr/bin/env node
/**
 * @file main.ts
 * @description Command-line entry point: polls the configured datarefs and prints one line per value.
 *
 * Usage: `datarefbridge-poll [config.json]`
 * @module DataRefBridge/Client
 */

import { extractErrorInfo, Logger, parseLogLevel } from '@datarefbridge/shared';
import { loadConfig } from './config';
import { StderrLoggerOutput, LineSink } from './cliLogger';
import { DataRefClient } from './core/services/DataRefClient';
import { DataRefPoller } from './core/services/DataRefPoller';
import { formatPollLine } from './formatters';

const logger = new Logger('Main');

/**
 * A running poll session.
 */
export interface PollSession {
    client: DataRefClient;
    poller: DataRefPoller;
    stop(): Promise<void>;
}

/**
 * Loads configuration, connects and starts polling, printing results to `out`.
 * @param configPath Optional JSON configuration file.
 */
export async function startPolling(
    configPath: string | undefined,
    env: NodeJS.ProcessEnv,
    out: LineSink
): Promise<PollSession> {
    const config = await loadConfig(configPath, env);
    Logger.setLevel(parseLogLevel(config.logLevel));

    logger.info(`Connecting to ${config.host}:${config.port} (${config.mode}).`);
    const client = await DataRefClient.connect({
        host: config.host,
        port: config.port,
        readTimeoutMs: config.readTimeoutMs,
        mode: config.mode,
    });

    const poller = new DataRefPoller(client, config.datarefs, config.pollIntervalMs);
    poller.onResult(results => {
        for (const { subscription, result } of results) {
            out.write(`${formatPollLine(subscription, result)}\n`);
        }
    });
    poller.start();

    return {
        client,
        poller,
        async stop() {
            await poller.stop();
            await client.close();
        },
    };
}

async function main(): Promise<void> {
    Logger.setOutput(new StderrLoggerOutput());

    const session = await startPolling(process.argv[2], process.env, process.stdout);

    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) {
            return;
        }
        stopping = true;
        logger.info(`Received ${signal}, shutting down.`);
        session.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error('Shutdown failed:', error);
                process.exit(1);
            }
        );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error(`Fatal: ${extractErrorInfo(error).message}`);
        process.exit(1);
    });
}
