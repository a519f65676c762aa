/**
 * @file cliLogger.ts
 * @description Implements the ILoggerOutput interface for the command-line client,
 * keeping stdout free for dataref values.
 * @module DataRefBridge/Client
 */

import { ILoggerOutput, LogLevel } from '@datarefbridge/shared';

/**
 * Minimal writable stream contract, so tests can capture output.
 */
export interface LineSink {
    write(chunk: string): unknown;
}

/**
 * An ILoggerOutput implementation that writes every log line to stderr.
 */
export class StderrLoggerOutput implements ILoggerOutput {
    constructor(private readonly sink: LineSink = process.stderr) {}

    public log(_level: LogLevel, message: string): void {
        this.sink.write(`${message}\n`);
    }
}
