/**
 * @file DataRefPoller.ts
 * @description Periodically reads a watch list of datarefs and reports every outcome.
 * @module DataRefBridge/Client
 */

import { DataRefSubscription, DataRefValue, Logger } from '@datarefbridge/shared';
import { ReadResult } from './DataRefClient';

/**
 * The part of the client the poller needs.
 */
export interface DataRefReader {
    read(name: string, type: DataRefSubscription['type']): Promise<ReadResult<DataRefValue>>;
}

export interface PollResult {
    subscription: DataRefSubscription;
    result: ReadResult<DataRefValue>;
}

export type PollListener = (results: PollResult[]) => void;

/**
 * Reads every watched dataref once per interval. Reads within a tick run concurrently; ticks never overlap,
 * since the next one is scheduled only after the previous one settled. A failed read is reported and simply
 * attempted again on the next tick.
 */
export class DataRefPoller {
    private readonly logger = new Logger('DataRefPoller');
    private readonly listeners: PollListener[] = [];
    private timer: ReturnType<typeof setTimeout> | null = null;
    private running = false;
    private currentTick: Promise<void> | null = null;

    constructor(
        private readonly reader: DataRefReader,
        private readonly watchList: readonly DataRefSubscription[],
        private readonly intervalMs: number
    ) {}

    /**
     * @returns A function that removes the listener.
     */
    public onResult(listener: PollListener): () => void {
        this.listeners.push(listener);
        return () => {
            const index = this.listeners.indexOf(listener);
            if (index > -1) {
                this.listeners.splice(index, 1);
            }
        };
    }

    /**
     * Reads the whole watch list once and notifies listeners.
     */
    public async pollOnce(): Promise<PollResult[]> {
        const results = await Promise.all(this.watchList.map(async subscription => ({
            subscription,
            result: await this.reader.read(subscription.name, subscription.type),
        })));

        const failures = results.filter(r => !r.result.success).length;
        this.logger.debug(`Polled ${results.length} dataref(s), ${failures} failed.`);

        for (const listener of this.listeners) {
            try {
                listener(results);
            } catch (error) {
                this.logger.error('Poll listener failed:', error);
            }
        }
        return results;
    }

    /**
     * Starts polling. The first tick runs immediately.
     */
    public start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.logger.info(`Polling ${this.watchList.length} dataref(s) every ${this.intervalMs} ms.`);
        this.tick();
    }

    /**
     * Stops polling and waits for a tick in progress to settle.
     */
    public async stop(): Promise<void> {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.currentTick) {
            await this.currentTick;
        }
        this.logger.info('Polling stopped.');
    }

    public isRunning(): boolean {
        return this.running;
    }

    private tick(): void {
        this.timer = null;
        this.currentTick = this.pollOnce()
            .then(() => undefined, (error: unknown) => {
                this.logger.error('Poll tick failed:', error);
            })
            .finally(() => {
                this.currentTick = null;
                if (this.running) {
                    this.timer = setTimeout(() => this.tick(), this.intervalMs);
                }
            });
    }
}
