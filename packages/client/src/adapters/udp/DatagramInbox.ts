/**
 * @file DatagramInbox.ts
 * @description Hands inbound datagrams to receive calls, each bounded by its own deadline.
 * @module DataRefBridge/Client
 */

import { Logger, TransportError } from '@datarefbridge/shared';

/** Datagrams kept while nobody is receiving. */
export const DEFAULT_INBOX_CAPACITY = 256;

interface Waiter {
    resolve: (datagram: Uint8Array) => void;
    reject: (error: TransportError) => void;
    timer: ReturnType<typeof setTimeout>;
}

/**
 * Queue between a socket's message events and pull-style `receive` calls.
 * Datagrams go to the longest-waiting receiver, or are buffered (bounded, oldest dropped first).
 */
export class DatagramInbox {
    private readonly queue: Uint8Array[] = [];
    private readonly waiters: Waiter[] = [];
    private closedError: TransportError | null = null;
    private readonly logger = new Logger('DatagramInbox');

    constructor(private readonly capacity: number = DEFAULT_INBOX_CAPACITY) {}

    /**
     * Delivers an inbound datagram.
     */
    public push(datagram: Uint8Array): void {
        if (this.closedError) {
            return;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            clearTimeout(waiter.timer);
            waiter.resolve(datagram);
            return;
        }
        if (this.queue.length >= this.capacity) {
            this.queue.shift();
            this.logger.warn(`Inbox full (${this.capacity} datagrams), dropped the oldest.`);
        }
        this.queue.push(datagram);
    }

    /**
     * Resolves with the next datagram or rejects with a `Timeout` after `timeoutMs`.
     */
    public take(timeoutMs: number): Promise<Uint8Array> {
        if (this.closedError) {
            return Promise.reject(this.closedError);
        }
        const queued = this.queue.shift();
        if (queued) {
            return Promise.resolve(queued);
        }
        return new Promise<Uint8Array>((resolve, reject) => {
            const waiter: Waiter = {
                resolve,
                reject,
                timer: setTimeout(() => {
                    const index = this.waiters.indexOf(waiter);
                    if (index > -1) {
                        this.waiters.splice(index, 1);
                    }
                    reject(new TransportError('Timeout', `No datagram received within ${timeoutMs} ms`));
                }, Math.max(0, timeoutMs)),
            };
            this.waiters.push(waiter);
        });
    }

    /**
     * Fails the longest-waiting receiver. Returns false if nobody was waiting.
     */
    public failNext(error: TransportError): boolean {
        const waiter = this.waiters.shift();
        if (!waiter) {
            return false;
        }
        clearTimeout(waiter.timer);
        waiter.reject(error);
        return true;
    }

    /**
     * Rejects all current and future receivers with `error` and drops buffered datagrams.
     */
    public close(error: TransportError): void {
        this.closedError = error;
        this.queue.length = 0;
        for (const waiter of this.waiters.splice(0)) {
            clearTimeout(waiter.timer);
            waiter.reject(error);
        }
    }

    /** Number of buffered datagrams. */
    public get size(): number {
        return this.queue.length;
    }

    /** Number of receive calls currently waiting. */
    public get pendingReceivers(): number {
        return this.waiters.length;
    }
}
