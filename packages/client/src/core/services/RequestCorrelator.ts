/**
 * @file RequestCorrelator.ts
 * @description Tracks in-flight dataref reads by RequestId, matches responses to them and expires them on timeout.
 * @module DataRefBridge/Client
 */

import { v4 as uuidv4 } from 'uuid';
import {
    DataRefName,
    DataRefType,
    DataRefValue,
    Logger,
    ReadError,
    TransportError,
} from '@datarefbridge/shared';

/**
 * An in-flight read. Owned by the correlator from submission until completion or expiry.
 */
interface PendingRequest {
    requestId: string;
    name: DataRefName;
    type: DataRefType;
    submittedAt: number;
    resolve: (value: DataRefValue) => void;
    reject: (error: ReadError) => void;
    timer: ReturnType<typeof setTimeout>;
}

/**
 * Handle returned to the submitter: the id to put on the wire and the promise of the outcome.
 */
export interface SubmittedRequest {
    requestId: string;
    completion: Promise<DataRefValue>;
}

/**
 * Notified whenever a read completes successfully.
 */
export type CompletionListener = (name: DataRefName, value: DataRefValue) => void;

export interface RequestCorrelatorOptions {
    /** Deadline applied when `submit` is not given one. */
    defaultTimeoutMs?: number;
    /** Produces RequestIds. Defaults to a v4 UUID without dashes (32 hex characters). */
    generateId?: () => string;
}

/**
 * Returns a 128-bit random RequestId as 32 lowercase hex characters.
 */
export function generateRequestId(): string {
    return uuidv4().replace(/-/g, '');
}

/**
 * Map from RequestId to pending read.
 *
 * All operations run on the event loop thread, so each one observes and leaves the map in a consistent state
 * whether it is called from the receive loop, a timer or a read call.
 */
export class RequestCorrelator {
    private readonly pending = new Map<string, PendingRequest>();
    private readonly listeners: CompletionListener[] = [];
    private readonly defaultTimeoutMs: number;
    private readonly generateId: () => string;
    private readonly logger = new Logger('RequestCorrelator');

    constructor(options: RequestCorrelatorOptions = {}) {
        this.defaultTimeoutMs = options.defaultTimeoutMs ?? 3000;
        this.generateId = options.generateId ?? generateRequestId;
    }

    /**
     * Registers a new read and arms its expiry.
     * @param timeoutMs Deadline from now; the read fails with a `Timeout` when it elapses.
     */
    public submit(name: DataRefName, type: DataRefType, timeoutMs: number = this.defaultTimeoutMs): SubmittedRequest {
        let requestId = this.generateId();
        while (this.pending.has(requestId)) {
            this.logger.warn(`Generated RequestId ${requestId} is already in flight, generating another.`);
            requestId = this.generateId();
        }

        const id = requestId;
        const completion = new Promise<DataRefValue>((resolve, reject) => {
            this.pending.set(id, {
                requestId: id,
                name,
                type,
                submittedAt: Date.now(),
                resolve,
                reject,
                timer: setTimeout(() => this.expire(id), Math.max(0, timeoutMs)),
            });
        });
        this.logger.debug(`Submitted ${type} read of ${name}`, { requestId: id });
        return { requestId: id, completion };
    }

    /**
     * Resolves the read with `requestId` if it exists and was declared with `type`.
     * @returns False for unknown, expired or already completed ids and for type mismatches; nothing is changed then.
     */
    public complete(requestId: string, type: DataRefType, value: DataRefValue): boolean {
        const request = this.pending.get(requestId);
        if (!request) {
            this.logger.debug(`Discarded response for unknown RequestId ${requestId}.`);
            return false;
        }
        if (request.type !== type || value.type !== type) {
            this.logger.debug(`Discarded ${type} response for ${request.type} read of ${request.name}.`, { requestId });
            return false;
        }

        this.remove(request);
        this.logger.debug(`Completed read of ${request.name} in ${Date.now() - request.submittedAt} ms.`, { requestId });
        for (const listener of this.listeners) {
            try {
                listener(request.name, value);
            } catch (error) {
                this.logger.error('Completion listener failed:', error);
            }
        }
        request.resolve(value);
        return true;
    }

    /**
     * Removes a read whose deadline elapsed and fails it with a `Timeout`.
     * @returns False if the read had already settled.
     */
    public expire(requestId: string): boolean {
        const request = this.pending.get(requestId);
        if (!request) {
            return false;
        }
        const elapsed = Date.now() - request.submittedAt;
        this.logger.warn(`Read of ${request.name} timed out after ${elapsed} ms.`, { requestId });
        return this.fail(requestId, new TransportError('Timeout', `No response for ${request.name} (RequestId ${requestId}) within ${elapsed} ms`));
    }

    /**
     * Removes a read and fails it with `error`.
     * @returns False if the read had already settled.
     */
    public fail(requestId: string, error: ReadError): boolean {
        const request = this.pending.get(requestId);
        if (!request) {
            return false;
        }
        this.remove(request);
        request.reject(error);
        return true;
    }

    /**
     * Abandons a read. Its caller sees a `Closed` failure.
     */
    public cancel(requestId: string): boolean {
        return this.fail(requestId, new TransportError('Closed', `Read ${requestId} was cancelled`));
    }

    /**
     * Fails every in-flight read with `error`.
     * @returns The number of reads failed.
     */
    public failAll(error: ReadError): number {
        const ids = [...this.pending.keys()];
        for (const id of ids) {
            this.fail(id, error);
        }
        return ids.length;
    }

    /**
     * Picks the read an id-less datagram belongs to: the only one in flight, if there is exactly one.
     * @returns The RequestId, or null when attribution would be a guess.
     */
    public resolveUnaddressed(): string | null {
        if (this.pending.size !== 1) {
            return null;
        }
        const [only] = this.pending.keys();
        return only;
    }

    /**
     * Registers a listener for successful completions.
     * @returns A function that removes the listener.
     */
    public onCompleted(listener: CompletionListener): () => void {
        this.listeners.push(listener);
        return () => {
            const index = this.listeners.indexOf(listener);
            if (index > -1) {
                this.listeners.splice(index, 1);
            }
        };
    }

    /** True while the read with `requestId` is in flight. */
    public has(requestId: string): boolean {
        return this.pending.has(requestId);
    }

    /** Number of reads in flight. */
    public get size(): number {
        return this.pending.size;
    }

    private remove(request: PendingRequest): void {
        clearTimeout(request.timer);
        this.pending.delete(request.requestId);
    }
}
