/**
 * @file DataRefClient.ts
 * @description Reads datarefs from the host: encodes requests, sends them through the transport and
 * correlates the responses back to their callers.
 * @module DataRefBridge/Client
 */

import {
    CodecError,
    DataRefName,
    DataRefResponse,
    DataRefType,
    DataRefValue,
    decodeResponse,
    encodeRequest,
    extractErrorInfo,
    isCodecError,
    isTransportError,
    Logger,
    ReadError,
    TransportError,
    TransportErrorKind,
} from '@datarefbridge/shared';
import { IDatagramTransport } from '../ports/IDatagramTransport';
import { UdpTransport, DEFAULT_READ_TIMEOUT_MS } from '../../adapters/udp/UdpTransport';
import { RequestCorrelator } from './RequestCorrelator';
import { DataRefStore, ReadonlyDataRefStore } from './DataRefStore';

/**
 * How responses reach their callers.
 * - `receive-loop`: one background loop receives and dispatches every datagram; reads run concurrently.
 * - `per-call`: each read receives for itself until its own response arrives; reads run one at a time.
 */
export type ClientMode = 'receive-loop' | 'per-call';

/**
 * Outcome of a read. A failed read carries no value, so it cannot be mistaken for data.
 */
export type ReadResult<T> =
    | { success: true; value: T }
    | { success: false; error: ReadError };

export interface DataRefClientOptions {
    mode?: ClientMode;
    /** Deadline of each read. Defaults to the transport's read timeout. */
    readTimeoutMs?: number;
    correlator?: RequestCorrelator;
    store?: DataRefStore;
}

export interface DataRefClientConnectOptions extends DataRefClientOptions {
    host: string;
    port: number;
}

function toReadError(error: unknown, fallback: TransportErrorKind): ReadError {
    if (isTransportError(error) || isCodecError(error)) {
        return error;
    }
    return new TransportError(fallback, extractErrorInfo(error).message, { cause: error });
}

function unwrap<T>(result: ReadResult<DataRefValue>, pick: (value: DataRefValue) => T | undefined): ReadResult<T> {
    if (!result.success) {
        return result;
    }
    const picked = pick(result.value);
    if (picked === undefined) {
        return { success: false, error: new CodecError('UnknownType', `unexpected ${result.value.type} value`) };
    }
    return { success: true, value: picked };
}

/**
 * The entry point applications use to read datarefs.
 *
 * @example
 * ```ts
 * const client = await DataRefClient.connect({ host: '127.0.0.1', port: 49000 });
 * const brake = await client.readFloat('sim/cockpit2/controls/parking_brake_ratio');
 * if (brake.success) {
 *     console.log(brake.value);
 * }
 * await client.close();
 * ```
 */
export class DataRefClient {
    private readonly logger = new Logger('DataRefClient');
    private readonly correlator: RequestCorrelator;
    private readonly dataRefStore: DataRefStore;
    private readonly readTimeoutMs: number;
    public readonly mode: ClientMode;
    private receiveLoop: Promise<void> | null = null;
    private perCallTail: Promise<void> = Promise.resolve();
    private closed = false;

    constructor(private readonly transport: IDatagramTransport, options: DataRefClientOptions = {}) {
        this.mode = options.mode ?? 'receive-loop';
        this.readTimeoutMs = options.readTimeoutMs ?? transport.readTimeoutMs;
        this.correlator = options.correlator ?? new RequestCorrelator({ defaultTimeoutMs: this.readTimeoutMs });
        this.dataRefStore = options.store ?? new DataRefStore();
        this.correlator.onCompleted((name, value) => {
            this.dataRefStore.record(name, value);
        });

        if (this.mode === 'receive-loop') {
            this.receiveLoop = this.runReceiveLoop();
        }
        this.logger.info(`DataRef client ready (mode: ${this.mode}, read timeout: ${this.readTimeoutMs} ms).`);
    }

    /**
     * Opens a UDP transport to the responder and creates a client on it.
     * @throws TransportError `AddressInvalid` or `BindFailed`.
     */
    public static async connect(options: DataRefClientConnectOptions): Promise<DataRefClient> {
        const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
        const transport = await UdpTransport.open(options.host, options.port, readTimeoutMs);
        return new DataRefClient(transport, { ...options, readTimeoutMs });
    }

    /** Latest successfully read values. */
    public get store(): ReadonlyDataRefStore {
        return this.dataRefStore;
    }

    /** Number of reads in flight. */
    public get pendingReads(): number {
        return this.correlator.size;
    }

    /**
     * Reads one dataref, declared as `type`. Exactly one request is sent; nothing is retried.
     * Never rejects: network and parse failures come back as `{ success: false, error }`.
     */
    public read(name: DataRefName, type: DataRefType): Promise<ReadResult<DataRefValue>> {
        if (this.closed) {
            return Promise.resolve({ success: false, error: new TransportError('Closed', 'Client is closed') });
        }
        if (this.mode === 'per-call') {
            return this.serialize(() => this.readPerCall(name, type));
        }
        return this.readViaLoop(name, type);
    }

    public async readInt(name: DataRefName): Promise<ReadResult<number>> {
        return unwrap(await this.read(name, DataRefType.Int), v => (v.type === DataRefType.Int ? v.value : undefined));
    }

    public async readFloat(name: DataRefName): Promise<ReadResult<number>> {
        return unwrap(await this.read(name, DataRefType.Float), v => (v.type === DataRefType.Float ? v.value : undefined));
    }

    public async readIntArray(name: DataRefName): Promise<ReadResult<number[]>> {
        return unwrap(await this.read(name, DataRefType.IntArray), v => (v.type === DataRefType.IntArray ? v.value : undefined));
    }

    public async readFloatArray(name: DataRefName): Promise<ReadResult<number[]>> {
        return unwrap(await this.read(name, DataRefType.FloatArray), v => (v.type === DataRefType.FloatArray ? v.value : undefined));
    }

    /**
     * Stops receiving, fails in-flight reads with `Closed` and releases the transport.
     */
    public async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        const cancelled = this.correlator.failAll(new TransportError('Closed', 'Client closed'));
        await this.transport.close();
        if (this.receiveLoop) {
            await this.receiveLoop;
        }
        this.logger.info(`DataRef client closed (${cancelled} in-flight read(s) cancelled).`);
    }

    private async readViaLoop(name: DataRefName, type: DataRefType): Promise<ReadResult<DataRefValue>> {
        const { requestId, completion } = this.correlator.submit(name, type, this.readTimeoutMs);
        const outcome = this.settle(completion);
        await this.sendRequest(requestId, name, type);
        return outcome;
    }

    private async readPerCall(name: DataRefName, type: DataRefType): Promise<ReadResult<DataRefValue>> {
        const deadline = Date.now() + this.readTimeoutMs;
        const { requestId, completion } = this.correlator.submit(name, type, this.readTimeoutMs);
        const outcome = this.settle(completion);
        await this.sendRequest(requestId, name, type);

        while (this.correlator.has(requestId)) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                this.correlator.expire(requestId);
                break;
            }
            try {
                this.dispatch(await this.transport.receive(remaining));
            } catch (error) {
                if (isTransportError(error, 'Timeout')) {
                    this.correlator.expire(requestId);
                } else {
                    this.correlator.fail(requestId, toReadError(error, 'ReceiveFailed'));
                }
            }
        }
        return outcome;
    }

    /**
     * Encodes and sends a request; any failure fails the pending read instead of throwing.
     */
    private async sendRequest(requestId: string, name: DataRefName, type: DataRefType): Promise<void> {
        try {
            const payload = encodeRequest(requestId, name, type);
            this.logger.trace(`Sending ${payload.toString('utf8')}`);
            await this.transport.send(payload);
        } catch (error) {
            const failure = toReadError(error, 'SendFailed');
            this.logger.warn(`Could not send read of ${name}:`, failure);
            this.correlator.fail(requestId, failure);
        }
    }

    private async settle(completion: Promise<DataRefValue>): Promise<ReadResult<DataRefValue>> {
        try {
            return { success: true, value: await completion };
        } catch (error) {
            return { success: false, error: toReadError(error, 'ReceiveFailed') };
        }
    }

    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.perCallTail.then(task);
        this.perCallTail = run.then(() => undefined, () => undefined);
        return run;
    }

    private async runReceiveLoop(): Promise<void> {
        this.logger.debug('Receive loop started.');
        while (!this.closed) {
            let datagram: Uint8Array;
            try {
                datagram = await this.transport.receive();
            } catch (error) {
                if (isTransportError(error, 'Timeout')) {
                    continue;
                }
                if (isTransportError(error, 'Closed')) {
                    break;
                }
                const failure = toReadError(error, 'ReceiveFailed');
                const failed = this.correlator.failAll(failure);
                this.logger.error(`Receive failed; failed ${failed} in-flight read(s):`, failure);
                continue;
            }
            this.dispatch(datagram);
        }
        this.logger.debug('Receive loop stopped.');
    }

    /**
     * Decodes one datagram and settles the read it answers. Datagrams that answer nothing in flight are dropped.
     * Id-less datagrams (legacy responses, or ones too broken to carry an id) are only attributed when exactly
     * one read is in flight.
     */
    private dispatch(datagram: Uint8Array): void {
        let response: DataRefResponse;
        try {
            response = decodeResponse(datagram);
        } catch (error) {
            const codecError = isCodecError(error)
                ? error
                : new CodecError('Malformed', extractErrorInfo(error).message);
            const target = codecError.requestId ?? this.correlator.resolveUnaddressed();
            if (target === null || !this.correlator.fail(target, codecError)) {
                this.logger.warn('Discarded undecodable datagram:', codecError);
            }
            return;
        }

        const target = response.requestId ?? this.correlator.resolveUnaddressed();
        if (target === null || !this.correlator.complete(target, response.type, response.value)) {
            this.logger.debug(`Discarded ${response.type} response that matches no read in flight.`, {
                requestId: response.requestId,
            });
        }
    }
}
