/**
 * @file UdpTransport.ts
 * @description UDP implementation of the datagram transport: an ephemeral local socket pinned to one responder.
 * @module DataRefBridge/Client
 */

import * as dgram from 'dgram';
import * as dns from 'dns';
import {
    extractErrorInfo,
    Logger,
    MAX_DATAGRAM_BYTES,
    MAX_REQUEST_PAYLOAD_BYTES,
    TransportError,
} from '@datarefbridge/shared';
import { IDatagramTransport } from '../../core/ports/IDatagramTransport';
import { DatagramInbox, DEFAULT_INBOX_CAPACITY } from './DatagramInbox';

export const DEFAULT_READ_TIMEOUT_MS = 3000;

/**
 * Address the transport is pinned to.
 */
export interface RemoteEndpoint {
    address: string;
    port: number;
    family: number;
}

function bindEphemeral(socket: dgram.Socket): Promise<void> {
    return new Promise((resolve, reject) => {
        const onError = (error: Error) => reject(error);
        socket.once('error', onError);
        socket.bind(0, () => {
            socket.removeListener('error', onError);
            resolve();
        });
    });
}

function connectTo(socket: dgram.Socket, port: number, address: string): Promise<void> {
    return new Promise((resolve, reject) => {
        socket.connect(port, address, (error?: Error) => {
            if (error) {
                reject(error);
            } else {
                resolve();
            }
        });
    });
}

function closeQuietly(socket: dgram.Socket): Promise<void> {
    return new Promise(resolve => {
        try {
            socket.close(() => resolve());
        } catch {
            // Already closed.
            resolve();
        }
    });
}

/**
 * UDP endpoint for one responder. Construct with {@link UdpTransport.open}.
 */
export class UdpTransport implements IDatagramTransport {
    private readonly logger = new Logger('UdpTransport');
    private readonly inbox: DatagramInbox;
    private closed = false;

    private constructor(
        private readonly socket: dgram.Socket,
        public readonly remote: RemoteEndpoint,
        public readonly readTimeoutMs: number,
        inboxCapacity: number
    ) {
        this.inbox = new DatagramInbox(inboxCapacity);
        this.socket.on('message', (message: Buffer) => this.handleDatagram(message));
        this.socket.on('error', (error: Error) => this.handleSocketError(error));
    }

    /**
     * Resolves the responder's address, binds an ephemeral local socket and pins it to the responder.
     * @param remoteHost Host name or IP literal of the responder.
     * @param remotePort UDP port of the responder.
     * @param readTimeoutMs Default deadline of each receive call.
     * @param inboxCapacity Datagrams buffered while nobody is receiving.
     * @throws TransportError `AddressInvalid` or `BindFailed`.
     */
    public static async open(
        remoteHost: string,
        remotePort: number,
        readTimeoutMs: number = DEFAULT_READ_TIMEOUT_MS,
        inboxCapacity: number = DEFAULT_INBOX_CAPACITY
    ): Promise<UdpTransport> {
        const logger = new Logger('UdpTransport');

        if (!Number.isInteger(remotePort) || remotePort < 1 || remotePort > 65535) {
            throw new TransportError('AddressInvalid', `Invalid port: ${remotePort}`);
        }

        let resolved: dns.LookupAddress;
        try {
            resolved = await dns.promises.lookup(remoteHost);
        } catch (error) {
            throw new TransportError(
                'AddressInvalid',
                `Cannot resolve ${remoteHost}: ${extractErrorInfo(error).message}`,
                { cause: error }
            );
        }

        const socket = dgram.createSocket(resolved.family === 6 ? 'udp6' : 'udp4');

        try {
            await bindEphemeral(socket);
        } catch (error) {
            await closeQuietly(socket);
            throw new TransportError('BindFailed', `Cannot bind a local UDP socket: ${extractErrorInfo(error).message}`, { cause: error });
        }

        try {
            await connectTo(socket, remotePort, resolved.address);
        } catch (error) {
            await closeQuietly(socket);
            throw new TransportError(
                'AddressInvalid',
                `Cannot pin socket to ${resolved.address}:${remotePort}: ${extractErrorInfo(error).message}`,
                { cause: error }
            );
        }

        logger.info(`UDP socket pinned to ${resolved.address}:${remotePort} (read timeout ${readTimeoutMs} ms).`);
        return new UdpTransport(
            socket,
            { address: resolved.address, port: remotePort, family: resolved.family },
            readTimeoutMs,
            inboxCapacity
        );
    }

    public send(payload: Uint8Array): Promise<void> {
        if (this.closed) {
            return Promise.reject(new TransportError('Closed', 'Transport is closed'));
        }
        if (payload.byteLength > MAX_REQUEST_PAYLOAD_BYTES) {
            return Promise.reject(new TransportError(
                'SendFailed',
                `Payload of ${payload.byteLength} bytes exceeds the ${MAX_REQUEST_PAYLOAD_BYTES}-byte datagram limit`
            ));
        }
        return new Promise((resolve, reject) => {
            const fail = (error: unknown) => reject(new TransportError(
                'SendFailed',
                `Send to ${this.remote.address}:${this.remote.port} failed: ${extractErrorInfo(error).message}`,
                { cause: error }
            ));
            try {
                this.socket.send(payload, (error: Error | null) => {
                    if (error) {
                        fail(error);
                    } else {
                        this.logger.trace(`Sent ${payload.byteLength} bytes.`);
                        resolve();
                    }
                });
            } catch (error) {
                fail(error);
            }
        });
    }

    public receive(timeoutMs: number = this.readTimeoutMs): Promise<Uint8Array> {
        return this.inbox.take(timeoutMs);
    }

    public async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.inbox.close(new TransportError('Closed', 'Transport is closed'));
        this.socket.removeAllListeners('message');
        await closeQuietly(this.socket);
        this.logger.info(`UDP socket to ${this.remote.address}:${this.remote.port} closed.`);
    }

    private handleDatagram(message: Buffer): void {
        if (message.byteLength > MAX_DATAGRAM_BYTES) {
            this.logger.warn(`Discarded ${message.byteLength}-byte datagram larger than the ${MAX_DATAGRAM_BYTES}-byte limit.`);
            return;
        }
        this.logger.trace(`Received ${message.byteLength} bytes.`);
        this.inbox.push(message);
    }

    private handleSocketError(error: Error): void {
        const receiveError = new TransportError('ReceiveFailed', `Socket error: ${error.message}`, { cause: error });
        if (!this.inbox.failNext(receiveError)) {
            this.logger.error('Socket error with no receiver waiting:', error);
        }
    }
}
