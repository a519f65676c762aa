/**
 * @file MockResponder.ts
 * @description A stand-in for the simulator plugin: answers dataref read requests from a static table.
 * @module DataRefBridge/MockResponder
 */

import * as dgram from 'dgram';
import {
    DataRefName,
    DataRefReadRequest,
    DataRefValue,
    decodeRequest,
    encodeResponse,
    Logger,
} from '@datarefbridge/shared';

/**
 * Answers read requests from a table of fixed values, echoing each request's RequestId.
 * Requests it cannot answer (unknown name, wrong type, undecodable) get no response, so the client times out.
 */
export class MockResponder {
    private socket: dgram.Socket | null = null;
    private readonly logger = new Logger('MockResponder');
    private readonly table: Map<DataRefName, DataRefValue>;

    constructor(table: ReadonlyMap<DataRefName, DataRefValue>) {
        this.table = new Map(table);
    }

    /**
     * Replaces the value served for `name`, e.g. to simulate the sim state changing.
     */
    public set(name: DataRefName, value: DataRefValue): void {
        this.table.set(name, value);
    }

    /**
     * Computes the response to one request datagram.
     * @returns The response bytes, or null when the request gets no answer.
     */
    public handle(datagram: Uint8Array): Buffer | null {
        let request: DataRefReadRequest;
        try {
            request = decodeRequest(datagram);
        } catch (error) {
            this.logger.warn('Ignored undecodable request:', error);
            return null;
        }

        const value = this.table.get(request.name);
        if (!value) {
            this.logger.error(`DataRef ${request.name} not found in mock table.`);
            return null;
        }
        if (value.type !== request.type) {
            this.logger.warn(`DataRef ${request.name} is ${value.type}, request asked for ${request.type}.`);
            return null;
        }

        this.logger.info(`DataRef ${request.name} found with value ${JSON.stringify(value.value)}.`, {
            requestId: request.requestId,
        });
        return encodeResponse(request.requestId, value);
    }

    /**
     * Binds the UDP socket and starts answering.
     * @param port Port to listen on; 0 picks a free one.
     * @returns The bound port.
     */
    public start(port: number, host: string = '127.0.0.1'): Promise<number> {
        if (this.socket) {
            return Promise.reject(new Error('Mock responder is already running'));
        }
        return new Promise((resolve, reject) => {
            const socket = dgram.createSocket('udp4');

            const onError = (error: Error) => {
                socket.removeAllListeners();
                socket.close();
                reject(error);
            };

            socket.once('error', onError);
            socket.bind(port, host, () => {
                socket.removeListener('error', onError);
                socket.on('error', error => this.logger.error('Socket error:', error));
                socket.on('message', (message: Buffer, remote: dgram.RemoteInfo) => this.reply(socket, message, remote));
                this.socket = socket;
                const bound = socket.address().port;
                this.logger.info(`Mock responder listening on ${host}:${bound}.`);
                resolve(bound);
            });
        });
    }

    public stop(): Promise<void> {
        const socket = this.socket;
        if (!socket) {
            return Promise.resolve();
        }
        this.socket = null;
        return new Promise(resolve => {
            socket.removeAllListeners('message');
            socket.close(() => {
                this.logger.info('Mock responder stopped.');
                resolve();
            });
        });
    }

    public isRunning(): boolean {
        return this.socket !== null;
    }

    private reply(socket: dgram.Socket, message: Buffer, remote: dgram.RemoteInfo): void {
        const response = this.handle(message);
        if (!response) {
            return;
        }
        socket.send(response, remote.port, remote.address, (error: Error | null) => {
            if (error) {
                this.logger.error(`Reply to ${remote.address}:${remote.port} failed:`, error);
            }
        });
    }
}
