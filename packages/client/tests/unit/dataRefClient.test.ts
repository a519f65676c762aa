/**
 * @file dataRefClient.test.ts
 * @description Unit tests for the DataRefClient in both receive modes, against an in-process transport.
 * @module DataRefBridge/Client/Tests
 */

import { describe, it, expect, jest, beforeAll, afterEach } from '@jest/globals';
import {
    CodecError,
    DataRefType,
    DataRefValue,
    ReadError,
    TransportError,
} from '@datarefbridge/shared';
import { MockResponder } from '@datarefbridge/mock-responder';
import { ClientMode, DataRefClient, DataRefClientOptions, ReadResult } from '../../src/core/services/DataRefClient';
import { RequestCorrelator } from '../../src/core/services/RequestCorrelator';
import { FakeTransport, flush } from '../helpers/FakeTransport';
import { captureLogs } from '../helpers/logCapture';

const PARKING_BRAKE = 'sim/cockpit2/controls/parking_brake_ratio';
const ENG_MASTER = 'sim/cockpit2/engine/actuators/eng_master';
const THROTTLE = 'sim/cockpit2/engine/actuators/throttle_ratio';

const TABLE = new Map<string, DataRefValue>([
    [PARKING_BRAKE, { type: DataRefType.Float, value: 0.5 }],
    [ENG_MASTER, { type: DataRefType.IntArray, value: [1, 1] }],
    [THROTTLE, { type: DataRefType.FloatArray, value: [0.75, 0.25] }],
    ['sim/cockpit/electrical/avionics_on', { type: DataRefType.Int, value: 1 }],
]);

function ids(...sequence: string[]): RequestCorrelator {
    let next = 0;
    return new RequestCorrelator({ generateId: () => sequence[next++] });
}

function failureOf<T>(result: ReadResult<T>): ReadError {
    if (result.success) {
        throw new Error(`expected a failed read, got ${JSON.stringify(result.value)}`);
    }
    return result.error;
}

const clients: DataRefClient[] = [];

function createClient(transport: FakeTransport, options: DataRefClientOptions = {}): DataRefClient {
    const client = new DataRefClient(transport, options);
    clients.push(client);
    return client;
}

function answerFrom(transport: FakeTransport, responder: MockResponder): void {
    transport.responder = request => responder.handle(request);
}

describe('DataRefClient', () => {
    beforeAll(() => {
        captureLogs();
    });

    afterEach(async () => {
        await Promise.all(clients.splice(0).map(client => client.close()));
    });

    describe.each<ClientMode>(['receive-loop', 'per-call'])('in %s mode', mode => {
        it('should send one RequestId-bearing request and return the matching value', async () => {
            const transport = new FakeTransport();
            answerFrom(transport, new MockResponder(TABLE));
            const correlator = ids('req1');
            const client = createClient(transport, { mode, correlator });

            const result = await client.readFloat(PARKING_BRAKE);

            expect(transport.sent).toEqual([`req1|dataref|read|float|${PARKING_BRAKE}`]);
            expect(result).toEqual({ success: true, value: 0.5 });
            expect(correlator.has('req1')).toBe(false);
            expect(client.pendingReads).toBe(0);
        });

        it('should read every value type', async () => {
            const transport = new FakeTransport();
            answerFrom(transport, new MockResponder(TABLE));
            const client = createClient(transport, { mode });

            expect(await client.readIntArray(ENG_MASTER)).toEqual({ success: true, value: [1, 1] });
            expect(await client.readFloatArray(THROTTLE)).toEqual({ success: true, value: [0.75, 0.25] });
            expect(await client.readInt('sim/cockpit/electrical/avionics_on')).toEqual({ success: true, value: 1 });
        });

        it('should skip responses for other requests and wrong types until its own arrives', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode, correlator: ids('want') });

            const pending = client.readInt('sim/a');
            transport.deliver('other|dataref|response|int|9');
            transport.deliver('want|dataref|response|float|1.5');
            transport.deliver('want|dataref|response|int|7');

            expect(await pending).toEqual({ success: true, value: 7 });
        });

        it('should discard a malformed response addressed to another request and wait for its own', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode, correlator: ids('mine') });

            const pending = client.readFloat('sim/a');
            transport.deliver('other|dataref|response|float');
            transport.deliver('mine|dataref|response|float|0.5');

            expect(await pending).toEqual({ success: true, value: 0.5 });
        });

        it('should keep the stored array when the caller mutates the value it was given', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode, correlator: ids('x') });

            const pending = client.readIntArray('sim/arr');
            transport.deliver('x|dataref|response|[int]|1,2');
            const result = await pending;
            if (!result.success) {
                throw result.error;
            }
            result.value.push(3);
            result.value[0] = 9;

            expect(client.store.get('sim/arr')?.value).toEqual({ type: DataRefType.IntArray, value: [1, 2] });
        });

        it('should fail with a Timeout when nothing answers', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode, readTimeoutMs: 40 });

            const error = failureOf(await client.readFloat('sim/missing'));

            expect(error).toBeInstanceOf(TransportError);
            expect(error.kind).toBe('Timeout');
            expect(client.pendingReads).toBe(0);
        });

        it('should attribute a legacy id-less response to the only read in flight', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode });

            const pending = client.readInt('sim/a');
            transport.deliver('dataref|response|int|42');

            expect(await pending).toEqual({ success: true, value: 42 });
        });

        it('should report an unparsable value for its RequestId as ValueParse', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode, correlator: ids('r1') });

            const pending = client.readInt('sim/a');
            transport.deliver('r1|dataref|response|int|abc');

            const error = failureOf(await pending);
            expect(error).toBeInstanceOf(CodecError);
            expect(error.kind).toBe('ValueParse');
        });

        it('should report an unknown type tag on an id-less response as UnknownType', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode });

            const pending = client.readInt('sim/a');
            transport.deliver('dataref|response|bool|1');

            expect(failureOf(await pending).kind).toBe('UnknownType');
        });

        it('should report a failed send without waiting for the deadline', async () => {
            const transport = new FakeTransport();
            transport.sendError = new Error('EHOSTUNREACH');
            const client = createClient(transport, { mode, readTimeoutMs: 5000 });

            const error = failureOf(await client.readFloat(PARKING_BRAKE));

            expect(error.kind).toBe('SendFailed');
            expect(error.message).toBe('EHOSTUNREACH');
            expect(client.pendingReads).toBe(0);
        });

        it('should refuse a name containing the field separator as Malformed', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode });

            const error = failureOf(await client.readInt('sim/a|b'));

            expect(error.kind).toBe('Malformed');
            expect(transport.sent).toEqual([]);
        });

        it('should record successful reads in the store and leave failed ones out', async () => {
            const transport = new FakeTransport();
            answerFrom(transport, new MockResponder(TABLE));
            const client = createClient(transport, { mode, readTimeoutMs: 40 });
            const listener = jest.fn();
            client.store.subscribe(listener);

            await client.readFloat(PARKING_BRAKE);
            await client.readFloat('sim/not/in/table');

            expect(client.store.get(PARKING_BRAKE)?.value).toEqual({ type: DataRefType.Float, value: 0.5 });
            expect(client.store.get('sim/not/in/table')).toBeUndefined();
            expect(listener).toHaveBeenCalledTimes(1);
        });

        it('should answer reads issued together', async () => {
            const transport = new FakeTransport();
            answerFrom(transport, new MockResponder(TABLE));
            const client = createClient(transport, { mode });

            const results = await Promise.all([
                client.readFloat(PARKING_BRAKE),
                client.readIntArray(ENG_MASTER),
                client.readFloatArray(THROTTLE),
            ]);

            expect(results).toEqual([
                { success: true, value: 0.5 },
                { success: true, value: [1, 1] },
                { success: true, value: [0.75, 0.25] },
            ]);
            expect(transport.sent).toHaveLength(3);
        });

        it('should fail reads after close with Closed and close the transport', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode });

            await client.close();
            await client.close();

            expect(transport.closed).toBe(true);
            expect(failureOf(await client.readInt('sim/a')).kind).toBe('Closed');
        });
    });

    describe('in receive-loop mode', () => {
        it('should drop a response that arrives after its read timed out', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { correlator: ids('first'), readTimeoutMs: 30 });

            expect(failureOf(await client.readFloat('sim/x')).kind).toBe('Timeout');
            transport.deliver('first|dataref|response|float|1');
            await flush();

            expect(client.store.get('sim/x')).toBeUndefined();
        });

        it('should not guess the owner of a legacy response while several reads are in flight', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { correlator: ids('a', 'b') });

            const first = client.readInt('sim/a');
            const second = client.readInt('sim/b');
            transport.deliver('dataref|response|int|1');
            transport.deliver('b|dataref|response|int|2');
            transport.deliver('a|dataref|response|int|3');

            expect(await first).toEqual({ success: true, value: 3 });
            expect(await second).toEqual({ success: true, value: 2 });
        });

        it('should fail reads in flight when a receive fails and keep serving later ones', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { correlator: ids('a', 'b') });

            const pending = client.readInt('sim/a');
            await flush();
            expect(transport.failReceive('ECONNREFUSED')).toBe(true);

            const error = failureOf(await pending);
            expect(error.kind).toBe('ReceiveFailed');

            const next = client.readInt('sim/b');
            transport.deliver('b|dataref|response|int|5');
            expect(await next).toEqual({ success: true, value: 5 });
        });

        it('should cancel reads in flight on close', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { readTimeoutMs: 5000 });

            const pending = client.readInt('sim/a');
            await client.close();

            const error = failureOf(await pending);
            expect(error.kind).toBe('Closed');
        });
    });

    describe('in per-call mode', () => {
        it('should run reads one at a time', async () => {
            const transport = new FakeTransport();
            const client = createClient(transport, { mode: 'per-call', correlator: ids('a', 'b') });

            const first = client.readInt('sim/a');
            const second = client.readInt('sim/b');
            await flush();
            expect(transport.sent).toEqual(['a|dataref|read|int|sim/a']);

            transport.deliver('a|dataref|response|int|1');
            expect(await first).toEqual({ success: true, value: 1 });

            await flush();
            expect(transport.sent).toEqual(['a|dataref|read|int|sim/a', 'b|dataref|read|int|sim/b']);
            transport.deliver('b|dataref|response|int|2');
            expect(await second).toEqual({ success: true, value: 2 });
        });
    });
});
