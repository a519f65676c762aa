/**
 * @file requestCorrelator.test.ts
 * @description Unit tests for the RequestCorrelator.
 * @module DataRefBridge/Client/Tests
 */

import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { CodecError, DataRefType, DataRefValue, TransportError } from '@datarefbridge/shared';
import { generateRequestId, RequestCorrelator } from '../../src/core/services/RequestCorrelator';
import { captureLogs } from '../helpers/logCapture';

const FLOAT_HALF: DataRefValue = { type: DataRefType.Float, value: 0.5 };

function sequence(...ids: string[]): () => string {
    let next = 0;
    return () => ids[next++];
}

describe('generateRequestId', () => {
    it('should produce 32 lowercase hex characters', () => {
        expect(generateRequestId()).toMatch(/^[0-9a-f]{32}$/);
    });

    it('should not repeat', () => {
        const ids = new Set(Array.from({ length: 500 }, () => generateRequestId()));
        expect(ids.size).toBe(500);
    });
});

describe('RequestCorrelator', () => {
    beforeAll(() => {
        captureLogs();
    });

    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should resolve a read when its response arrives and forget it', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'req1' });
        const { requestId, completion } = correlator.submit('sim/brake', DataRefType.Float, 1000);

        expect(requestId).toBe('req1');
        expect(correlator.has('req1')).toBe(true);
        expect(correlator.complete('req1', DataRefType.Float, FLOAT_HALF)).toBe(true);

        await expect(completion).resolves.toEqual(FLOAT_HALF);
        expect(correlator.has('req1')).toBe(false);
        expect(correlator.size).toBe(0);
    });

    it('should generate another id when the generated one is already in flight', () => {
        const correlator = new RequestCorrelator({ generateId: sequence('dup', 'dup', 'fresh') });

        expect(correlator.submit('sim/a', DataRefType.Int).requestId).toBe('dup');
        expect(correlator.submit('sim/b', DataRefType.Int).requestId).toBe('fresh');
        expect(correlator.size).toBe(2);
    });

    it('should give concurrent submissions distinct ids', () => {
        const correlator = new RequestCorrelator();
        const ids = Array.from({ length: 200 }, (_, index) => correlator.submit(`sim/${index}`, DataRefType.Int).requestId);

        expect(new Set(ids).size).toBe(200);
        expect(correlator.size).toBe(200);
    });

    it('should ignore a repeated response without touching other reads', async () => {
        const correlator = new RequestCorrelator({ generateId: sequence('a', 'b') });
        const first = correlator.submit('sim/a', DataRefType.Float);
        correlator.submit('sim/b', DataRefType.Float);

        expect(correlator.complete('a', DataRefType.Float, FLOAT_HALF)).toBe(true);
        expect(correlator.complete('a', DataRefType.Float, FLOAT_HALF)).toBe(false);

        await expect(first.completion).resolves.toEqual(FLOAT_HALF);
        expect(correlator.has('b')).toBe(true);
        expect(correlator.size).toBe(1);
    });

    it('should ignore responses for unknown ids', () => {
        const correlator = new RequestCorrelator({ generateId: () => 'mine' });
        correlator.submit('sim/brake', DataRefType.Float);

        expect(correlator.complete('other', DataRefType.Float, FLOAT_HALF)).toBe(false);
        expect(correlator.has('mine')).toBe(true);
    });

    it('should leave a read pending when the response has a different type', () => {
        const correlator = new RequestCorrelator({ generateId: () => 'mine' });
        correlator.submit('sim/brake', DataRefType.Float);

        expect(correlator.complete('mine', DataRefType.Int, { type: DataRefType.Int, value: 1 })).toBe(false);
        expect(correlator.has('mine')).toBe(true);
    });

    it('should fail a read with a Timeout once its deadline elapses', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'slow' });
        const { completion } = correlator.submit('sim/brake', DataRefType.Float, 250);
        const failure = completion.catch((error: unknown) => error);

        jest.advanceTimersByTime(249);
        expect(correlator.has('slow')).toBe(true);
        jest.advanceTimersByTime(1);

        const error = await failure;
        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ kind: 'Timeout' });
        expect(error).toHaveProperty('message', 'No response for sim/brake (RequestId slow) within 250 ms');
        expect(correlator.size).toBe(0);
    });

    it('should drop a response that arrives after the read expired', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'late', defaultTimeoutMs: 100 });
        const { completion } = correlator.submit('sim/brake', DataRefType.Float);
        const failure = completion.catch((error: unknown) => error);

        jest.advanceTimersByTime(100);
        await failure;

        expect(correlator.complete('late', DataRefType.Float, FLOAT_HALF)).toBe(false);
        expect(correlator.expire('late')).toBe(false);
    });

    it('should not time out a read that already completed', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'quick' });
        const { completion } = correlator.submit('sim/brake', DataRefType.Float, 100);
        correlator.complete('quick', DataRefType.Float, FLOAT_HALF);

        jest.advanceTimersByTime(1000);
        await expect(completion).resolves.toEqual(FLOAT_HALF);
    });

    it('should fail a read with the given error', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'bad' });
        const { completion } = correlator.submit('sim/brake', DataRefType.Float);
        const codecError = new CodecError('ValueParse', 'not a number', 'bad');

        expect(correlator.fail('bad', codecError)).toBe(true);
        await expect(completion).rejects.toBe(codecError);
        expect(correlator.fail('bad', codecError)).toBe(false);
    });

    it('should cancel a read with a Closed failure', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'gone' });
        const { completion } = correlator.submit('sim/brake', DataRefType.Float);

        expect(correlator.cancel('gone')).toBe(true);
        await expect(completion).rejects.toMatchObject({ kind: 'Closed' });
    });

    it('should fail every read in flight', async () => {
        const correlator = new RequestCorrelator({ generateId: sequence('a', 'b') });
        const first = correlator.submit('sim/a', DataRefType.Int).completion.catch((error: unknown) => error);
        const second = correlator.submit('sim/b', DataRefType.Int).completion.catch((error: unknown) => error);
        const closed = new TransportError('Closed', 'Client closed');

        expect(correlator.failAll(closed)).toBe(2);
        expect(await first).toBe(closed);
        expect(await second).toBe(closed);
        expect(correlator.size).toBe(0);
    });

    it('should attribute id-less responses only when exactly one read is in flight', () => {
        const correlator = new RequestCorrelator({ generateId: sequence('a', 'b') });
        expect(correlator.resolveUnaddressed()).toBeNull();

        correlator.submit('sim/a', DataRefType.Int);
        expect(correlator.resolveUnaddressed()).toBe('a');

        correlator.submit('sim/b', DataRefType.Int);
        expect(correlator.resolveUnaddressed()).toBeNull();
    });

    it('should notify completion listeners until unsubscribed', () => {
        const correlator = new RequestCorrelator({ generateId: sequence('a', 'b') });
        const listener = jest.fn();
        const unsubscribe = correlator.onCompleted(listener);

        correlator.submit('sim/a', DataRefType.Float);
        correlator.complete('a', DataRefType.Float, FLOAT_HALF);
        unsubscribe();
        correlator.submit('sim/b', DataRefType.Float);
        correlator.complete('b', DataRefType.Float, FLOAT_HALF);

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith('sim/a', FLOAT_HALF);
    });

    it('should still resolve the read when a listener throws', async () => {
        const correlator = new RequestCorrelator({ generateId: () => 'a' });
        correlator.onCompleted(() => {
            throw new Error('listener bug');
        });
        const { completion } = correlator.submit('sim/a', DataRefType.Float);

        expect(correlator.complete('a', DataRefType.Float, FLOAT_HALF)).toBe(true);
        await expect(completion).resolves.toEqual(FLOAT_HALF);
    });
});
