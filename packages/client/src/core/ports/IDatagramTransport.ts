/**
 * @file IDatagramTransport.ts
 * @description Port for the datagram endpoint the dataref client talks through.
 * @module DataRefBridge/Client
 */

/**
 * A datagram endpoint pinned to one remote responder.
 * It is the only component allowed to touch the socket; it never retries.
 */
export interface IDatagramTransport {
    /** Default receive deadline, in milliseconds, measured from the start of each receive call. */
    readonly readTimeoutMs: number;

    /**
     * Sends one datagram.
     * @throws TransportError `SendFailed`, or `Closed` after {@link close}.
     */
    send(payload: Uint8Array): Promise<void>;

    /**
     * Resolves with the next datagram, or rejects once the deadline elapses.
     * @param timeoutMs Overrides the default deadline for this call only.
     * @throws TransportError `Timeout`, `ReceiveFailed`, or `Closed`.
     */
    receive(timeoutMs?: number): Promise<Uint8Array>;

    /**
     * Releases the endpoint. Pending and later calls fail with `Closed`.
     */
    close(): Promise<void>;
}
