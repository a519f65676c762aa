/**
 * @file error-types.ts
 * @description Defines error types and utilities for consistent error handling across the dataref bridge.
 * @module DataRefBridge/Shared
 */

/**
 * Extended Error class that includes a machine-readable error code.
 */
export class DataRefBridgeError extends Error {
    /**
     * Machine-readable error code for identifying specific error types.
     */
    public readonly errorCode: string;

    /**
     * Creates a new DataRefBridgeError instance.
     * @param message Human-readable error message.
     * @param errorCode Machine-readable error code.
     */
    constructor(message: string, errorCode: string) {
        super(message);
        this.name = 'DataRefBridgeError';
        this.errorCode = errorCode;

        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

/**
 * Failure categories of the UDP transport.
 */
export type TransportErrorKind =
    | 'AddressInvalid'
    | 'BindFailed'
    | 'SendFailed'
    | 'Timeout'
    | 'ReceiveFailed'
    | 'Closed';

const TRANSPORT_ERROR_CODES: Record<TransportErrorKind, string> = {
    AddressInvalid: 'TRANSPORT_ADDRESS_INVALID',
    BindFailed: 'TRANSPORT_BIND_FAILED',
    SendFailed: 'TRANSPORT_SEND_FAILED',
    Timeout: 'TRANSPORT_TIMEOUT',
    ReceiveFailed: 'TRANSPORT_RECEIVE_FAILED',
    Closed: 'TRANSPORT_CLOSED',
};

/**
 * A network-level failure. Always reported to the caller of a read.
 */
export class TransportError extends DataRefBridgeError {
    public readonly kind: TransportErrorKind;

    constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, TRANSPORT_ERROR_CODES[kind]);
        this.name = 'TransportError';
        this.kind = kind;
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * Failure categories of the wire codec.
 */
export type CodecErrorKind = 'Malformed' | 'UnknownType' | 'ValueParse';

const CODEC_ERROR_CODES: Record<CodecErrorKind, string> = {
    Malformed: 'CODEC_MALFORMED',
    UnknownType: 'CODEC_UNKNOWN_TYPE',
    ValueParse: 'CODEC_VALUE_PARSE',
};

/**
 * A message that could not be encoded or decoded.
 * When the header of a response parsed before the failure, `requestId` names the request it answers.
 */
export class CodecError extends DataRefBridgeError {
    public readonly kind: CodecErrorKind;
    public readonly requestId?: string;

    constructor(kind: CodecErrorKind, message: string, requestId?: string) {
        super(message, CODEC_ERROR_CODES[kind]);
        this.name = 'CodecError';
        this.kind = kind;
        this.requestId = requestId;
    }
}

/**
 * Raised at start-up when configuration cannot be loaded or does not validate.
 */
export class ConfigError extends DataRefBridgeError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_INVALID');
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** Errors a dataref read can fail with. */
export type ReadError = TransportError | CodecError;

/**
 * Type guard to check if an error is a DataRefBridgeError.
 * @param error The error to check.
 */
export function isDataRefBridgeError(error: unknown): error is DataRefBridgeError {
    return error instanceof DataRefBridgeError;
}

/**
 * Type guard for transport errors, optionally of one kind.
 */
export function isTransportError(error: unknown, kind?: TransportErrorKind): error is TransportError {
    return error instanceof TransportError && (kind === undefined || error.kind === kind);
}

/**
 * Type guard for codec errors.
 */
export function isCodecError(error: unknown): error is CodecError {
    return error instanceof CodecError;
}

/**
 * Safely extracts error message and code from an unknown error value.
 * @param error The error value to extract from.
 * @returns An object containing the error message and optional error code.
 */
export function extractErrorInfo(error: unknown): { message: string; errorCode?: string } {
    if (isDataRefBridgeError(error)) {
        return { message: error.message, errorCode: error.errorCode };
    } else if (error instanceof Error) {
        return { message: error.message };
    } else if (typeof error === 'string') {
        return { message: error };
    } else {
        return { message: 'An unknown error occurred' };
    }
}

/**
 * Builds the short failure text shown to users in place of a value.
 * @param error The failure of a read.
 */
export function formatReadFailure(error: ReadError): string {
    if (error instanceof TransportError) {
        switch (error.kind) {
            case 'Timeout':
                return 'no response before timeout';
            case 'Closed':
                return 'client closed';
            default:
                return `network error: ${error.message}`;
        }
    }
    switch (error.kind) {
        case 'UnknownType':
            return `unsupported value type: ${error.message}`;
        case 'ValueParse':
            return `unreadable value: ${error.message}`;
        default:
            return `malformed response: ${error.message}`;
    }
}
