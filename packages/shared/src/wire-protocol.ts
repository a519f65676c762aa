/**
 * @file wire-protocol.ts
 * @description Encodes and decodes the pipe-delimited dataref messages exchanged over UDP.
 *
 * Request:  `[<requestId>|]dataref|read|<type>|<name>`
 * Response: `[<requestId>|]dataref|response|<type>|<value>`
 *
 * The RequestId-less forms are the legacy protocol. They are decoded for compatibility
 * but never produced by the client.
 * @module DataRefBridge/Shared
 */

import { TextDecoder } from 'util';
import { DataRefName, DataRefType, DataRefValue, isDataRefType } from './data-models';
import { CodecError } from './error-types';

export const FIELD_SEPARATOR = '|';
export const ARRAY_ELEMENT_SEPARATOR = ',';
export const DATAREF_CATEGORY = 'dataref';
export const READ_ACTION = 'read';
export const RESPONSE_ACTION = 'response';

/** Largest request payload a client may send in one datagram. */
export const MAX_REQUEST_PAYLOAD_BYTES = 1024;

/**
 * Largest datagram a client accepts, and so the ceiling on the length of array-valued responses.
 */
export const MAX_DATAGRAM_BYTES = 2048;

/**
 * Width of the host's native integers. Decoded integers are wrapped to this width, which silently
 * truncates host values outside the signed 32-bit range.
 */
export const HOST_INT_BITS = 32;

/** UDP port the host plugin listens on unless configured otherwise. */
export const DEFAULT_RESPONDER_PORT = 49000;

/**
 * A decoded read request. `requestId` is null for legacy requests.
 */
export interface DataRefReadRequest {
    requestId: string | null;
    name: DataRefName;
    type: DataRefType;
}

/**
 * A decoded response. `requestId` is null for legacy responses.
 */
export interface DataRefResponse {
    requestId: string | null;
    type: DataRefType;
    value: DataRefValue;
}

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const NON_FINITE_FLOATS: ReadonlyMap<string, number> = new Map([
    ['inf', Infinity],
    ['+inf', Infinity],
    ['-inf', -Infinity],
    ['infinity', Infinity],
    ['+infinity', Infinity],
    ['-infinity', -Infinity],
    ['nan', NaN],
    ['+nan', NaN],
    ['-nan', NaN],
]);

const utf8 = new TextDecoder('utf-8', { fatal: true });

function toText(bytes: Uint8Array): string {
    try {
        return utf8.decode(bytes);
    } catch (error) {
        throw new CodecError('Malformed', `datagram is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`);
    }
}

function assertField(field: string, description: string): void {
    if (field.length === 0) {
        throw new CodecError('Malformed', `${description} must not be empty`);
    }
    if (field.includes(FIELD_SEPARATOR)) {
        throw new CodecError('Malformed', `${description} must not contain '${FIELD_SEPARATOR}': ${field}`);
    }
}

/**
 * Splits a message into its header-less fields, detecting whether it carries a RequestId.
 * Legacy messages start directly with the category field. A message with the wrong field count
 * still reports its leading field as RequestId, so a broken answer to another request is not
 * mistaken for an id-less one.
 */
function splitMessage(text: string): { requestId: string | null; fields: string[] } {
    const parts = text.trim().split(FIELD_SEPARATOR);
    const legacy = parts[0] === DATAREF_CATEGORY;
    const expected = legacy ? 4 : 5;

    if (parts.length !== expected) {
        const leading = !legacy && parts.length > 1 && parts[0].length > 0 ? parts[0] : undefined;
        throw new CodecError(
            'Malformed',
            `expected ${expected} '${FIELD_SEPARATOR}'-separated fields but found ${parts.length}: ${text}`,
            leading
        );
    }
    if (legacy) {
        return { requestId: null, fields: parts };
    }
    const [requestId, ...fields] = parts;
    if (requestId.length === 0) {
        throw new CodecError('Malformed', `empty request id: ${text}`);
    }
    return { requestId, fields };
}

/**
 * Parses a decimal integer literal and narrows it to {@link HOST_INT_BITS}.
 * @returns The narrowed value, or undefined if the token is not a signed 64-bit decimal integer.
 */
export function parseIntLiteral(token: string): number | undefined {
    if (!INT_PATTERN.test(token)) {
        return undefined;
    }
    const wide = BigInt(token);
    if (wide < INT64_MIN || wide > INT64_MAX) {
        return undefined;
    }
    return Number(BigInt.asIntN(HOST_INT_BITS, wide));
}

/**
 * Parses a decimal float literal at double precision and narrows it to 32-bit precision.
 * Accepts the `inf`, `infinity` and `NaN` spellings the host's formatter emits.
 * @returns The narrowed value, or undefined if the token is not a float literal.
 */
export function parseFloatLiteral(token: string): number | undefined {
    const nonFinite = NON_FINITE_FLOATS.get(token.toLowerCase());
    if (nonFinite !== undefined) {
        return nonFinite;
    }
    if (!FLOAT_PATTERN.test(token)) {
        return undefined;
    }
    return Math.fround(Number(token));
}

function parseElements(
    raw: string,
    parse: (token: string) => number | undefined,
    type: DataRefType,
    requestId: string | undefined
): number[] {
    if (raw.trim().length === 0) {
        return [];
    }
    return raw.split(ARRAY_ELEMENT_SEPARATOR).map((element, index) => {
        const parsed = parse(element.trim());
        if (parsed === undefined) {
            throw new CodecError('ValueParse', `element ${index} of ${type} value is not a number: '${element}'`, requestId);
        }
        return parsed;
    });
}

function parseScalar(
    raw: string,
    parse: (token: string) => number | undefined,
    type: DataRefType,
    requestId: string | undefined
): number {
    const parsed = parse(raw.trim());
    if (parsed === undefined) {
        throw new CodecError('ValueParse', `${type} value is not a number: '${raw}'`, requestId);
    }
    return parsed;
}

/**
 * Parses the value segment of a response under its declared type. Arrays are all-or-nothing.
 * @throws CodecError with kind `ValueParse`.
 */
export function parseValue(type: DataRefType, raw: string, requestId?: string): DataRefValue {
    switch (type) {
        case DataRefType.Int:
            return { type, value: parseScalar(raw, parseIntLiteral, type, requestId) };
        case DataRefType.Float:
            return { type, value: parseScalar(raw, parseFloatLiteral, type, requestId) };
        case DataRefType.IntArray:
            return { type, value: parseElements(raw, parseIntLiteral, type, requestId) };
        case DataRefType.FloatArray:
            return { type, value: parseElements(raw, parseFloatLiteral, type, requestId) };
    }
}

function formatFloat(value: number): string {
    if (Number.isNaN(value)) {
        return 'NaN';
    }
    if (value === Infinity) {
        return 'inf';
    }
    if (value === -Infinity) {
        return '-inf';
    }
    return String(value);
}

function formatInt(value: number): string {
    if (!Number.isInteger(value)) {
        throw new CodecError('ValueParse', `int value must be an integer: ${value}`);
    }
    return String(value);
}

/**
 * Renders a value segment. Number-to-string conversion in JavaScript is locale-independent,
 * so the decimal separator is always `.`.
 */
export function formatValue(value: DataRefValue): string {
    switch (value.type) {
        case DataRefType.Int:
            return formatInt(value.value);
        case DataRefType.Float:
            return formatFloat(value.value);
        case DataRefType.IntArray:
            return value.value.map(formatInt).join(ARRAY_ELEMENT_SEPARATOR);
        case DataRefType.FloatArray:
            return value.value.map(formatFloat).join(ARRAY_ELEMENT_SEPARATOR);
    }
}

/**
 * Encodes a read request.
 * @throws CodecError with kind `Malformed` when the id or name is empty or contains the field separator.
 */
export function encodeRequest(requestId: string, name: DataRefName, type: DataRefType): Buffer {
    assertField(requestId, 'request id');
    assertField(name, 'dataref name');
    if (!isDataRefType(type)) {
        throw new CodecError('UnknownType', `unknown dataref type: ${String(type)}`);
    }
    const message = [requestId, DATAREF_CATEGORY, READ_ACTION, type, name].join(FIELD_SEPARATOR);
    return Buffer.from(message, 'utf8');
}

/**
 * Decodes a read request, with or without RequestId. Used by responders.
 * @throws CodecError
 */
export function decodeRequest(bytes: Uint8Array): DataRefReadRequest {
    const text = toText(bytes);
    const { requestId, fields } = splitMessage(text);
    const [category, action, tag, name] = fields;

    if (category !== DATAREF_CATEGORY || action !== READ_ACTION) {
        throw new CodecError('Malformed', `not a dataref read request: ${text}`);
    }
    if (!isDataRefType(tag)) {
        throw new CodecError('UnknownType', `unknown dataref type: ${tag}`, requestId ?? undefined);
    }
    if (name.length === 0) {
        throw new CodecError('Malformed', `empty dataref name: ${text}`, requestId ?? undefined);
    }
    return { requestId, name, type: tag };
}

/**
 * Encodes a response, echoing the request's id. A null id produces a legacy response.
 * @throws CodecError when the id contains the field separator or an int value is not an integer.
 */
export function encodeResponse(requestId: string | null, value: DataRefValue): Buffer {
    const fields = [DATAREF_CATEGORY, RESPONSE_ACTION, value.type, formatValue(value)];
    if (requestId !== null) {
        assertField(requestId, 'request id');
        fields.unshift(requestId);
    }
    return Buffer.from(fields.join(FIELD_SEPARATOR), 'utf8');
}

/**
 * Decodes a response datagram.
 * @throws CodecError `Malformed` for a wrong field count or header, `UnknownType` for a type tag outside
 * the enumeration, `ValueParse` for a value that does not parse under its type. Errors raised after the
 * header parsed carry the response's RequestId.
 */
export function decodeResponse(bytes: Uint8Array): DataRefResponse {
    const text = toText(bytes);
    const { requestId, fields } = splitMessage(text);
    const [category, action, tag, rawValue] = fields;
    const idForErrors = requestId ?? undefined;

    if (category !== DATAREF_CATEGORY || action !== RESPONSE_ACTION) {
        throw new CodecError('Malformed', `not a dataref response: ${text}`, idForErrors);
    }
    if (!isDataRefType(tag)) {
        throw new CodecError('UnknownType', `unknown dataref type: ${tag}`, idForErrors);
    }
    return { requestId, type: tag, value: parseValue(tag, rawValue, idForErrors) };
}
