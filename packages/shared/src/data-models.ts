/**
 * @file data-models.ts
 * @description Defines the dataref data models shared by the client, the mock responder
 * and any UI built on top of them.
 * @module DataRefBridge/Shared
 */

/**
 * Namespaced identifier of a simulator dataref, e.g. `sim/cockpit2/controls/parking_brake_ratio`.
 * The client treats it as an opaque key.
 */
export type DataRefName = string;

/**
 * The value types a dataref can be read as. The enum values are the exact type tags used on the wire.
 */
export enum DataRefType {
    Int = 'int',
    Float = 'float',
    IntArray = '[int]',
    FloatArray = '[float]',
}

/** All dataref types, in wire-tag order. */
export const DATAREF_TYPES: readonly DataRefType[] = [
    DataRefType.Int,
    DataRefType.Float,
    DataRefType.IntArray,
    DataRefType.FloatArray,
];

/**
 * Type guard for wire type tags.
 * @param tag A type tag as received from the wire or from configuration.
 */
export function isDataRefType(tag: string): tag is DataRefType {
    return DATAREF_TYPES.some(type => type === tag);
}

/**
 * A decoded dataref value, tagged with the type it was decoded as.
 * Integers are already narrowed to the host's 32-bit width and floats to 32-bit precision.
 */
export type DataRefValue =
    | { type: DataRefType.Int; value: number }
    | { type: DataRefType.Float; value: number }
    | { type: DataRefType.IntArray; value: number[] }
    | { type: DataRefType.FloatArray; value: number[] };

/**
 * A dataref the application wants to poll.
 * @property {DataRefName} name - The dataref to read.
 * @property {DataRefType} type - The type the host exposes it as.
 * @property {string} [label] - Human-readable label for display; defaults to the name.
 */
export interface DataRefSubscription {
    name: DataRefName;
    type: DataRefType;
    label?: string;
}

/** A {@link DataRefValue} that cannot be modified through this reference. */
export type ReadonlyDataRefValue =
    | { readonly type: DataRefType.Int; readonly value: number }
    | { readonly type: DataRefType.Float; readonly value: number }
    | { readonly type: DataRefType.IntArray; readonly value: readonly number[] }
    | { readonly type: DataRefType.FloatArray; readonly value: readonly number[] };

/**
 * Copies a value so that no array is shared with the original.
 */
export function copyDataRefValue(value: ReadonlyDataRefValue): DataRefValue {
    switch (value.type) {
        case DataRefType.IntArray:
            return { type: DataRefType.IntArray, value: [...value.value] };
        case DataRefType.FloatArray:
            return { type: DataRefType.FloatArray, value: [...value.value] };
        case DataRefType.Int:
            return { type: DataRefType.Int, value: value.value };
        case DataRefType.Float:
            return { type: DataRefType.Float, value: value.value };
    }
}

/**
 * Latest known value of a dataref, as held by the client-side store.
 * The store owns the value; it is never shared with the reader that produced it.
 */
export interface DataRefSnapshot {
    readonly name: DataRefName;
    readonly value: ReadonlyDataRefValue;
    readonly updatedAt: Date;
}
