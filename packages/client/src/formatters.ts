/**
 * @file formatters.ts
 * @description Text rendering of dataref values and poll results for the command line.
 * @module DataRefBridge/Client
 */

import { DataRefSubscription, DataRefType, DataRefValue, formatReadFailure, ReadonlyDataRefValue } from '@datarefbridge/shared';
import { ReadResult } from './core/services/DataRefClient';

/**
 * Renders a value for display. Arrays are bracketed, unlike on the wire.
 */
export function formatDataRefValue(value: ReadonlyDataRefValue): string {
    switch (value.type) {
        case DataRefType.Int:
        case DataRefType.Float:
            return String(value.value);
        case DataRefType.IntArray:
        case DataRefType.FloatArray:
            return `[${value.value.join(', ')}]`;
    }
}

/**
 * Renders one poll result as `<label>: <value>`, or `<label>: unavailable (<reason>)` for a failed read.
 */
export function formatPollLine(subscription: DataRefSubscription, result: ReadResult<DataRefValue>): string {
    const label = subscription.label ?? subscription.name;
    if (!result.success) {
        return `${label}: unavailable (${formatReadFailure(result.error)})`;
    }
    return `${label}: ${formatDataRefValue(result.value)}`;
}
