/**
 * @file DataRefStore.ts
 * @description Latest known value per dataref, written only from the client's completion path.
 * @module DataRefBridge/Client
 */

import { copyDataRefValue, DataRefName, DataRefSnapshot, Logger, ReadonlyDataRefValue } from '@datarefbridge/shared';

export type SnapshotListener = (snapshot: DataRefSnapshot) => void;

/**
 * Read-only view of the store handed to application code.
 */
export interface ReadonlyDataRefStore {
    get(name: DataRefName): DataRefSnapshot | undefined;
    entries(): DataRefSnapshot[];
    subscribe(listener: SnapshotListener): () => void;
}

/**
 * Holds the latest successfully read value of every dataref.
 * Failed reads leave the previous value in place.
 */
export class DataRefStore implements ReadonlyDataRefStore {
    private readonly snapshots = new Map<DataRefName, DataRefSnapshot>();
    private readonly listeners = new Set<SnapshotListener>();
    private readonly logger = new Logger('DataRefStore');

    public get(name: DataRefName): DataRefSnapshot | undefined {
        return this.snapshots.get(name);
    }

    /** All snapshots, in first-seen order. */
    public entries(): DataRefSnapshot[] {
        return [...this.snapshots.values()];
    }

    /**
     * @returns A function that removes the listener.
     */
    public subscribe(listener: SnapshotListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Records a copy of a freshly read value and notifies subscribers.
     */
    public record(name: DataRefName, value: ReadonlyDataRefValue, updatedAt: Date = new Date()): DataRefSnapshot {
        const snapshot: DataRefSnapshot = { name, value: copyDataRefValue(value), updatedAt };
        this.snapshots.set(name, snapshot);
        for (const listener of this.listeners) {
            try {
                listener(snapshot);
            } catch (error) {
                this.logger.error(`Snapshot listener failed for ${name}:`, error);
            }
        }
        return snapshot;
    }

    public clear(): void {
        this.snapshots.clear();
    }
}
