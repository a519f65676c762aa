/**
 * @file index.ts
 * @description Entry point for the shared dataref bridge module, exporting the data models,
 * the wire protocol codec, error types and the logger.
 * @module DataRefBridge/Shared
 */

export * from './data-models';
export * from './wire-protocol';
export * from './logger';
export * from './error-types';
