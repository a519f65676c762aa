/**
 * @file index.ts
 * @description Public API of the mock responder package.
 * @module DataRefBridge/MockResponder
 */

export * from './MockResponder';
export * from './mockTable';
