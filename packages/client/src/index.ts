/**
 * @file index.ts
 * @description Public API of the dataref client package.
 * @module DataRefBridge/Client
 */

export * from './core/ports/IDatagramTransport';
export * from './core/services/RequestCorrelator';
export * from './core/services/DataRefClient';
export * from './core/services/DataRefStore';
export * from './core/services/DataRefPoller';
export * from './adapters/udp/DatagramInbox';
export * from './adapters/udp/UdpTransport';
export * from './config';
export * from './formatters';
export * from './cliLogger';
