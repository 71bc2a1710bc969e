/**
 * File: src/core/infra/index.ts
 * Summary: Barrel exports for infrastructure adapters.
 */

export * from './config/pointsScaleCatalogue';
export * from './feed/feedConnectionError';
export * from './feed/feedFile';
export * from './feed/tcpFeedClient';
export * from './logger/pinoLogger';
export * from './memory/inMemoryOfficialResultRepository';
export * from './publishing/jsonFileResultPublisher';
export * from './publishing/loggingResultPublisher';
