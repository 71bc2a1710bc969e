export * from './connectors/feed';
export * from './errors/concurrentPublishError';
export * from './errors/invalidGridInputError';
export * from './errors/invalidPenaltyParamsError';
export * from './errors/noProvisionalDataError';
export * from './errors/officialResultNotFoundError';
export * from './errors/resultsEngineError';
export * from './errors/resultVersionConflictError';
export * from './errors/unknownCompetitorError';
export * from './errors/unknownSessionError';
export * from './ports/logger';
export * from './ports/officialResultRepository';
export * from './ports/pointsScaleProvider';
export * from './ports/resultPublisher';
export * from './services/feedHub';
export * from './services/officialResults';
export * from './services/penaltyLedger';
export * from './services/prefinalGrid';
export * from './services/provisionalAggregator';
export * from './services/publicationDispatcher';
export * from './services/resultsEngine';
export * from './services/sessionConfig';
export * from './services/sessionRegistry';
