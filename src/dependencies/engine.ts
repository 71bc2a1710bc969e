/**
 * File: src/dependencies/engine.ts
 * Summary: Composition root wiring the results engine to its configured adapters.
 */

import {
  createResultsEngine,
  createSessionConfigResolver,
  FeedDecoder,
  type Logger,
  type ResultPublisher,
  type ResultsEngine,
} from '@core/app';
import {
  InMemoryOfficialResultRepository,
  JsonFileResultPublisher,
  LoggingResultPublisher,
  PointsScaleCatalogue,
  TcpFeedClient,
} from '@core/infra';

import type { EngineEnvironment } from '@/server/config/environment';

import { getComponentLogger } from './logger';

export type EngineContext = {
  engine: ResultsEngine;
  catalogue: PointsScaleCatalogue;
  createDecoder: () => FeedDecoder;
};

export const createEngineContext = async (
  environment: EngineEnvironment,
  logger: Logger,
  options: { publishToDisk?: boolean } = {},
): Promise<EngineContext> => {
  const catalogue = await PointsScaleCatalogue.load(environment.results.pointsScalesPath);
  const requireScale = (schemeId: string) => {
    const scale = catalogue.get(schemeId);
    if (!scale) {
      throw new Error(`Points scheme "${schemeId}" is not defined in ${environment.results.pointsScalesPath}.`);
    }
    return scale;
  };

  const heatScale = requireScale(environment.results.pointsSchemeId);
  const { otherPointsSchemeId } = environment.results;

  const publishers: ResultPublisher[] = [
    new LoggingResultPublisher(getComponentLogger(logger, 'result-log-publisher')),
  ];
  if (options.publishToDisk ?? true) {
    publishers.push(new JsonFileResultPublisher(environment.results.publishDirectory));
  }

  const engine = createResultsEngine({
    resolveSessionConfig: createSessionConfigResolver({
      rankingMode: environment.results.rankingMode,
      pointsScales: {
        qualifying: requireScale(environment.results.qualifyingPointsSchemeId),
        heat: heatScale,
        other: otherPointsSchemeId === null ? null : requireScale(otherPointsSchemeId),
      },
      minValidLapMs: environment.results.minValidLapMs,
    }),
    repository: new InMemoryOfficialResultRepository(),
    scales: catalogue,
    defaultSchemeId: heatScale.schemeId,
    publishers,
    logger: getComponentLogger(logger, 'results-engine'),
  });

  const decoderLogger = getComponentLogger(logger, 'feed-decoder');
  const createDecoder = () =>
    new FeedDecoder({
      maxPacketBytes: environment.feed.maxPacketBytes,
      onIssue: (issue) =>
        decoderLogger.warn('Feed packet skipped.', {
          event: `feed.packet.${issue.kind}`,
          outcome: 'skipped',
          reason: issue.reason,
          packet: issue.packet,
        }),
    });

  return { engine, catalogue, createDecoder };
};

export const createFeedClient = (
  environment: EngineEnvironment,
  context: EngineContext,
  logger: Logger,
): TcpFeedClient =>
  new TcpFeedClient({
    host: environment.feed.host,
    port: environment.feed.port,
    connectTimeoutMs: environment.feed.connectTimeoutMs,
    idleTimeoutMs: environment.feed.idleTimeoutMs,
    autoReconnect: environment.feed.autoReconnect,
    decoder: context.createDecoder(),
    logger: getComponentLogger(logger, 'feed-client'),
    onEvent: (event) => context.engine.ingest(event),
  });
