/**
 * File: tools/timing-engine.ts
 * Summary: CLI entry point that runs the timing engine against a live feed or a captured file.
 */

import { createApplicationLogger } from '../src/dependencies/logger';
import { createEngineContext, createFeedClient } from '../src/dependencies/engine';
import {
  EnvironmentValidationError,
  getEnvironment,
  type EngineEnvironment,
} from '../src/server/config/environment';

import { parseCliArgs, runListen, runReplay, USAGE } from './timing-engine/commands';

const main = async () => {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.name === 'help') {
    process.stdout.write(`${USAGE}\n`);
    process.exitCode = 1;
    return;
  }

  let environment: EngineEnvironment;
  try {
    environment = getEnvironment();
  } catch (error) {
    if (!(error instanceof EnvironmentValidationError)) {
      throw error;
    }

    for (const issue of error.issues) {
      console.error(`${issue.key}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }

  const logger = createApplicationLogger(environment);

  try {
    if (command.name === 'replay') {
      const context = await createEngineContext(environment, logger, {
        publishToDisk: command.publish,
      });
      await runReplay(command, context, process.stdout, logger);
      return;
    }

    const context = await createEngineContext(environment, logger);
    const client = createFeedClient(environment, context, logger);
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    process.once('SIGTERM', () => controller.abort());

    logger.info('Timing feed listener starting.', {
      event: 'tools.timing_engine.listen.start',
      host: environment.feed.host,
      port: environment.feed.port,
    });

    await runListen(client, context.engine, controller.signal, logger);
  } catch (error) {
    logger.error('Timing engine command failed.', {
      event: 'tools.timing_engine.error',
      outcome: 'failure',
      command: command.name,
      error,
    });
    process.exitCode = 1;
  }
};

void main();
