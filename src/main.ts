import { CommanderError } from 'commander';
import { buildServer } from './api/server';
import { resolveConfig, type ExporterConfig } from './config/cli';
import { createLogger, type Logger } from './config/logger';
import { createExporter } from './exporter';
import { ConfigurationError } from './utils/errors';

export interface MainOptions {
  /** Replaces the logger built from the configured level */
  logger?: Logger;
  /** Stops the exporter; SIGINT and SIGTERM are used when absent */
  signal?: AbortSignal;
}

/**
 * Resolve configuration, start the scrape server and run the polling loop
 * until shutdown. Resolves with the process exit code.
 *
 * Errors raised before the configuration is resolved reject; anything later
 * is logged as fatal and yields exit code 1.
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv, options: MainOptions = {}): Promise<number> {
  const startedAt = new Date();

  let config: ExporterConfig;
  try {
    config = resolveConfig(argv, env, startedAt);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const logger = options.logger ?? createLogger(config.logLevel);
  try {
    await serve(config, env, startedAt, logger, options.signal ?? shutdownSignal(logger));
    return 0;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.fatal({ err }, `Configuration error: ${err.message}`);
    } else {
      logger.fatal({ err }, 'Exporter failed');
    }
    return 1;
  }
}

async function serve(
  config: ExporterConfig,
  env: NodeJS.ProcessEnv,
  startedAt: Date,
  logger: Logger,
  signal: AbortSignal
): Promise<void> {
  const exporter = await createExporter(config, {
    logger,
    env,
    startedAt,
    defaultMetrics: true,
  });

  const app = buildServer({ sink: exporter.sink, logger });
  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(`Beginning to serve metrics on port ${config.port}`);

  try {
    await exporter.scheduler.run(signal);
  } finally {
    await app.close();
  }
}

function shutdownSignal(logger: Logger): AbortSignal {
  const shutdown = new AbortController();
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, exiting`);
      shutdown.abort();
    });
  }
  return shutdown.signal;
}
