import { loadConfig, ConfigError } from './config/index.js';
import { createLogger } from './logger.js';
import { createBackend, ModelGateway } from './gateway/index.js';
import { getTaxonomy } from './taxonomy/index.js';
import { buildServer } from './app.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.log);

  logger.info('Complaint analyzer starting...');

  const taxonomy = getTaxonomy(config.analysis.taxonomy_version);
  if (!taxonomy) {
    throw new ConfigError(`Unknown taxonomy version ${config.analysis.taxonomy_version}`);
  }

  const backend = createBackend({
    type: config.model.backend,
    model: config.model.name,
    apiKey: config.model.api_key,
    baseUrl: config.model.base_url,
    temperature: config.model.temperature,
    maxOutputTokens: config.model.max_output_tokens
  });

  const gateway = new ModelGateway(backend, {
    timeoutMs: config.gateway.timeout_ms,
    retry: {
      maxAttempts: config.gateway.max_attempts,
      baseDelayMs: config.gateway.base_delay_ms,
      maxDelayMs: config.gateway.max_delay_ms
    },
    logger
  });

  const app = await buildServer({ config, logger, gateway, taxonomy });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(
      { backend: backend.type, model: backend.model, taxonomy_version: taxonomy.version },
      `Complaint analyzer listening on ${config.server.host}:${config.server.port}`
    );
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
