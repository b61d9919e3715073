import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { AnalysisFailure, Taxonomy } from './types/index.js';
import type { AnalyzerConfig } from './config/index.js';
import type { CompletionGateway } from './gateway/index.js';
import { analyzeComplaint, httpStatusFor } from './orchestrator/index.js';
import { isCategory, listDepartments, listTags, routeFor, tagsFor } from './taxonomy/index.js';

export const VERSION = '1.0.0';

const AnalyzeBodySchema = z.object({
  text: z.string({ required_error: 'text is required' }),
  submitted_at: z.string().datetime({ offset: true }).optional(),
  location: z
    .object({
      lat: z.number().min(-90).max(90),
      lng: z.number().min(-180).max(180)
    })
    .optional()
});

export interface ServerDeps {
  config: AnalyzerConfig;
  logger: Logger;
  gateway: CompletionGateway;
  taxonomy: Taxonomy;
  generateId?: () => string;
  now?: () => Date;
}

function corsOrigins(allowed: readonly string[]): (string | RegExp)[] {
  return allowed.map(origin => {
    if (!origin.includes('*')) return origin;
    const escaped = origin.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
    return new RegExp('^' + escaped + '$');
  });
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, logger, gateway, taxonomy } = deps;

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: corsOrigins(config.cors.allowed_origins),
    methods: ['GET', 'POST']
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.get('/health', async () => ({
    status: 'healthy',
    version: VERSION,
    backend: config.model.backend,
    model: config.model.name,
    taxonomy_version: taxonomy.version
  }));

  app.get('/taxonomy', async () => ({
    version: taxonomy.version,
    categories: taxonomy.categories,
    severities: taxonomy.severities
  }));

  app.get('/severities', async () => ({ severities: taxonomy.severities }));

  app.get('/tags', async () => listTags(taxonomy));

  app.get<{ Params: { category: string } }>('/tags/:category', async (request, reply) => {
    const { category } = request.params;
    if (!isCategory(taxonomy, category)) {
      reply.status(404);
      return { error: `Unknown category: ${category}` };
    }
    return { category, tags: tagsFor(taxonomy, category) };
  });

  app.get('/departments', async () => listDepartments());

  app.get<{ Params: { category: string } }>('/departments/:category', async (request, reply) => {
    const { category } = request.params;
    if (!isCategory(taxonomy, category)) {
      reply.status(404);
      return { error: `Unknown category: ${category}` };
    }
    return routeFor(category);
  });

  app.post('/analyze', async (request, reply) => {
    const body = AnalyzeBodySchema.safeParse(request.body);

    if (!body.success) {
      const failure: AnalysisFailure = {
        request_id: deps.generateId ? deps.generateId() : uuidv4(),
        error_kind: 'InvalidRequest',
        message: body.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
      };
      logger.warn({ request_id: failure.request_id, message: failure.message }, 'Rejected analyze request');
      reply.status(httpStatusFor('InvalidRequest'));
      return failure;
    }

    // A client that disconnects mid-analysis aborts the model call
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.on('close', onClose);

    try {
      const outcome = await analyzeComplaint(
        body.data,
        {
          gateway,
          taxonomy,
          maxInputLength: config.analysis.max_input_chars,
          logger,
          generateId: deps.generateId,
          now: deps.now
        },
        controller.signal
      );

      if (outcome.ok) {
        return outcome.value;
      }

      const failure: AnalysisFailure = {
        request_id: outcome.requestId,
        error_kind: outcome.error.kind,
        message: outcome.error.message
      };
      reply.status(httpStatusFor(outcome.error.kind));
      return failure;
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  return app;
}
