import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { ArtifactCache, buildArtifactCatalog } from './modules/artifacts/index.js';
import { InsightsService, registerInsightsRoutes } from './modules/insights/index.js';

export interface BuildAppOptions {
  env: Env;
  // Injected in tests to observe cache behaviour across requests
  cache?: ArtifactCache;
}

/**
 * Build Fastify Application
 */
export function buildApp({ env, cache }: BuildAppOptions): FastifyInstance {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      app.log.warn({ code: err.code, details: err.details }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  const artifactCache = cache ?? new ArtifactCache({ logger: app.log });
  const service = new InsightsService({
    cache: artifactCache,
    catalog: buildArtifactCatalog({ outputsDir: env.outputsDir, dataDir: env.dataDir }),
    logger: app.log,
  });

  app.register(
    async (instance) => {
      await registerInsightsRoutes(instance, {
        service,
        defaultHorizon: env.FORECAST_DEFAULT_HORIZON,
        maxHorizon: env.FORECAST_MAX_HORIZON,
      });
    },
    { prefix: '/api/insights' }
  );

  return app;
}
