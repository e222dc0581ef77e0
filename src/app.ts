import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';

import type { Container } from './container.js';
import { AppError } from './errors.js';
import { prettyTransport } from './logger.js';
import { assessmentRoutes } from './routes/assessment.routes.js';
import { healthRoutes } from './routes/health.routes.js';
import { scoringRoutes } from './routes/scoring.routes.js';

export interface BuildAppOptions {
  /** Request log level, or false to turn request logging off */
  logLevel: string | false;
  rateLimit: {
    max: number;
    timeWindowMs: number;
  };
}

export async function buildApp(container: Container, options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger:
      options.logLevel === false
        ? false
        : {
            level: options.logLevel,
            transport: prettyTransport(),
          },
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  await app.register(rateLimit, {
    max: options.rateLimit.max,
    timeWindow: options.rateLimit.timeWindowMs,
  });

  // Error handler (must precede the routes)
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: error.message,
        statusCode: error.statusCode,
      });
    }

    // Schema validation and rate limiting carry a 4xx status of their own
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode === 500) {
      request.log.error(error);
    }
    return reply.status(statusCode).send({
      error: statusCode === 500 ? 'Internal Server Error' : error.message,
      statusCode,
    });
  });

  // Register routes
  await app.register(healthRoutes, {
    prefix: '/api/v1',
    retractions: container.retractions,
    watchlists: container.watchlists,
    assessment: container.assessment,
  });
  await app.register(scoringRoutes, { prefix: '/api/v1', engine: container.engine });
  await app.register(assessmentRoutes, { prefix: '/api/v1', assessment: container.assessment });

  return app;
}
