import Fastify from 'fastify';
import cors from '@fastify/cors';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUI from '@fastify/swagger-ui';
import {
  type ZodTypeProvider,
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import errorsPlugin from './plugins/errors.js';
import logger from './plugins/logger.js';
import registerModules from './modules/index.js';
import { config, corsOrigins } from './config/env.js';
import type { AppConfig } from './config/env.js';

export type CreateAppOptions = {
  config?: AppConfig;
  // replaces the global fetch for upstream calls
  fetch?: typeof fetch;
};

// Factory that creates and configures Fastify instance (app-level setup)
export async function createApp(options: CreateAppOptions = {}) {
  const appConfig = options.config ?? config;
  const app = Fastify({
      loggerInstance: logger,
      trustProxy: true
  }).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  // Expose validated configuration on app instance for typed access in routes/services (see config/env.ts)
  app.decorate('config', appConfig);

  const allowedOrigins = corsOrigins(appConfig);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allowedOrigins === '*') return cb(null, true);
      if (allowedOrigins.has(origin)) return cb(null, origin);
      return cb(new Error('Origin not allowed by CORS'), false);
    },
  });
  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: appConfig.SWAGGER_TITLE,
        version: appConfig.SWAGGER_VERSION,
        description: 'Stateless service that provides events listed in Ticketmaster, filtered on the basis of city and other parameters.',
      },
      servers: [
        { url: '/', description: 'Current host' },
      ],
      tags: [
        { name: 'system', description: 'Health and service info' },
        { name: 'events', description: 'City events proxied from Ticketmaster' },
      ],
    },
    transform: jsonSchemaTransform,
  });
  await app.register(fastifySwaggerUI, {
      routePrefix: '/docs',
      uiConfig: {
          docExpansion: 'list',
      }
  });

  await app.register(errorsPlugin);

  // Register all domain modules (routes)
  await app.register(registerModules, { fetch: options.fetch });

  return app;
}
