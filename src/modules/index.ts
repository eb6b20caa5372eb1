import type { FastifyInstance } from 'fastify';
import healthRoutes from './system/health.routes.js';
import { cityEventsRoutes } from './city-events/city-events.routes.js';
import type { CityEventsRoutesOptions } from './city-events/city-events.routes.js';

export type ModulesOptions = CityEventsRoutesOptions;

// Registers all domain modules; routes live at the root, no prefix
export default async function registerModules(app: FastifyInstance, opts: ModulesOptions) {
  await app.register(healthRoutes);
  await app.register(cityEventsRoutes, { fetch: opts.fetch });
}
