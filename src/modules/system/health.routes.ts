import type {FastifyInstance} from 'fastify';
import {z} from 'zod';
import type {ZodTypeProvider} from 'fastify-type-provider-zod';
import type {AppConfig} from '../../config/env.js';

// Health and version endpoints (root-level)
export default async function healthRoutes(app: FastifyInstance) {
    const zodApp = app.withTypeProvider<ZodTypeProvider>();
    const config: AppConfig = app.config;
    zodApp.get(
        '/health_check',
        {
            schema: {
                description: 'Liveness probe; does not reach the upstream',
                tags: ['system'],
                hide: true,
                response: {
                    200: z.object({status: z.literal('pass')}),
                },
            },
        },
        async () => ({status: 'pass'} as const)
    );

    zodApp.get(
        '/version',
        {
            schema: {
                description: 'Returns service version',
                tags: ['system'],
                response: {200: z.object({version: z.string()})},
            },
        },
        async () => ({version: config.SWAGGER_VERSION})
    );
}
