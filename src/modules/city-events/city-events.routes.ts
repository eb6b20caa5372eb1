import type { FastifyPluginAsync } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { TicketmasterClientOptions } from '../../adapters/events/ticketmaster.js';
import type { AppConfig } from '../../config/env.js';
import { absoluteRequestUrl } from '../../shared/utils.js';
import {
    CityEventsQuerySchema,
    ErrorResponseSchema,
    EventsResponseSchema,
    UpstreamFaultSchema,
    parseCityEventsQuery,
} from './city-events.schemas.js';
import { CityEventsService } from './city-events.service.js';

export type CityEventsRoutesOptions = {
    fetch?: TicketmasterClientOptions['fetch'];
};

// The trailing-slash form is the documented one; the bare path is an alias.
const PATHS = [
    { url: '/city_events/', hide: false },
    { url: '/city_events', hide: true },
] as const;

export const cityEventsRoutes: FastifyPluginAsync<CityEventsRoutesOptions> = async (app, opts) => {
    const zodApp = app.withTypeProvider<ZodTypeProvider>();
    const config: AppConfig = app.config;
    const service = new CityEventsService({
        baseUrl: config.TICKETMASTER_BASE_URL,
        fetch: opts.fetch,
    });

    for (const path of PATHS) {
        zodApp.get(
            path.url,
            {
                // the handler owns query validation and answers 422 itself
                attachValidation: true,
                schema: {
                    description: 'Get the details of the events taking place in a particular city',
                    tags: ['events'],
                    hide: path.hide,
                    querystring: CityEventsQuerySchema,
                    response: {
                        200: EventsResponseSchema,
                        401: UpstreamFaultSchema,
                        422: ErrorResponseSchema,
                    },
                },
            },
            async (request, reply) => {
                const parsed = parseCityEventsQuery(request.query);
                if (!parsed.success) {
                    request.log.warn({ issues: parsed.issues }, 'invalid city events query');
                    return reply.code(422).send({ detail: parsed.issues });
                }

                const { city, postal_code: postalCode, search_id: searchId } = parsed.data;
                const result = await service.search(parsed.data, absoluteRequestUrl(request));
                request.log.info({ city, postalCode, searchId, upstreamStatus: result.upstreamStatus }, 'city events fetched');

                if (result.kind === 'unauthorized') {
                    return reply.code(401).send(result.fault);
                }
                return reply.code(200).send(result.response);
            }
        );
    }
};
