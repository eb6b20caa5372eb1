import { fetchTicketmasterEvents } from '../../adapters/events/ticketmaster.js';
import type { TicketmasterClientOptions } from '../../adapters/events/ticketmaster.js';
import { UpstreamError } from '../../shared/errors.js';
import type { CityEventsQuery, EventsResponse } from './city-events.schemas.js';
import { toEventsResponse } from './city-events.translator.js';

export type CityEventsResult =
    | { kind: 'events'; upstreamStatus: number; response: EventsResponse }
    | { kind: 'unauthorized'; upstreamStatus: 401; fault: unknown };

export class CityEventsService {
    constructor(private readonly client: TicketmasterClientOptions = {}) {}

    // Throws UpstreamError for any upstream status other than 2xx and 401
    async search(query: CityEventsQuery, selfUrl: string): Promise<CityEventsResult> {
        const upstream = await fetchTicketmasterEvents(
            { apiKey: query.api_key, city: query.city, postalCode: query.postal_code },
            this.client,
        );

        if (upstream.status === 401) {
            return { kind: 'unauthorized', upstreamStatus: 401, fault: upstream.body };
        }
        if (upstream.status < 200 || upstream.status >= 300) {
            throw new UpstreamError(upstream.status);
        }
        return {
            kind: 'events',
            upstreamStatus: upstream.status,
            response: toEventsResponse(selfUrl, upstream.body),
        };
    }
}
