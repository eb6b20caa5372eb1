import { z } from 'zod';
import type { ErrorDetail } from '../../shared/errors.js';

export const CityEventsQuerySchema = z.object({
    api_key: z.string().min(1, 'must not be empty')
        .describe('Ticketmaster API key. This key is passed directly to Ticketmaster'),
    city: z.string().min(1, 'must not be empty')
        .describe('City in which the events are to be found out'),
    postal_code: z.string().optional()
        .describe('Postal code of the area where the events are to be found out'),
    search_id: z.coerce.string().regex(/^-?\d+$/, 'must be an integer').transform(Number).optional()
        .describe('Caller-side identifier of the search, only used in logs'),
});

export type CityEventsQuery = z.infer<typeof CityEventsQuerySchema>;

export const EventSummarySchema = z.object({
    id: z.string(),
    name: z.string().optional(),
    url: z.string().optional(),
});

export type EventSummary = z.infer<typeof EventSummarySchema>;

export const LinksSchema = z.object({
    // echoed as received, forwarded headers included
    self: z.string().describe('URL of this request'),
});

export const EventsResponseSchema = z.object({
    links: LinksSchema,
    events: z.array(EventSummarySchema),
});

export type EventsResponse = z.infer<typeof EventsResponseSchema>;

export const ErrorResponseSchema = z.object({
    detail: z.array(z.object({
        loc: z.array(z.union([z.string(), z.number()])).optional(),
        msg: z.string(),
        type: z.string().optional(),
    })),
});

export const UpstreamFaultSchema = z.unknown()
    .describe('Ticketmaster fault body, passed through unchanged (e.g. Invalid ApiKey)');

// Subset of the Ticketmaster events payload the translator reads
export const TicketmasterPayloadSchema = z.object({
    _embedded: z.object({
        events: z.array(z.unknown()).optional(),
    }).optional(),
});

export const TicketmasterEventSchema = z.object({
    id: z.string(),
    name: z.string().optional().catch(undefined),
    url: z.string().optional().catch(undefined),
});

export type QueryParseResult =
    | { success: true; data: CityEventsQuery }
    | { success: false; issues: ErrorDetail[] };

export function parseCityEventsQuery(query: unknown): QueryParseResult {
    const parsed = CityEventsQuerySchema.safeParse(query);
    if (parsed.success) {
        return { success: true, data: parsed.data };
    }
    return {
        success: false,
        issues: parsed.error.issues.map((issue) => ({
            loc: ['query', ...issue.path],
            msg: issue.message,
        })),
    };
}
