import { TicketmasterEventSchema, TicketmasterPayloadSchema } from './city-events.schemas.js';
import type { EventSummary, EventsResponse } from './city-events.schemas.js';

// Keeps only id/name/url; absent name or url stays absent
function toEventSummary(raw: unknown): EventSummary | undefined {
    const parsed = TicketmasterEventSchema.safeParse(raw);
    if (!parsed.success) return undefined;
    const { id, name, url } = parsed.data;
    const summary: EventSummary = { id };
    if (name !== undefined) summary.name = name;
    if (url !== undefined) summary.url = url;
    return summary;
}

/**
 * Reshapes a Ticketmaster events payload into the service's response.
 * A payload without `_embedded.events` (no events found, or an unexpected shape)
 * yields an empty list. Entries without a string id are dropped.
 */
export function toEventsResponse(selfUrl: string, body: unknown): EventsResponse {
    const payload = TicketmasterPayloadSchema.safeParse(body);
    const rawEvents = payload.success ? payload.data._embedded?.events ?? [] : [];
    const events = rawEvents.flatMap((raw) => {
        const summary = toEventSummary(raw);
        return summary ? [summary] : [];
    });
    return { links: { self: selfUrl }, events };
}
