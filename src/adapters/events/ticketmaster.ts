/*
 Ticketmaster Discovery API client: one GET per call, response handed back unmodified.
 Docs: https://developer.ticketmaster.com/products-and-docs/apis/discovery-api/v2/
*/
import { TICKETMASTER_EVENTS_URL } from '../../config/env.js';

export type CityEventSearchParams = {
  apiKey: string;
  city: string;
  postalCode?: string;
};

export type UpstreamResponse = {
  status: number;
  // parsed JSON body, null when the body is empty or not JSON
  body: unknown;
};

export type TicketmasterClientOptions = {
  baseUrl?: string;
  fetch?: typeof fetch;
};

export function buildTicketmasterUrl(params: CityEventSearchParams, baseUrl: string = TICKETMASTER_EVENTS_URL): URL {
  const url = new URL(baseUrl);
  url.searchParams.set('apikey', params.apiKey);
  url.searchParams.set('city', params.city);
  if (params.postalCode) url.searchParams.set('postalCode', params.postalCode);
  return url;
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

// Network failures reject; every HTTP status resolves.
export async function fetchTicketmasterEvents(
  params: CityEventSearchParams,
  options: TicketmasterClientOptions = {},
): Promise<UpstreamResponse> {
  const doFetch = options.fetch ?? fetch;
  const url = buildTicketmasterUrl(params, options.baseUrl);
  const res = await doFetch(url.toString(), { headers: { Accept: 'application/json' } });
  const text = await res.text();
  return { status: res.status, body: parseJson(text) };
}
