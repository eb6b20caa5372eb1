// Small general-purpose helpers

export const REDACTED = '[Redacted]';

// Masks the value of a query parameter in a raw path+query string
export function redactQueryParam(url: string, name: string): string {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return url.replace(new RegExp(`([?&]${escaped}=)[^&#]*`, 'g'), `$1${REDACTED}`);
}

// Absolute URL of the request exactly as it was received
export function absoluteRequestUrl(req: { protocol: string; host: string; url: string }): string {
  return `${req.protocol}://${req.host}${req.url}`;
}
