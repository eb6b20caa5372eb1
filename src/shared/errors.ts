// Common error classes and Fastify error mapping utilities

export type ErrorDetail = { loc?: Array<string | number>; msg: string; type?: string };
export type ErrorBody = { detail: ErrorDetail[] };

export class AppError extends Error {
  statusCode: number;
  code?: string;
  constructor(message: string, statusCode = 400, options?: { code?: string }) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not Found') {
    super(message, 404, { code: 'NOT_FOUND' });
    this.name = 'NotFoundError';
  }
}

// Upstream answered with a status the proxy has no contract for
export class UpstreamError extends AppError {
  upstreamStatus: number;
  constructor(upstreamStatus: number) {
    super(`Upstream responded with HTTP ${upstreamStatus}`, 502, { code: 'UPSTREAM_ERROR' });
    this.name = 'UpstreamError';
    this.upstreamStatus = upstreamStatus;
  }
}

export function errorBody(msg: string, type?: string): ErrorBody {
  return { detail: [type ? { msg, type } : { msg }] };
}

function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('statusCode' in err)) return undefined;
  const { statusCode } = err;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : undefined;
}

export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, body: errorBody(err.message, err.code) };
  }
  // Fastify's own errors (bad content type, body too large, ...) carry a 4xx status
  const clientStatus = clientStatusOf(err);
  if (clientStatus !== undefined && err instanceof Error) {
    return { statusCode: clientStatus, body: errorBody(err.message) };
  }
  return { statusCode: 500, body: errorBody('Internal Server Error') };
}
