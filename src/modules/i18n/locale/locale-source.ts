import type { IncomingHttpHeaders } from 'http';

/**
 * Read side of the transport: one header and one query/form parameter.
 */
export interface LocaleSource {
  header(name: string): string | undefined;
  param(name: string): string | undefined;
}

/**
 * The parts of an express request the resolver reads.
 */
export interface HttpRequestLike {
  readonly headers: IncomingHttpHeaders;
  readonly query?: unknown;
  readonly body?: unknown;
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

function field(container: unknown, name: string): unknown {
  if (!container || typeof container !== 'object') return undefined;
  return Object.prototype.hasOwnProperty.call(container, name)
    ? Reflect.get(container, name)
    : undefined;
}

/**
 * Header names are matched case-insensitively (node lowercases them); the
 * parameter is read from the query string first, then from a parsed body.
 */
export function fromHttpRequest(request: HttpRequestLike): LocaleSource {
  return {
    header: (name) => firstString(request.headers[name.toLowerCase()]),
    param: (name) =>
      firstString(field(request.query, name)) ??
      firstString(field(request.body, name)),
  };
}

export function fromRecords(
  headers: Readonly<Record<string, string | undefined>>,
  params: Readonly<Record<string, string | undefined>> = {},
): LocaleSource {
  const lowered = new Map(
    Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]),
  );
  return {
    header: (name) => lowered.get(name.toLowerCase()),
    param: (name) => params[name],
  };
}
