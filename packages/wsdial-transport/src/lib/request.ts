/**
 * Request Normalizer
 *
 * Turns loosely-typed caller input (URL text, a URL, or a url + headers record)
 * into the canonical ClientRequest descriptor consumed by the rest of the pipeline.
 */

import { Effect, Schema, pipe } from 'effect';
import { requestError, type RequestConstructionError } from './errors';

// ============================================================================
// Request Descriptor
// ============================================================================

export const Port = pipe(Schema.Int, Schema.between(0, 65535));

export const Header = Schema.Tuple(Schema.String, Schema.String);
export type Header = typeof Header.Type;

/**
 * Canonical request descriptor. Immutable once normalized.
 * `host` never carries IPv6 brackets; `path` includes the query string.
 */
export const ClientRequest = Schema.TaggedStruct('ClientRequest', {
  url: Schema.String,
  scheme: Schema.String,
  host: Schema.String,
  port: Schema.optionalWith(Port, { exact: true }),
  path: Schema.String,
  headers: Schema.Array(Header),
});
export type ClientRequest = typeof ClientRequest.Type;

export const isClientRequest = Schema.is(ClientRequest);

export type HeaderPairs = ReadonlyArray<readonly [string, string]>;

export interface ClientRequestInit {
  readonly url: string | URL;
  readonly headers?: Readonly<Record<string, string>> | HeaderPairs;
}

export type RequestInput = string | URL | ClientRequestInit | ClientRequest;

// ============================================================================
// Validation
// ============================================================================

const headerNamePattern = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const forbiddenValueCharacters = /[\r\n\0]/;

const isHeaderPairs = (
  headers: Readonly<Record<string, string>> | HeaderPairs
): headers is HeaderPairs => Array.isArray(headers);

const toHeaderPairs = (headers: ClientRequestInit['headers']): HeaderPairs => {
  if (headers === undefined) return [];
  return isHeaderPairs(headers) ? headers : Object.entries(headers);
};

const validateHeader =
  (input: string) =>
  ([name, value]: readonly [string, string]): Effect.Effect<Header, RequestConstructionError> => {
    if (!headerNamePattern.test(name)) {
      return Effect.fail(requestError.invalidHeader(input, name, 'name is not a valid token'));
    }
    if (forbiddenValueCharacters.test(value)) {
      return Effect.fail(
        requestError.invalidHeader(input, name, 'value contains a forbidden character')
      );
    }
    return Effect.succeed([name, value] as const);
  };

const validateHeaders = (input: string, headers: HeaderPairs) =>
  Effect.forEach(headers, validateHeader(input));

// ============================================================================
// URL Handling
// ============================================================================

const parseUrl = (input: string): Effect.Effect<URL, RequestConstructionError> =>
  Effect.try({
    try: () => new URL(input),
    catch: (cause) => requestError.invalidUrl(input, cause),
  });

const copyUrl = (url: URL): Effect.Effect<URL, RequestConstructionError> =>
  parseUrl(url.href);

// The URL parser drops a port equal to its scheme's default (http:80, ftp:21).
const authorityPattern = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/([^/?#]*)/;
const trailingPortPattern = /:(\d+)$/;

const writtenPort = (input: string): number | undefined => {
  const authority = authorityPattern.exec(input.trim())?.[1];
  if (authority === undefined) return undefined;
  const digits = trailingPortPattern.exec(authority.slice(authority.lastIndexOf('@') + 1))?.[1];
  return digits === undefined ? undefined : Number(digits);
};

const portOf = (input: string, url: URL): number | undefined =>
  url.port !== '' ? Number(url.port) : writtenPort(input);

export const unbracketHost = (hostname: string): string =>
  hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;

const buildRequest =
  (input: string, url: URL) =>
  (headers: ReadonlyArray<Header>): Effect.Effect<ClientRequest, RequestConstructionError> => {
    const host = unbracketHost(url.hostname);
    if (host === '') {
      return Effect.fail(requestError.missingHost(input));
    }
    url.hash = '';
    const port = portOf(input, url);
    return Effect.succeed(
      ClientRequest.make({
        url: url.href,
        scheme: url.protocol.slice(0, -1),
        host,
        ...(port !== undefined && { port }),
        path: `${url.pathname === '' ? '/' : url.pathname}${url.search}`,
        headers,
      })
    );
  };

const fromUrl = (input: string, headers: HeaderPairs) => (url: URL) =>
  pipe(validateHeaders(input, headers), Effect.flatMap(buildRequest(input, url)));

const fromInit = (init: ClientRequestInit) => {
  const input = typeof init.url === 'string' ? init.url : init.url.href;
  return pipe(
    typeof init.url === 'string' ? parseUrl(init.url) : copyUrl(init.url),
    Effect.flatMap(fromUrl(input, toHeaderPairs(init.headers)))
  );
};

// Structured requests skip URL parsing, so host and headers are checked here.
const checkRequest = (
  request: ClientRequest
): Effect.Effect<ClientRequest, RequestConstructionError> =>
  request.host === ''
    ? Effect.fail(requestError.missingHost(request.url))
    : pipe(validateHeaders(request.url, request.headers), Effect.as(request));

// ============================================================================
// Public API
// ============================================================================

/**
 * Normalizes caller input into a ClientRequest.
 * Already-normalized requests are validated and returned unchanged.
 */
export const toClientRequest = (
  input: RequestInput
): Effect.Effect<ClientRequest, RequestConstructionError> => {
  if (typeof input === 'string') {
    return pipe(parseUrl(input), Effect.flatMap(fromUrl(input, [])));
  }
  if (input instanceof URL) {
    return pipe(copyUrl(input), Effect.flatMap(fromUrl(input.href, [])));
  }
  if (isClientRequest(input)) {
    return checkRequest(input);
  }
  return fromInit(input);
};

/**
 * Case-insensitive lookup of every value sent under a header name.
 */
export const headerValues = (request: ClientRequest, name: string): ReadonlyArray<string> =>
  request.headers
    .filter(([headerName]) => headerName.toLowerCase() === name.toLowerCase())
    .map(([, value]) => value);
