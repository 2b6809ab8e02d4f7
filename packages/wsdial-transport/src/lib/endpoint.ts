/**
 * Endpoint Resolver
 *
 * Pure derivation of the (host, port) pair to dial from a normalized request.
 */

import { Either, Option, pipe } from 'effect';
import { unsupportedScheme, type UnsupportedSchemeError } from './errors';
import type { ClientRequest } from './request';

export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

export type SchemeKind = 'plain' | 'secure' | 'unrecognized';

export const classifyScheme = (scheme: string): SchemeKind => {
  if (scheme === 'ws') return 'plain';
  if (scheme === 'wss') return 'secure';
  return 'unrecognized';
};

const defaultPorts: Readonly<Record<Exclude<SchemeKind, 'unrecognized'>, number>> = {
  plain: 80,
  secure: 443,
};

export const defaultPort = (scheme: string): Option.Option<number> => {
  const kind = classifyScheme(scheme);
  return kind === 'unrecognized' ? Option.none() : Option.some(defaultPorts[kind]);
};

/**
 * An explicit port wins regardless of scheme; otherwise the scheme decides.
 */
export const resolveEndpoint = (
  request: ClientRequest
): Either.Either<Endpoint, UnsupportedSchemeError> =>
  pipe(
    Option.fromNullable(request.port),
    Option.orElse(() => defaultPort(request.scheme)),
    Either.fromOption(() => unsupportedScheme(request.scheme, request.url)),
    Either.map((port) => ({ host: request.host, port }))
  );

export const formatAddress = (endpoint: Endpoint): string =>
  endpoint.host.includes(':')
    ? `[${endpoint.host}]:${endpoint.port}`
    : `${endpoint.host}:${endpoint.port}`;
