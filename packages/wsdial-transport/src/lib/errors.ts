import { Data } from 'effect';

// ============================================================================
// Error Types
// ============================================================================

export type RequestConstructionReason = 'invalid-url' | 'missing-host' | 'invalid-header';

// Caller input could not be turned into a request descriptor. Raised before any I/O.
export class RequestConstructionError extends Data.TaggedError('RequestConstructionError')<
  Readonly<{
    readonly input: string;
    readonly reason: RequestConstructionReason;
    readonly details: string;
    readonly cause?: unknown;
    readonly recoveryHint?: string;
  }>
> {}

// No explicit port and a scheme other than ws/wss.
export class UnsupportedSchemeError extends Data.TaggedError('UnsupportedSchemeError')<
  Readonly<{
    readonly scheme: string;
    readonly url: string;
    readonly recoveryHint?: string;
  }>
> {}

export type TransportOperation = 'dial' | 'tune' | 'io';

export class TransportError extends Data.TaggedError('TransportError')<
  Readonly<{
    readonly operation: TransportOperation;
    readonly address: string;
    readonly details: string;
    readonly code?: string;
    readonly cause?: unknown;
    readonly recoveryHint?: string;
  }>
> {}

export type SecureChannelReason = 'negotiation' | 'certificate';

export class SecureChannelError extends Data.TaggedError('SecureChannelError')<
  Readonly<{
    readonly host: string;
    readonly reason: SecureChannelReason;
    readonly details: string;
    readonly code?: string;
    readonly cause?: unknown;
    readonly recoveryHint?: string;
  }>
> {}

export class HandshakeError extends Data.TaggedError('HandshakeError')<
  Readonly<{
    readonly url: string;
    readonly details: string;
    readonly status?: number;
    readonly cause?: unknown;
    readonly recoveryHint?: string;
  }>
> {}

export type ConnectError =
  | RequestConstructionError
  | UnsupportedSchemeError
  | TransportError
  | SecureChannelError
  | HandshakeError;

const connectErrorTags: ReadonlyArray<ConnectError['_tag']> = [
  'RequestConstructionError',
  'UnsupportedSchemeError',
  'TransportError',
  'SecureChannelError',
  'HandshakeError',
];

// Type guard helper using tag-based discrimination
export const isConnectError = (u: unknown): u is ConnectError => {
  if (typeof u !== 'object' || u === null || !('_tag' in u)) return false;
  const tag = u._tag;
  return connectErrorTags.some((known) => known === tag);
};

const codeOf = (cause: unknown): string | undefined =>
  typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
    ? cause.code
    : undefined;

// ============================================================================
// Error creation helpers
// ============================================================================

export const requestError = {
  invalidUrl: (input: string, cause?: unknown) =>
    new RequestConstructionError({
      input,
      reason: 'invalid-url',
      details: `Cannot parse "${input}" as a URL`,
      ...(cause !== undefined && { cause }),
      recoveryHint: 'Pass an absolute URL such as ws://host/path',
    }),
  missingHost: (input: string) =>
    new RequestConstructionError({
      input,
      reason: 'missing-host',
      details: `URL "${input}" has no host`,
      recoveryHint: 'Include a host name in the URL',
    }),
  invalidHeader: (input: string, name: string, details: string) =>
    new RequestConstructionError({
      input,
      reason: 'invalid-header',
      details: `Header "${name}": ${details}`,
      recoveryHint: 'Header names must be HTTP tokens and values must not contain CR, LF or NUL',
    }),
};

export const unsupportedScheme = (scheme: string, url: string) =>
  new UnsupportedSchemeError({
    scheme,
    url,
    recoveryHint: 'Use a ws:// or wss:// URL, or give an explicit port',
  });

export const transportError = {
  dial: (address: string, cause: unknown) => {
    const code = codeOf(cause);
    return new TransportError({
      operation: 'dial',
      address,
      details: `Failed to connect to ${address}${code !== undefined ? ` (${code})` : ''}`,
      ...(code !== undefined && { code }),
      cause,
      recoveryHint: 'Check that the endpoint is reachable',
    });
  },
  tune: (address: string, details: string, cause?: unknown) =>
    new TransportError({
      operation: 'tune',
      address,
      details,
      ...(cause !== undefined && { cause }),
      recoveryHint: 'The channel was closed before it could be configured',
    }),
  io: (address: string, cause: unknown) => {
    const code = codeOf(cause);
    return new TransportError({
      operation: 'io',
      address,
      details: `I/O failure on ${address}${code !== undefined ? ` (${code})` : ''}`,
      ...(code !== undefined && { code }),
      cause,
    });
  },
};

export const secureChannelError = {
  negotiation: (host: string, cause: unknown) => {
    const code = codeOf(cause);
    return new SecureChannelError({
      host,
      reason: 'negotiation',
      details: `TLS negotiation with ${host} failed`,
      ...(code !== undefined && { code }),
      cause,
      recoveryHint: 'Check that the endpoint speaks TLS and shares a protocol version',
    });
  },
  certificate: (host: string, cause: unknown) => {
    const code = codeOf(cause);
    return new SecureChannelError({
      host,
      reason: 'certificate',
      details: `Certificate presented by ${host} was rejected`,
      ...(code !== undefined && { code }),
      cause,
      recoveryHint: 'Supply the issuing CA in the trust configuration',
    });
  },
};

export const handshakeError = {
  rejected: (url: string, status: number, statusText: string) =>
    new HandshakeError({
      url,
      status,
      details: `Server answered the upgrade request with ${status} ${statusText}`.trimEnd(),
      recoveryHint: 'Check the path, authentication headers and requested subprotocols',
    }),
  protocol: (url: string, cause: unknown) =>
    new HandshakeError({
      url,
      details: cause instanceof Error ? cause.message : String(cause),
      cause,
    }),
};
