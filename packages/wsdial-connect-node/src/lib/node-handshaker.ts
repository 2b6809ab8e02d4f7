/**
 * Node.js Handshaker
 *
 * Combined secure-channel upgrade and WebSocket opening handshake. The scheme
 * decides whether TLS is needed (node:tls); the handshake itself is driven by
 * the `ws` client over the already-dialed socket.
 */

import { Context, Effect, Either, Layer, Option, Redacted, Scope, pipe } from 'effect';
import type { IncomingMessage } from 'node:http';
import * as net from 'node:net';
import * as tls from 'node:tls';
import { WebSocket, type ClientOptions } from 'ws';
import {
  Connector,
  Handshaker,
  classifyScheme,
  describeChannel,
  handshakeError,
  headerValues,
  secureChannelError,
  transportError,
  unsupportedScheme,
  type ClientRequest,
  type Connected,
  type HandshakeError,
  type HandshakeResponse,
  type SecureChannelError,
  type TransportChannel,
  type TransportError,
  type TrustConfig,
  type UnsupportedSchemeError,
  type UpgradeError,
  type UpgradeOptions,
  type WebSocketConfig,
} from '@wsdial/transport';
import { fromWebSocket } from './websocket-stream';

// ============================================================================
// Security Mode
// ============================================================================

/**
 * None for plain channels. An explicit Plain connector on a wss:// request is
 * honored; without a connector the default TLS policy is built here.
 */
const trustFor = (
  request: ClientRequest,
  connector: Connector | undefined
): Effect.Effect<Option.Option<TrustConfig>, UnsupportedSchemeError> => {
  const kind = classifyScheme(request.scheme);
  if (kind === 'unrecognized') {
    return Effect.fail(unsupportedScheme(request.scheme, request.url));
  }
  if (kind === 'plain') {
    return Effect.succeed(Option.none());
  }
  return Effect.succeed(
    Connector.$match(connector ?? Connector.defaultTls(), {
      Plain: () => Option.none(),
      Tls: ({ trust }) => Option.some(trust),
    })
  );
};

// ============================================================================
// TLS
// ============================================================================

const certificateErrorCodes: ReadonlySet<string> = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'CERT_SIGNATURE_FAILURE',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'HOSTNAME_MISMATCH',
]);

const errorCode = (error: Error): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined;

const classifyTlsError = (host: string) => (error: Error) => {
  const code = errorCode(error);
  return code !== undefined && certificateErrorCodes.has(code)
    ? secureChannelError.certificate(host, error)
    : secureChannelError.negotiation(host, error);
};

const toKeyMaterial = (value: string | Uint8Array): string | Buffer =>
  typeof value === 'string' ? value : Buffer.from(value);

const tlsOptions = (
  socket: net.Socket,
  host: string,
  trust: TrustConfig
): tls.ConnectionOptions => {
  const servername = trust.servername ?? host;
  return {
    socket,
    host: servername,
    // SNI must not carry an IP address
    ...(net.isIP(servername) === 0 && { servername }),
    rejectUnauthorized: trust.rejectUnauthorized ?? true,
    ALPNProtocols: ['http/1.1'],
    ...(trust.ca !== undefined && { ca: trust.ca.map(toKeyMaterial) }),
    ...(trust.cert !== undefined && { cert: toKeyMaterial(trust.cert) }),
    ...(trust.key !== undefined && { key: toKeyMaterial(trust.key) }),
    ...(trust.passphrase !== undefined && { passphrase: Redacted.value(trust.passphrase) }),
  };
};

const negotiateTls = (
  socket: net.Socket,
  host: string,
  trust: TrustConfig
): Effect.Effect<tls.TLSSocket, SecureChannelError> =>
  Effect.async<tls.TLSSocket, SecureChannelError>((resume) => {
    const secured = tls.connect(tlsOptions(socket, host, trust));

    const onSecure = () => {
      secured.off('error', onError);
      resume(Effect.succeed(secured));
    };
    const onError = (error: Error) => {
      secured.off('secureConnect', onSecure);
      secured.destroy();
      resume(Effect.fail(classifyTlsError(host)(error)));
    };

    secured.once('secureConnect', onSecure);
    secured.once('error', onError);

    return Effect.sync(() => {
      secured.off('secureConnect', onSecure);
      secured.off('error', onError);
      secured.destroy();
    });
  });

const secureSocket = (
  socket: net.Socket,
  host: string,
  trust: TrustConfig
): Effect.Effect<tls.TLSSocket, SecureChannelError, Scope.Scope> =>
  pipe(
    Effect.acquireRelease(Effect.interruptible(negotiateTls(socket, host, trust)), (secured) =>
      Effect.sync(() => secured.destroy())
    ),
    Effect.tap((secured) =>
      Effect.logDebug('TLS established', { host, protocol: secured.getProtocol() })
    )
  );

// ============================================================================
// WebSocket Handshake
// ============================================================================

const subprotocolHeader = 'sec-websocket-protocol';

const requestedProtocols = (request: ClientRequest): ReadonlyArray<string> =>
  headerValues(request, subprotocolHeader)
    .flatMap((value) => value.split(','))
    .map((protocol) => protocol.trim())
    .filter((protocol) => protocol !== '');

// Repeated headers are folded into one comma-separated value.
const forwardedHeaders = (request: ClientRequest): Record<string, string> =>
  request.headers
    .filter(([name]) => name.toLowerCase() !== subprotocolHeader)
    .reduce<Record<string, string>>((headers, [name, value]) => {
      const existing = headers[name];
      return { ...headers, [name]: existing === undefined ? value : `${existing}, ${value}` };
    }, {});

const clientOptions = (
  socket: net.Socket,
  request: ClientRequest,
  config: WebSocketConfig | undefined
): ClientOptions => ({
  createConnection: () => socket,
  headers: forwardedHeaders(request),
  perMessageDeflate: config?.perMessageDeflate ?? false,
  ...(config?.maxMessageSize !== undefined && { maxPayload: config.maxMessageSize }),
  ...(config?.skipUtf8Validation !== undefined && {
    skipUTF8Validation: config.skipUtf8Validation,
  }),
});

const toHandshakeResponse = (response: IncomingMessage): HandshakeResponse => ({
  status: response.statusCode ?? 0,
  statusText: response.statusMessage ?? '',
  headers: Object.fromEntries(
    Object.entries(response.headers).flatMap(([name, value]) =>
      value === undefined ? [] : [[name, value] as const]
    )
  ),
});

// Errors raised by the OS carry a syscall; everything else is the protocol.
const classifyHandshakeError =
  (request: ClientRequest, address: string) =>
  (error: Error): HandshakeError | TransportError =>
    'syscall' in error
      ? transportError.io(address, error)
      : handshakeError.protocol(request.url, error);

const holdAbortError = (_error: Error) => undefined;

const createClient = (
  socket: net.Socket,
  request: ClientRequest,
  config: WebSocketConfig | undefined
): Either.Either<WebSocket, HandshakeError> =>
  Either.try({
    try: () =>
      new WebSocket(
        request.url,
        [...requestedProtocols(request)],
        clientOptions(socket, request, config)
      ),
    catch: (cause) => handshakeError.protocol(request.url, cause),
  });

const performHandshake = (
  socket: net.Socket,
  request: ClientRequest,
  config: WebSocketConfig | undefined,
  address: string
): Effect.Effect<Connected, HandshakeError | TransportError> =>
  Effect.async<Connected, HandshakeError | TransportError>((resume) => {
    const created = createClient(socket, request, config);
    if (Either.isLeft(created)) {
      resume(Effect.fail(created.left));
      return;
    }
    const ws = created.right;
    let upgraded: HandshakeResponse | undefined;

    const detach = () => {
      ws.off('upgrade', onUpgrade);
      ws.off('open', onOpen);
      ws.off('unexpected-response', onUnexpectedResponse);
      ws.off('error', onError);
    };
    // Terminating a client that is still connecting emits one more error.
    const abandon = () => {
      detach();
      ws.on('error', holdAbortError);
      ws.terminate();
    };
    const onUpgrade = (response: IncomingMessage) => {
      upgraded = toHandshakeResponse(response);
    };
    const onOpen = () => {
      detach();
      resume(
        Effect.succeed({
          stream: fromWebSocket(ws, address),
          response: upgraded ?? { status: 101, statusText: 'Switching Protocols', headers: {} },
        })
      );
    };
    const onUnexpectedResponse = (_req: unknown, response: IncomingMessage) => {
      response.resume();
      abandon();
      const status = response.statusCode ?? 0;
      resume(
        Effect.fail(handshakeError.rejected(request.url, status, response.statusMessage ?? ''))
      );
    };
    const onError = (error: Error) => {
      abandon();
      resume(Effect.fail(classifyHandshakeError(request, address)(error)));
    };

    ws.once('upgrade', onUpgrade);
    ws.once('open', onOpen);
    ws.once('unexpected-response', onUnexpectedResponse);
    ws.once('error', onError);

    return Effect.sync(abandon);
  });

const handshake = (
  socket: net.Socket,
  request: ClientRequest,
  config: WebSocketConfig | undefined,
  address: string
): Effect.Effect<Connected, HandshakeError | TransportError, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.interruptible(performHandshake(socket, request, config, address)),
    ({ stream }) =>
      pipe(
        stream.close(),
        Effect.catchAll((error) => Effect.logWarning('Closing the WebSocket failed', { error }))
      )
  );

// ============================================================================
// Upgrade
// ============================================================================

const ensureOpen = (channel: TransportChannel): Effect.Effect<net.Socket, TransportError> =>
  channel.socket.destroyed
    ? Effect.fail(
        transportError.io(describeChannel(channel), new Error('Socket closed before the upgrade'))
      )
    : Effect.succeed(channel.socket);

const secureIfRequired = (
  socket: net.Socket,
  host: string,
  trust: Option.Option<TrustConfig>
): Effect.Effect<net.Socket, SecureChannelError, Scope.Scope> =>
  Option.match(trust, {
    onNone: () => Effect.succeed(socket),
    onSome: (policy) => secureSocket(socket, host, policy),
  });

const upgrade = (
  channel: TransportChannel,
  request: ClientRequest,
  options: UpgradeOptions
): Effect.Effect<Connected, UpgradeError, Scope.Scope> =>
  pipe(
    Effect.all([trustFor(request, options.connector), ensureOpen(channel)]),
    Effect.flatMap(([trust, socket]) => secureIfRequired(socket, request.host, trust)),
    Effect.flatMap((socket) =>
      handshake(socket, request, options.config, describeChannel(channel))
    )
  );

// ============================================================================
// Service Implementation and Layer
// ============================================================================

export const NodeHandshaker: Context.Tag.Service<typeof Handshaker> = { upgrade };

/**
 * Layer providing the node:tls + ws Handshaker.
 */
export const NodeHandshakerLive = Layer.succeed(Handshaker, NodeHandshaker);
