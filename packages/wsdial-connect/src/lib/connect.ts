/**
 * Connection Establishment
 *
 * Normalize -> Resolve -> Dial -> (Tune) -> Upgrade/Handshake, each stage
 * fallible and strictly sequential. The first failure ends the attempt; there
 * is no retry and no fallback from secure to plain.
 *
 * Every attempt dials into its own child scope. On failure or interruption that
 * scope is closed immediately so the channel never outlives the attempt; on
 * success it stays open until the caller's scope closes.
 */

import { Effect, Either, ExecutionStrategy, Exit, Scope, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import {
  DialTarget,
  Dialer,
  Handshaker,
  describeChannel,
  describeTarget,
  resolveEndpoint,
  toClientRequest,
  type ClientRequest,
  type ConnectError,
  type Connected,
  type Connector,
  type Endpoint,
  type RequestInput,
  type TransportChannel,
  type TransportError,
  type UnsupportedSchemeError,
  type UpgradeOptions,
  type WebSocketConfig,
} from '@wsdial/transport';

// ============================================================================
// Options
// ============================================================================

export interface ConnectOptions {
  readonly config?: WebSocketConfig;
  /**
   * Disable Nagle's algorithm on TCP channels right after connecting.
   * Failing to apply it fails the attempt. Ignored for Unix channels.
   */
  readonly disableNagle?: boolean;
}

export interface TlsConnectOptions extends ConnectOptions {
  readonly connector?: Connector;
}

export interface UnixConnectOptions {
  readonly config?: WebSocketConfig;
}

export type ConnectRequirements = Dialer | Handshaker | Scope.Scope;

// ============================================================================
// Stages
// ============================================================================

const resolveStage = (request: ClientRequest): Effect.Effect<Endpoint, UnsupportedSchemeError> =>
  Either.match(resolveEndpoint(request), {
    onLeft: Effect.fail,
    onRight: Effect.succeed,
  });

const dialStage = (
  target: DialTarget
): Effect.Effect<TransportChannel, TransportError, Dialer | Scope.Scope> =>
  pipe(
    Effect.logDebug('Dialing'),
    Effect.annotateLogs({ stage: 'dial', target: describeTarget(target) }),
    Effect.zipRight(Dialer),
    Effect.flatMap((dialer) => dialer.dial(target))
  );

/**
 * Applies channel tuning. Only TCP channels have anything to tune.
 */
export const tuneChannel = (
  channel: TransportChannel,
  options: Pick<ConnectOptions, 'disableNagle'>
): Effect.Effect<void, TransportError> =>
  channel._tag === 'Tcp' && options.disableNagle === true
    ? pipe(
        Effect.logDebug('Disabling Nagle algorithm'),
        Effect.annotateLogs({ stage: 'tune', address: channel.remoteAddress }),
        Effect.andThen(channel.setNoDelay)
      )
    : Effect.void;

const upgradeStage =
  (request: ClientRequest, options: UpgradeOptions) =>
  (channel: TransportChannel): Effect.Effect<Connected, ConnectError, Handshaker | Scope.Scope> =>
    pipe(
      Effect.logDebug('Upgrading channel'),
      Effect.annotateLogs({ stage: 'upgrade', channel: describeChannel(channel) }),
      Effect.zipRight(Handshaker),
      Effect.flatMap((handshaker) => handshaker.upgrade(channel, request, options)),
      Effect.tap(({ response }) =>
        Effect.logDebug('Handshake complete', { status: response.status })
      )
    );

const toUpgradeOptions = (options: TlsConnectOptions): UpgradeOptions => ({
  ...(options.config !== undefined && { config: options.config }),
  ...(options.connector !== undefined && { connector: options.connector }),
});

// ============================================================================
// Attempt Scope
// ============================================================================

const closeOnFailure =
  (child: Scope.CloseableScope) =>
  <A, E>(exit: Exit.Exit<A, E>): Effect.Effect<void> =>
    Exit.isFailure(exit) ? Scope.close(child, exit) : Effect.void;

const runInAttemptScope = <A, E, R>(
  attempt: Effect.Effect<A, E, R>
): Effect.Effect<A, E, Exclude<R, Scope.Scope> | Scope.Scope> =>
  pipe(
    Effect.scope,
    Effect.flatMap((parent) => Scope.fork(parent, ExecutionStrategy.sequential)),
    Effect.flatMap((child) =>
      pipe(attempt, Scope.extend(child), Effect.onExit(closeOnFailure(child)))
    )
  );

const instrument =
  (operation: string) =>
  <A, R>(attempt: Effect.Effect<A, ConnectError, R>): Effect.Effect<A, ConnectError, R> =>
    pipe(
      attempt,
      Effect.tapError((error) => Effect.logWarning('Connection attempt failed', { error })),
      Effect.annotateLogs({ operation }),
      Effect.withSpan('wsdial.connect', { attributes: { operation } })
    );

const establish = (
  request: ClientRequest,
  channel: Effect.Effect<TransportChannel, ConnectError, Dialer | Scope.Scope>,
  options: TlsConnectOptions
): Effect.Effect<Connected, ConnectError, ConnectRequirements> =>
  pipe(
    channel,
    Effect.tap((opened) => tuneChannel(opened, options)),
    Effect.flatMap(upgradeStage(request, toUpgradeOptions(options))),
    runInAttemptScope,
    Effect.annotateLogs({ url: request.url })
  );

// ============================================================================
// Public API
// ============================================================================

/**
 * Connects over TCP, with an optional trust policy override for wss:// URLs.
 */
export const connectTlsWithConfig = (
  input: RequestInput,
  options: TlsConnectOptions = {}
): Effect.Effect<Connected, ConnectError, ConnectRequirements> =>
  pipe(
    toClientRequest(input),
    Effect.flatMap((request) =>
      establish(
        request,
        pipe(
          resolveStage(request),
          Effect.flatMap((endpoint) => dialStage(DialTarget.Tcp({ endpoint })))
        ),
        options
      )
    ),
    instrument('connect')
  );

export const connectWithConfig = (
  input: RequestInput,
  options: ReadonlyDeep<ConnectOptions> = {}
): Effect.Effect<Connected, ConnectError, ConnectRequirements> =>
  connectTlsWithConfig(input, {
    ...(options.config !== undefined && { config: options.config }),
    ...(options.disableNagle !== undefined && { disableNagle: options.disableNagle }),
  });

export const connect = (
  input: RequestInput
): Effect.Effect<Connected, ConnectError, ConnectRequirements> => connectWithConfig(input);

/**
 * Connects over a Unix domain socket. The request still supplies the URL and
 * headers sent during the handshake; its host and port are not dialed.
 */
export const connectUnixWithConfig = (
  path: string,
  input: RequestInput,
  options: ReadonlyDeep<UnixConnectOptions> = {}
): Effect.Effect<Connected, ConnectError, ConnectRequirements> =>
  pipe(
    toClientRequest(input),
    Effect.flatMap((request) =>
      establish(request, dialStage(DialTarget.Unix({ path })), {
        ...(options.config !== undefined && { config: options.config }),
      })
    ),
    instrument('connect-unix')
  );

export const connectUnix = (
  path: string,
  input: RequestInput
): Effect.Effect<Connected, ConnectError, ConnectRequirements> =>
  connectUnixWithConfig(path, input);
