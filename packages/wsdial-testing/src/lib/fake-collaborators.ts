/**
 * Recording Fakes
 *
 * In-process stand-ins for the Dialer and Handshaker services. They open no
 * sockets; every call is appended to a shared event log so tests can assert
 * on stage order, on the absence of calls, and on resource release.
 */

import { Effect, Layer, Ref, Scope, Stream, pipe } from 'effect';
import { Socket } from 'node:net';
import {
  Dialer,
  DialTarget,
  Handshaker,
  classifyScheme,
  describeTarget,
  transportError,
  type ClientRequest,
  type Connected,
  type HandshakeResponse,
  type TransportChannel,
  type TransportError,
  type UpgradeError,
  type UpgradeOptions,
  type WebSocketStream,
} from '@wsdial/transport';

// ============================================================================
// Types
// ============================================================================

export interface FakeDialerOptions {
  /** The dial itself fails with ECONNREFUSED. */
  readonly failDial?: boolean;
  /** Disabling Nagle's algorithm on the opened channel fails. */
  readonly failNoDelay?: boolean;
  /** The socket is opened but the dial never completes. */
  readonly hang?: boolean;
}

export interface FakeHandshakerOptions {
  readonly fail?: UpgradeError;
  readonly response?: HandshakeResponse;
}

export interface RecordedUpgrade {
  readonly channel: TransportChannel;
  readonly request: ClientRequest;
  readonly options: UpgradeOptions;
}

export interface Recording {
  /**
   * Ordered log: `dial:<target>`, `no-delay`, `tls:<host>`, `handshake`, `release`, `close`.
   */
  readonly events: ReadonlyArray<string>;
  readonly dials: ReadonlyArray<DialTarget>;
  readonly upgrades: ReadonlyArray<RecordedUpgrade>;
  readonly opened: number;
  readonly released: number;
  readonly sent: ReadonlyArray<string | Uint8Array>;
}

export interface FakeConnection {
  readonly layer: Layer.Layer<Dialer | Handshaker>;
  readonly recording: Effect.Effect<Recording>;
}

const emptyRecording: Recording = {
  events: [],
  dials: [],
  upgrades: [],
  opened: 0,
  released: 0,
  sent: [],
};

export const switchingProtocols: HandshakeResponse = {
  status: 101,
  statusText: 'Switching Protocols',
  headers: { upgrade: 'websocket', connection: 'Upgrade' },
};

const refusedError = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });

// ============================================================================
// Recording helpers
// ============================================================================

const record = (ref: Ref.Ref<Recording>, event: string) =>
  Ref.update(ref, (r) => ({ ...r, events: [...r.events, event] }));

const recordDial = (ref: Ref.Ref<Recording>, target: DialTarget) =>
  Ref.update(ref, (r) => ({
    ...r,
    events: [...r.events, `dial:${describeTarget(target)}`],
    dials: [...r.dials, target],
  }));

const openSocket = (ref: Ref.Ref<Recording>) =>
  pipe(
    Ref.update(ref, (r) => ({ ...r, opened: r.opened + 1 })),
    Effect.map(() => new Socket())
  );

const releaseSocket = (ref: Ref.Ref<Recording>) => (socket: Socket) =>
  pipe(
    Effect.sync(() => socket.destroy()),
    Effect.andThen(Ref.update(ref, (r) => ({ ...r, released: r.released + 1 }))),
    Effect.andThen(record(ref, 'release'))
  );

// ============================================================================
// Fake Dialer
// ============================================================================

const noDelayOutcome = (
  address: string,
  options: FakeDialerOptions
): Effect.Effect<void, TransportError> =>
  options.failNoDelay === true
    ? Effect.fail(transportError.tune(address, 'Cannot disable Nagle on a closed socket'))
    : Effect.void;

const makeNoDelay = (ref: Ref.Ref<Recording>, address: string, options: FakeDialerOptions) =>
  pipe(record(ref, 'no-delay'), Effect.andThen(noDelayOutcome(address, options)));

const toChannel =
  (ref: Ref.Ref<Recording>, target: DialTarget, options: FakeDialerOptions) =>
  (socket: Socket): TransportChannel =>
    DialTarget.$match(target, {
      Tcp: (): TransportChannel => ({
        _tag: 'Tcp',
        socket,
        remoteAddress: describeTarget(target),
        setNoDelay: makeNoDelay(ref, describeTarget(target), options),
      }),
      Unix: ({ path }): TransportChannel => ({ _tag: 'Unix', socket, path }),
    });

const acquireSocket = (
  ref: Ref.Ref<Recording>,
  target: DialTarget,
  options: FakeDialerOptions
): Effect.Effect<Socket, TransportError, Scope.Scope> =>
  options.failDial === true
    ? Effect.fail(transportError.dial(describeTarget(target), refusedError))
    : Effect.acquireRelease(openSocket(ref), releaseSocket(ref));

const completeDial = (options: FakeDialerOptions): Effect.Effect<void> =>
  options.hang === true ? Effect.never : Effect.void;

const fakeDial = (ref: Ref.Ref<Recording>, options: FakeDialerOptions) => (target: DialTarget) =>
  pipe(
    recordDial(ref, target),
    Effect.andThen(acquireSocket(ref, target, options)),
    Effect.tap(() => completeDial(options)),
    Effect.map(toChannel(ref, target, options))
  );

// ============================================================================
// Fake Handshaker
// ============================================================================

const makeFakeStream = (ref: Ref.Ref<Recording>): WebSocketStream => ({
  protocol: '',
  send: (data) => Ref.update(ref, (r) => ({ ...r, sent: [...r.sent, data] })),
  messages: Stream.empty,
  close: () => record(ref, 'close'),
});

const recordUpgrade = (ref: Ref.Ref<Recording>, upgrade: RecordedUpgrade) =>
  pipe(
    classifyScheme(upgrade.request.scheme) === 'secure'
      ? record(ref, `tls:${upgrade.request.host}`)
      : Effect.void,
    Effect.andThen(record(ref, 'handshake')),
    Effect.andThen(Ref.update(ref, (r) => ({ ...r, upgrades: [...r.upgrades, upgrade] })))
  );

const upgradeOutcome = (
  ref: Ref.Ref<Recording>,
  options: FakeHandshakerOptions
): Effect.Effect<Connected, UpgradeError> =>
  options.fail !== undefined
    ? Effect.fail(options.fail)
    : Effect.succeed({
        stream: makeFakeStream(ref),
        response: options.response ?? switchingProtocols,
      });

const fakeUpgrade =
  (ref: Ref.Ref<Recording>, options: FakeHandshakerOptions) =>
  (
    channel: TransportChannel,
    request: ClientRequest,
    upgradeOptions: UpgradeOptions
  ): Effect.Effect<Connected, UpgradeError> =>
    pipe(
      recordUpgrade(ref, { channel, request, options: upgradeOptions }),
      Effect.andThen(upgradeOutcome(ref, options))
    );

// ============================================================================
// Public API
// ============================================================================

/**
 * Builds a Dialer + Handshaker layer sharing one recording.
 */
export const makeFakeConnection = (
  options: {
    readonly dialer?: FakeDialerOptions;
    readonly handshaker?: FakeHandshakerOptions;
  } = {}
): Effect.Effect<FakeConnection> =>
  pipe(
    Ref.make(emptyRecording),
    Effect.map((ref) => ({
      layer: Layer.merge(
        Layer.succeed(Dialer, { dial: fakeDial(ref, options.dialer ?? {}) }),
        Layer.succeed(Handshaker, { upgrade: fakeUpgrade(ref, options.handshaker ?? {}) })
      ),
      recording: Ref.get(ref),
    }))
  );
