/**
 * Node.js Dialer
 *
 * Opens TCP and Unix domain stream sockets with node:net. One connection
 * attempt per dial, no retry, no timeout. Interrupting a dial destroys the
 * half-open socket; closing the scope destroys an established one.
 */

import { Context, Effect, Layer, Scope, pipe } from 'effect';
import * as net from 'node:net';
import {
  DialTarget,
  Dialer,
  describeTarget,
  transportError,
  type TransportChannel,
  type TransportError,
} from '@wsdial/transport';

// ============================================================================
// Socket Lifecycle
// ============================================================================

const createSocket = DialTarget.$match({
  Tcp: ({ endpoint }) => net.createConnection({ host: endpoint.host, port: endpoint.port }),
  Unix: ({ path }) => net.createConnection({ path }),
});

// Errors after connect reach whoever reads or writes the socket next; this
// listener only keeps an early one from being raised as an uncaught exception.
const holdLateError = (_error: Error) => undefined;

const openSocket = (target: DialTarget): Effect.Effect<net.Socket, TransportError> =>
  Effect.async<net.Socket, TransportError>((resume) => {
    const socket = createSocket(target);

    const onConnect = () => {
      socket.off('error', onError);
      socket.on('error', holdLateError);
      resume(Effect.succeed(socket));
    };
    const onError = (error: Error) => {
      socket.off('connect', onConnect);
      socket.destroy();
      resume(Effect.fail(transportError.dial(describeTarget(target), error)));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);

    return Effect.sync(() => {
      socket.off('connect', onConnect);
      socket.off('error', onError);
      socket.destroy();
    });
  });

const destroySocket = (socket: net.Socket) => Effect.sync(() => socket.destroy());

const acquireSocket = (
  target: DialTarget
): Effect.Effect<net.Socket, TransportError, Scope.Scope> =>
  Effect.acquireRelease(Effect.interruptible(openSocket(target)), destroySocket);

// ============================================================================
// Channel Construction
// ============================================================================

const setNoDelay = (socket: net.Socket, address: string): Effect.Effect<void, TransportError> =>
  Effect.suspend(() =>
    socket.destroyed
      ? Effect.fail(transportError.tune(address, 'Cannot disable Nagle on a destroyed socket'))
      : Effect.try({
          try: () => {
            socket.setNoDelay(true);
          },
          catch: (cause) => transportError.tune(address, 'Failed to disable Nagle', cause),
        })
  );

const toChannel =
  (target: DialTarget) =>
  (socket: net.Socket): TransportChannel =>
    DialTarget.$match(target, {
      Tcp: (): TransportChannel => ({
        _tag: 'Tcp',
        socket,
        remoteAddress: describeTarget(target),
        setNoDelay: setNoDelay(socket, describeTarget(target)),
      }),
      Unix: ({ path }): TransportChannel => ({ _tag: 'Unix', socket, path }),
    });

const dial = (target: DialTarget): Effect.Effect<TransportChannel, TransportError, Scope.Scope> =>
  pipe(
    acquireSocket(target),
    Effect.map(toChannel(target)),
    Effect.tap(() => Effect.logDebug('Transport connected', { target: describeTarget(target) }))
  );

// ============================================================================
// Service Implementation and Layer
// ============================================================================

export const NodeDialer: Context.Tag.Service<typeof Dialer> = { dial };

/**
 * Layer providing the node:net Dialer.
 */
export const NodeDialerLive = Layer.succeed(Dialer, NodeDialer);
