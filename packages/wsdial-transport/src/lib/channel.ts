/**
 * Transport Channel Abstractions
 *
 * A channel is an open, bidirectional byte stream owned by exactly one
 * connection attempt. Lifecycle is managed via Effect's Scope: releasing the
 * scope the channel was dialed in destroys the underlying socket.
 */

import { Context, Data, Effect, Scope } from 'effect';
import type { Socket } from 'node:net';
import { formatAddress, type Endpoint } from './endpoint';
import type { TransportError } from './errors';

// ============================================================================
// Dial Targets
// ============================================================================

export type DialTarget = Data.TaggedEnum<{
  Tcp: { readonly endpoint: Endpoint };
  Unix: { readonly path: string };
}>;

export const DialTarget = Data.taggedEnum<DialTarget>();

export const describeTarget = DialTarget.$match({
  Tcp: ({ endpoint }) => formatAddress(endpoint),
  Unix: ({ path }) => `unix:${path}`,
});

// ============================================================================
// Channels
// ============================================================================

export interface TcpChannel {
  readonly _tag: 'Tcp';
  readonly socket: Socket;
  readonly remoteAddress: string;
  /**
   * Disables send coalescing (Nagle's algorithm) on the socket.
   */
  readonly setNoDelay: Effect.Effect<void, TransportError>;
}

export interface UnixChannel {
  readonly _tag: 'Unix';
  readonly socket: Socket;
  readonly path: string;
}

export type TransportChannel = TcpChannel | UnixChannel;

export const describeChannel = (channel: TransportChannel): string =>
  channel._tag === 'Tcp' ? channel.remoteAddress : `unix:${channel.path}`;

// ============================================================================
// Dialer Service
// ============================================================================

/**
 * Opens transport channels.
 *
 * Implementations should use Effect.acquireRelease so that closing the scope,
 * or interrupting an in-flight dial, destroys the socket. One attempt per call:
 * no retry and no timeout.
 */
export class Dialer extends Context.Tag('@wsdial/transport/Dialer')<
  Dialer,
  {
    readonly dial: (
      target: DialTarget
    ) => Effect.Effect<TransportChannel, TransportError, Scope.Scope>;
  }
>() {}
