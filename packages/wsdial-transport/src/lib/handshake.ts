/**
 * Secure Channel Upgrader and Handshake Delegate
 *
 * Both are requested through one call: given a dialed channel, the handshaker
 * decides from the request scheme whether to wrap the channel in TLS, then
 * performs the WebSocket opening handshake over whatever it ended up with.
 */

import { Context, Data, Effect, Scope, Stream } from 'effect';
import type { TransportChannel } from './channel';
import type { Connector } from './connector';
import type {
  HandshakeError,
  SecureChannelError,
  TransportError,
  UnsupportedSchemeError,
} from './errors';
import type { ClientRequest } from './request';
import type { WebSocketConfig } from './websocket-config';

// ============================================================================
// Handshake Result
// ============================================================================

export interface HandshakeResponse {
  readonly status: number;
  readonly statusText: string;
  /** Lower-case header names. */
  readonly headers: Readonly<Record<string, string | ReadonlyArray<string>>>;
}

export type WebSocketMessage = Data.TaggedEnum<{
  Text: { readonly data: string };
  Binary: { readonly data: Uint8Array };
}>;

export const WebSocketMessage = Data.taggedEnum<WebSocketMessage>();

/**
 * Message-framed stream produced by a successful handshake.
 * Lives as long as the Scope the connection was opened in.
 */
export interface WebSocketStream {
  readonly protocol: string;
  readonly send: (data: string | Uint8Array) => Effect.Effect<void, TransportError>;
  readonly messages: Stream.Stream<WebSocketMessage, TransportError>;
  readonly close: (code?: number, reason?: string) => Effect.Effect<void, TransportError>;
}

export interface Connected {
  readonly stream: WebSocketStream;
  readonly response: HandshakeResponse;
}

export type UpgradeError =
  | SecureChannelError
  | HandshakeError
  | TransportError
  | UnsupportedSchemeError;

export interface UpgradeOptions {
  readonly config?: WebSocketConfig;
  /** Overrides the trust policy; when absent and TLS is needed the default policy is built. */
  readonly connector?: Connector;
}

// ============================================================================
// Handshaker Service
// ============================================================================

/**
 * Takes ownership of the channel. The channel and any TLS wrapper around it
 * are released when the scope closes.
 */
export class Handshaker extends Context.Tag('@wsdial/transport/Handshaker')<
  Handshaker,
  {
    readonly upgrade: (
      channel: TransportChannel,
      request: ClientRequest,
      options: UpgradeOptions
    ) => Effect.Effect<Connected, UpgradeError, Scope.Scope>;
  }
>() {}
