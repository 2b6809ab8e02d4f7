/**
 * @wsdial/connect
 *
 * Client-side WebSocket connection establishment as Effect programs.
 * Composes request normalization, endpoint resolution, transport dialing,
 * channel tuning and the TLS/handshake upgrade over the Dialer and Handshaker
 * services, so any runtime can supply the I/O.
 *
 * For Node.js implementations of those services, use @wsdial/connect-node.
 */

export {
  connect,
  connectWithConfig,
  connectTlsWithConfig,
  connectUnix,
  connectUnixWithConfig,
  tuneChannel,
} from './lib/connect';
export type {
  ConnectOptions,
  ConnectRequirements,
  TlsConnectOptions,
  UnixConnectOptions,
} from './lib/connect';

export {
  ConnectConfiguration,
  ConnectConfigurationLive,
  connectConfigured,
  makeConnectConfigurationLive,
} from './lib/config';
export type { ConnectConfigurationService } from './lib/config';

// Re-export transport contracts for convenience
export type {
  ClientRequest,
  ConnectError,
  Connected,
  HandshakeResponse,
  RequestInput,
  WebSocketConfig,
  WebSocketStream,
} from '@wsdial/transport';

export {
  Connector,
  Dialer,
  Handshaker,
  HandshakeError,
  RequestConstructionError,
  SecureChannelError,
  TransportError,
  UnsupportedSchemeError,
} from '@wsdial/transport';
