/**
 * @wsdial/transport
 *
 * Contracts for establishing client WebSocket connections: the request
 * descriptor and its normalizer, endpoint resolution, transport channels,
 * and the Dialer and Handshaker services any runtime can implement.
 *
 * This package performs no I/O. For Node.js implementations, use @wsdial/connect-node.
 */

// ============================================================================
// Request Descriptor
// ============================================================================

export {
  ClientRequest,
  Header,
  Port,
  headerValues,
  isClientRequest,
  toClientRequest,
  unbracketHost,
} from './lib/request';
export type { ClientRequestInit, HeaderPairs, RequestInput } from './lib/request';

// ============================================================================
// Endpoint Resolution
// ============================================================================

export { classifyScheme, defaultPort, formatAddress, resolveEndpoint } from './lib/endpoint';
export type { Endpoint, SchemeKind } from './lib/endpoint';

// ============================================================================
// Channels and Collaborators
// ============================================================================

export { DialTarget, Dialer, describeChannel, describeTarget } from './lib/channel';
export type { TcpChannel, TransportChannel, UnixChannel } from './lib/channel';

export { Connector } from './lib/connector';
export type { TrustConfig } from './lib/connector';

export { WebSocketConfig, decodeWebSocketConfig } from './lib/websocket-config';

export { Handshaker, WebSocketMessage } from './lib/handshake';
export type {
  Connected,
  HandshakeResponse,
  UpgradeError,
  UpgradeOptions,
  WebSocketStream,
} from './lib/handshake';

// ============================================================================
// Errors
// ============================================================================

export {
  HandshakeError,
  RequestConstructionError,
  SecureChannelError,
  TransportError,
  UnsupportedSchemeError,
  handshakeError,
  isConnectError,
  requestError,
  secureChannelError,
  transportError,
  unsupportedScheme,
} from './lib/errors';
export type {
  ConnectError,
  RequestConstructionReason,
  SecureChannelReason,
  TransportOperation,
} from './lib/errors';
