/**
 * @wsdial/connect-node
 *
 * Live Dialer and Handshaker services for Node.js. Sockets come from
 * node:net, secure channels from node:tls and the opening handshake from `ws`.
 *
 * @example
 * ```typescript
 * import { Effect, pipe } from 'effect';
 * import { connect } from '@wsdial/connect';
 * import { NodeConnectLive } from '@wsdial/connect-node';
 *
 * const program = pipe(
 *   connect('ws://localhost:8080/feed'),
 *   Effect.flatMap(({ stream }) => stream.send('hello')),
 *   Effect.scoped,
 *   Effect.provide(NodeConnectLive)
 * );
 * ```
 */

import { Layer } from 'effect';
import { NodeDialerLive } from './lib/node-dialer';
import { NodeHandshakerLive } from './lib/node-handshaker';

export { NodeDialer, NodeDialerLive } from './lib/node-dialer';
export { NodeHandshaker, NodeHandshakerLive } from './lib/node-handshaker';
export { fromWebSocket } from './lib/websocket-stream';

/**
 * Both collaborators required by the connect operations.
 */
export const NodeConnectLive = Layer.merge(NodeDialerLive, NodeHandshakerLive);
