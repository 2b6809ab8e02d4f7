/**
 * Adapts an open `ws` client to the WebSocketStream contract.
 */

import { Effect, Stream } from 'effect';
import { WebSocket, type RawData } from 'ws';
import {
  WebSocketMessage,
  transportError,
  type TransportError,
  type WebSocketStream,
} from '@wsdial/transport';

const toBuffer = (data: RawData): Buffer => {
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.isBuffer(data) ? data : Buffer.from(data);
};

const toMessage = (data: RawData, isBinary: boolean): WebSocketMessage =>
  isBinary
    ? WebSocketMessage.Binary({ data: new Uint8Array(toBuffer(data)) })
    : WebSocketMessage.Text({ data: toBuffer(data).toString('utf8') });

/**
 * Must be called synchronously once the socket is open so that no error
 * event goes unobserved. An error is reported when the message stream ends.
 */
export const fromWebSocket = (ws: WebSocket, address: string): WebSocketStream => {
  let failure: Error | undefined;
  ws.on('error', (error) => {
    failure = error;
  });

  const send = (data: string | Uint8Array): Effect.Effect<void, TransportError> =>
    Effect.async<void, TransportError>((resume) => {
      ws.send(data, (error) => {
        resume(
          error instanceof Error ? Effect.fail(transportError.io(address, error)) : Effect.void
        );
      });
    });

  const messages = Stream.async<WebSocketMessage, TransportError>((emit) => {
    const onMessage = (data: RawData, isBinary: boolean) => {
      void emit.single(toMessage(data, isBinary));
    };
    const onClose = () => {
      void (failure === undefined ? emit.end() : emit.fail(transportError.io(address, failure)));
    };

    ws.on('message', onMessage);
    ws.once('close', onClose);
    if (ws.readyState === WebSocket.CLOSED) onClose();

    return Effect.sync(() => {
      ws.off('message', onMessage);
      ws.off('close', onClose);
    });
  });

  return {
    protocol: ws.protocol,
    send,
    messages,
    // ws throws for a reserved close code or a reason over 123 bytes
    close: (code, reason) =>
      Effect.try({
        try: () => ws.close(code, reason),
        catch: (cause) => transportError.io(address, cause),
      }),
  };
};
