import { Schema, pipe } from 'effect';

/**
 * WebSocket-level parameters forwarded untouched to the handshaker.
 * Fields left out fall back to the handshaker's own defaults.
 */
export const WebSocketConfig = Schema.Struct({
  maxMessageSize: Schema.optionalWith(pipe(Schema.Int, Schema.positive()), { exact: true }),
  perMessageDeflate: Schema.optionalWith(Schema.Boolean, { exact: true }),
  skipUtf8Validation: Schema.optionalWith(Schema.Boolean, { exact: true }),
});
export type WebSocketConfig = typeof WebSocketConfig.Type;

export const decodeWebSocketConfig = Schema.decodeUnknown(WebSocketConfig);
