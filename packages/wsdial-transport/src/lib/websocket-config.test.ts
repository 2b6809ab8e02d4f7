import { describe, expect, it } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import { decodeWebSocketConfig } from './websocket-config';

describe('decodeWebSocketConfig', () => {
  it.effect('accepts an empty configuration', () =>
    pipe(
      decodeWebSocketConfig({}),
      Effect.map((config) => {
        expect(config).toEqual({});
      })
    )
  );

  it.effect('keeps the given fields', () =>
    pipe(
      decodeWebSocketConfig({ maxMessageSize: 1024, perMessageDeflate: true }),
      Effect.map((config) => {
        expect(config).toEqual({ maxMessageSize: 1024, perMessageDeflate: true });
      })
    )
  );

  it.effect('rejects a non-positive message size', () =>
    pipe(
      decodeWebSocketConfig({ maxMessageSize: 0 }),
      Effect.flip,
      Effect.map((error) => {
        expect(error._tag).toBe('ParseError');
      })
    )
  );
});
