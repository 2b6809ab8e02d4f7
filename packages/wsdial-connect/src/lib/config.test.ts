import { describe, expect, it } from '@effect/vitest';
import { ConfigProvider, Effect, Layer, pipe } from 'effect';
import { makeFakeConnection } from '@wsdial/testing';
import {
  ConnectConfiguration,
  ConnectConfigurationLive,
  connectConfigured,
  makeConnectConfigurationLive,
} from './config';

const fromEntries = (entries: ReadonlyArray<readonly [string, string]>) =>
  Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)));

const configured = (entries: ReadonlyArray<readonly [string, string]>) =>
  pipe(ConnectConfigurationLive, Layer.provide(fromEntries(entries)));

describe('ConnectConfigurationLive', () => {
  it.effect('defaults to Nagle on and no WebSocket overrides', () =>
    pipe(
      ConnectConfiguration,
      Effect.provide(configured([])),
      Effect.map((config) => {
        expect(config).toEqual({ disableNagle: false, webSocket: {} });
      })
    )
  );

  it.effect('reads every setting under the WSDIAL prefix', () =>
    pipe(
      ConnectConfiguration,
      Effect.provide(
        configured([
          ['WSDIAL.DISABLE_NAGLE', 'true'],
          ['WSDIAL.MAX_MESSAGE_SIZE', '65536'],
          ['WSDIAL.PER_MESSAGE_DEFLATE', 'false'],
          ['WSDIAL.SKIP_UTF8_VALIDATION', 'true'],
        ])
      ),
      Effect.map((config) => {
        expect(config).toEqual({
          disableNagle: true,
          webSocket: { maxMessageSize: 65536, perMessageDeflate: false, skipUtf8Validation: true },
        });
      })
    )
  );

  it.effect('honors a custom prefix', () =>
    pipe(
      ConnectConfiguration,
      Effect.provide(
        pipe(
          makeConnectConfigurationLive('FEED'),
          Layer.provide(fromEntries([['FEED.DISABLE_NAGLE', 'true']]))
        )
      ),
      Effect.map((config) => {
        expect(config.disableNagle).toBe(true);
      })
    )
  );

  it.effect('rejects a message size that is not positive', () =>
    pipe(
      ConnectConfiguration,
      Effect.provide(configured([['WSDIAL.MAX_MESSAGE_SIZE', '0']])),
      Effect.flip,
      Effect.map((error) => {
        expect(error._op).toBe('InvalidData');
      })
    )
  );

  it.effect('rejects a flag that is not a boolean', () =>
    pipe(
      ConnectConfiguration,
      Effect.provide(configured([['WSDIAL.DISABLE_NAGLE', 'sometimes']])),
      Effect.flip,
      Effect.map((error) => {
        expect(error._op).toBe('InvalidData');
      })
    )
  );
});

describe('connectConfigured', () => {
  it.scoped('connects with the configured options', () =>
    pipe(
      makeFakeConnection(),
      Effect.flatMap(({ layer, recording }) =>
        pipe(
          connectConfigured('ws://example.test/'),
          Effect.provide(layer),
          Effect.provide(
            configured([
              ['WSDIAL.DISABLE_NAGLE', 'true'],
              ['WSDIAL.MAX_MESSAGE_SIZE', '2048'],
            ])
          ),
          Effect.andThen(recording),
          Effect.map((r) => {
            expect(r.events).toEqual(['dial:example.test:80', 'no-delay', 'handshake']);
            expect(r.upgrades[0]?.options).toEqual({ config: { maxMessageSize: 2048 } });
          })
        )
      )
    )
  );
});
