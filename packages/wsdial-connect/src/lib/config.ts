import { Config, ConfigError, Effect, Layer, Option, pipe } from 'effect';
import {
  decodeWebSocketConfig,
  type ConnectError,
  type Connected,
  type RequestInput,
  type WebSocketConfig,
} from '@wsdial/transport';
import { connectWithConfig, type ConnectRequirements } from './connect';

// ConnectConfiguration service configuration
export type ConnectConfigurationService = {
  readonly disableNagle: boolean;
  readonly webSocket: WebSocketConfig;
};

export class ConnectConfiguration extends Effect.Tag('@wsdial/connect/ConnectConfiguration')<
  ConnectConfiguration,
  ConnectConfigurationService
>() {}

const toWebSocketConfig = (
  prefix: string,
  [maxMessageSize, perMessageDeflate, skipUtf8Validation]: readonly [
    Option.Option<number>,
    Option.Option<boolean>,
    Option.Option<boolean>,
  ]
) =>
  pipe(
    decodeWebSocketConfig({
      ...(Option.isSome(maxMessageSize) && { maxMessageSize: maxMessageSize.value }),
      ...(Option.isSome(perMessageDeflate) && { perMessageDeflate: perMessageDeflate.value }),
      ...(Option.isSome(skipUtf8Validation) && { skipUtf8Validation: skipUtf8Validation.value }),
    }),
    Effect.mapError((error) => ConfigError.InvalidData([prefix], error.message))
  );

/**
 * Reads connection defaults from the environment, e.g. with prefix `WSDIAL`:
 * `WSDIAL_DISABLE_NAGLE`, `WSDIAL_MAX_MESSAGE_SIZE`, `WSDIAL_PER_MESSAGE_DEFLATE`,
 * `WSDIAL_SKIP_UTF8_VALIDATION`.
 */
export const makeConnectConfigurationLive = (prefix: string) =>
  Layer.effect(
    ConnectConfiguration,
    pipe(
      Config.nested(
        Config.all([
          Config.withDefault(Config.boolean('DISABLE_NAGLE'), false),
          Config.option(Config.integer('MAX_MESSAGE_SIZE')),
          Config.option(Config.boolean('PER_MESSAGE_DEFLATE')),
          Config.option(Config.boolean('SKIP_UTF8_VALIDATION')),
        ]),
        prefix
      ),
      Effect.flatMap(([disableNagle, ...webSocket]) =>
        pipe(
          toWebSocketConfig(prefix, webSocket),
          Effect.map((config) => ({ disableNagle, webSocket: config }))
        )
      )
    )
  );

export const ConnectConfigurationLive = makeConnectConfigurationLive('WSDIAL');

/**
 * `connectWithConfig` using the options held by ConnectConfiguration.
 */
export const connectConfigured = (
  input: RequestInput
): Effect.Effect<Connected, ConnectError, ConnectRequirements | ConnectConfiguration> =>
  pipe(
    ConnectConfiguration,
    Effect.flatMap(({ disableNagle, webSocket }) =>
      connectWithConfig(input, { config: webSocket, disableNagle })
    )
  );
