import { Data, type Redacted } from 'effect';

/**
 * Caller-supplied encryption and validation policy. Borrowed for the duration
 * of one upgrade; never retained.
 */
export interface TrustConfig {
  readonly ca?: ReadonlyArray<string | Uint8Array>;
  readonly cert?: string | Uint8Array;
  readonly key?: string | Uint8Array;
  readonly passphrase?: Redacted.Redacted;
  /** Defaults to true. */
  readonly rejectUnauthorized?: boolean;
  /** Name checked against the certificate instead of the request host. */
  readonly servername?: string;
}

export type Connector = Data.TaggedEnum<{
  Plain: {};
  Tls: { readonly trust: TrustConfig };
}>;

const { Plain, Tls, $is, $match } = Data.taggedEnum<Connector>();

export const Connector = {
  Plain,
  Tls,
  $is,
  $match,
  /**
   * System trust roots with certificate verification on.
   */
  defaultTls: (): Connector => Tls({ trust: {} }),
};
