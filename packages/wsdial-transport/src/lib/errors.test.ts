import { describe, expect, it } from '@effect/vitest';
import {
  handshakeError,
  isConnectError,
  requestError,
  secureChannelError,
  transportError,
  unsupportedScheme,
} from './errors';

const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), {
  code: 'ECONNREFUSED',
});

describe('transportError', () => {
  it('carries the OS error code of a failed dial', () => {
    const error = transportError.dial('127.0.0.1:9', refused);
    expect(error.operation).toBe('dial');
    expect(error.code).toBe('ECONNREFUSED');
    expect(error.details).toBe('Failed to connect to 127.0.0.1:9 (ECONNREFUSED)');
    expect(error.cause).toBe(refused);
  });

  it('omits the code when the cause has none', () => {
    const error = transportError.io('unix:/tmp/app.sock', new Error('boom'));
    expect(error.details).toBe('I/O failure on unix:/tmp/app.sock');
    expect(error.code).toBeUndefined();
  });

  it('describes tuning failures', () => {
    const error = transportError.tune('example.test:80', 'Cannot disable Nagle');
    expect(error.operation).toBe('tune');
    expect(error.details).toBe('Cannot disable Nagle');
  });
});

describe('handshakeError', () => {
  it('records the status of a rejected upgrade', () => {
    const error = handshakeError.rejected('ws://example.test/', 403, 'Forbidden');
    expect(error.status).toBe(403);
    expect(error.details).toBe('Server answered the upgrade request with 403 Forbidden');
  });

  it('trims a missing status text', () => {
    expect(handshakeError.rejected('ws://example.test/', 500, '').details).toBe(
      'Server answered the upgrade request with 500'
    );
  });
});

describe('secureChannelError', () => {
  it('separates certificate from negotiation failures', () => {
    const expired = Object.assign(new Error('certificate has expired'), {
      code: 'CERT_HAS_EXPIRED',
    });
    expect(secureChannelError.certificate('example.test', expired).reason).toBe('certificate');
    expect(secureChannelError.certificate('example.test', expired).code).toBe('CERT_HAS_EXPIRED');
    expect(secureChannelError.negotiation('example.test', new Error('eof')).reason).toBe(
      'negotiation'
    );
  });
});

describe('isConnectError', () => {
  it('accepts every connect error kind', () => {
    expect(isConnectError(requestError.missingHost('custom:///'))).toBe(true);
    expect(isConnectError(unsupportedScheme('ftp', 'ftp://example.test/'))).toBe(true);
    expect(isConnectError(transportError.dial('example.test:80', refused))).toBe(true);
    expect(isConnectError(secureChannelError.negotiation('example.test', refused))).toBe(true);
    expect(isConnectError(handshakeError.rejected('ws://example.test/', 404, 'Not Found'))).toBe(
      true
    );
  });

  it('rejects other values', () => {
    expect(isConnectError(new Error('plain'))).toBe(false);
    expect(isConnectError({ _tag: 'SomethingElse' })).toBe(false);
    expect(isConnectError(null)).toBe(false);
    expect(isConnectError('TransportError')).toBe(false);
  });
});
