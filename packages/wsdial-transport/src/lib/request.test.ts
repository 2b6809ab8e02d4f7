import { describe, expect, it } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import {
  ClientRequest,
  headerValues,
  isClientRequest,
  toClientRequest,
  unbracketHost,
} from './request';

describe('toClientRequest', () => {
  it.effect('normalizes URL text without a port', () =>
    pipe(
      toClientRequest('ws://example.test/chat'),
      Effect.map((request) => {
        expect(request).toEqual({
          _tag: 'ClientRequest',
          url: 'ws://example.test/chat',
          scheme: 'ws',
          host: 'example.test',
          path: '/chat',
          headers: [],
        });
        expect('port' in request).toBe(false);
      })
    )
  );

  it.effect('keeps an explicit port and the query string, and drops the fragment', () =>
    pipe(
      toClientRequest('ws://example.test:9001/feed?room=1#latest'),
      Effect.map((request) => {
        expect(request.port).toBe(9001);
        expect(request.path).toBe('/feed?room=1');
        expect(request.url).toBe('ws://example.test:9001/feed?room=1');
      })
    )
  );

  it.effect('uses / when the URL has no path', () =>
    pipe(
      toClientRequest('wss://example.test'),
      Effect.map((request) => {
        expect(request.scheme).toBe('wss');
        expect(request.path).toBe('/');
      })
    )
  );

  it.effect('keeps a written port that equals the scheme default', () =>
    pipe(
      toClientRequest('http://example.test:80/'),
      Effect.map((request) => {
        expect(request.scheme).toBe('http');
        expect(request.port).toBe(80);
        expect(request.url).toBe('http://example.test/');
      })
    )
  );

  it.effect('keeps a written default port behind userinfo and on IPv6 hosts', () =>
    pipe(
      Effect.all([
        toClientRequest('https://user:pw@example.test:443/feed'),
        toClientRequest('ws://[::1]:80/'),
        toClientRequest('ws://[::1]/'),
      ]),
      Effect.map(([withUser, ipv6, ipv6NoPort]) => {
        expect(withUser.port).toBe(443);
        expect(ipv6.port).toBe(80);
        expect('port' in ipv6NoPort).toBe(false);
      })
    )
  );

  it.effect('strips the brackets from IPv6 hosts', () =>
    pipe(
      toClientRequest('ws://[::1]:8080/'),
      Effect.map((request) => {
        expect(request.host).toBe('::1');
        expect(request.port).toBe(8080);
      })
    )
  );

  it.effect('accepts a URL object without mutating it', () => {
    const url = new URL('wss://example.test/feed#top');
    return pipe(
      toClientRequest(url),
      Effect.map((request) => {
        expect(request.url).toBe('wss://example.test/feed');
        expect(url.hash).toBe('#top');
      })
    );
  });

  it.effect('takes headers as a record', () =>
    pipe(
      toClientRequest({
        url: 'ws://example.test/',
        headers: { Authorization: 'Bearer test-token' },
      }),
      Effect.map((request) => {
        expect(request.headers).toEqual([['Authorization', 'Bearer test-token']]);
      })
    )
  );

  it.effect('takes headers as pairs and keeps repeated names', () =>
    pipe(
      toClientRequest({
        url: 'ws://example.test/',
        headers: [
          ['Sec-WebSocket-Protocol', 'chat'],
          ['sec-websocket-protocol', 'superchat'],
        ],
      }),
      Effect.map((request) => {
        expect(headerValues(request, 'SEC-WEBSOCKET-PROTOCOL')).toEqual(['chat', 'superchat']);
        expect(headerValues(request, 'Origin')).toEqual([]);
      })
    )
  );

  it.effect('returns an already normalized request unchanged', () =>
    pipe(
      toClientRequest('ws://example.test/chat'),
      Effect.flatMap((request) =>
        pipe(
          toClientRequest(request),
          Effect.map((again) => {
            expect(again).toBe(request);
          })
        )
      )
    )
  );

  it.effect('rejects text that is not a URL', () =>
    pipe(
      toClientRequest('not a url'),
      Effect.flip,
      Effect.map((error) => {
        expect(error._tag).toBe('RequestConstructionError');
        expect(error.reason).toBe('invalid-url');
        expect(error.input).toBe('not a url');
      })
    )
  );

  it.effect('rejects a URL without a host', () =>
    pipe(
      toClientRequest('custom:///chat'),
      Effect.flip,
      Effect.map((error) => {
        expect(error.reason).toBe('missing-host');
        expect(error.details).toBe('URL "custom:///chat" has no host');
      })
    )
  );

  it.effect('rejects a header name that is not a token', () =>
    pipe(
      toClientRequest({ url: 'ws://example.test/', headers: { 'Bad Name': 'x' } }),
      Effect.flip,
      Effect.map((error) => {
        expect(error.reason).toBe('invalid-header');
        expect(error.details).toBe('Header "Bad Name": name is not a valid token');
      })
    )
  );

  it.effect('rejects a header value carrying a line break', () =>
    pipe(
      toClientRequest({ url: 'ws://example.test/', headers: { 'X-Trace': 'a\r\nInjected: 1' } }),
      Effect.flip,
      Effect.map((error) => {
        expect(error.reason).toBe('invalid-header');
        expect(error.details).toBe('Header "X-Trace": value contains a forbidden character');
      })
    )
  );
});

describe('toClientRequest with a structured request', () => {
  const structured = (
    host: string,
    headers: ReadonlyArray<readonly [string, string]> = []
  ): ClientRequest =>
    ClientRequest.make({
      url: `ws://${host}/`,
      scheme: 'ws',
      host,
      path: '/',
      headers,
    });

  it.effect('rejects an empty host', () =>
    pipe(
      toClientRequest(structured('')),
      Effect.flip,
      Effect.map((error) => {
        expect(error.reason).toBe('missing-host');
        expect(error.input).toBe('ws:///');
      })
    )
  );

  it.effect('rejects a header value carrying a line break', () =>
    pipe(
      toClientRequest(structured('example.test', [['X-A', 'a\r\nInjected: 1']])),
      Effect.flip,
      Effect.map((error) => {
        expect(error.reason).toBe('invalid-header');
        expect(error.details).toBe('Header "X-A": value contains a forbidden character');
      })
    )
  );

  it.effect('rejects a header name that is not a token', () =>
    pipe(
      toClientRequest(structured('example.test', [['Bad Name', 'x']])),
      Effect.flip,
      Effect.map((error) => {
        expect(error.details).toBe('Header "Bad Name": name is not a valid token');
      })
    )
  );
});

describe('isClientRequest', () => {
  it('does not mistake an init object for a normalized request', () => {
    expect(isClientRequest({ url: 'ws://example.test/' })).toBe(false);
  });
});

describe('unbracketHost', () => {
  it('leaves names and IPv4 addresses alone', () => {
    expect(unbracketHost('example.test')).toBe('example.test');
    expect(unbracketHost('127.0.0.1')).toBe('127.0.0.1');
    expect(unbracketHost('[fe80::1]')).toBe('fe80::1');
  });
});
