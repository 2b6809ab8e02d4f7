/**
 * @wsdial/testing
 *
 * In-process fakes of the Dialer and Handshaker services for testing code
 * that establishes connections, without opening sockets.
 */

export { makeFakeConnection, switchingProtocols } from './lib/fake-collaborators';
export type {
  FakeConnection,
  FakeDialerOptions,
  FakeHandshakerOptions,
  RecordedUpgrade,
  Recording,
} from './lib/fake-collaborators';
