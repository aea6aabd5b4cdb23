import { ConnectError, toWhoisError, WhoisError } from '../src/errors';

describe('toWhoisError', () => {
  test('should return whois errors unchanged', () => {
    const error = new ConnectError('Connect to whois server (whois.nic.xy) failed', 'whois.nic.xy');
    expect(toWhoisError(error)).toBe(error);
  });

  test('should wrap other errors and keep them as the cause', () => {
    const error = new TypeError('bad value');
    const wrapped = toWhoisError(error);

    expect(wrapped).toBeInstanceOf(WhoisError);
    expect(wrapped.message).toBe('bad value');
    expect(wrapped.name).toBe('TypeError');
    expect(wrapped.cause).toBe(error);
    expect(wrapped.code).toBe(-1);
  });

  test('should wrap thrown values that are not errors', () => {
    expect(toWhoisError('socket hang up').message).toBe('socket hang up');
    expect(toWhoisError('').message).toBe('Unknown whois failure');
  });
});
