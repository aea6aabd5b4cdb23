import { extractHostname, extractReferral, parseServerAddress } from '../src/parser';

describe('Response Parser', () => {
  describe('extractReferral', () => {
    test('should extract a registrar whois server with the default port', () => {
      expect(extractReferral('Registrar WHOIS Server: whois.example.com\n')).toEqual({
        host: 'whois.example.com',
        port: 43,
      });
    });

    test('should split host and port', () => {
      expect(extractReferral('ReferralServer: whois.example.org:4321\n')).toEqual({
        host: 'whois.example.org',
        port: 4321,
      });
    });

    test('should return null when no marker is present', () => {
      expect(extractReferral('Domain Name: EXAMPLE.TEST\nRegistry Domain ID: 1\n')).toBeNull();
      expect(extractReferral('')).toBeNull();
    });

    test('should read to the end of the text when there is no line break', () => {
      expect(extractReferral('refer: whois.nic.xy')).toEqual({ host: 'whois.nic.xy', port: 43 });
    });

    test('should trim surrounding whitespace and carriage returns', () => {
      expect(extractReferral('whois:    whois.nic.xy  \r\nstatus: ACTIVE\r\n')).toEqual({
        host: 'whois.nic.xy',
        port: 43,
      });
    });

    test('should prefer tokens by priority, not by position', () => {
      const text = [
        'refer: whois.root.test',
        'whois: whois.registry.test',
        'Registrar WHOIS Server: whois.registrar.test',
      ].join('\n');
      expect(extractReferral(text)).toEqual({ host: 'whois.registrar.test', port: 43 });
    });

    test('should prefer whois over refer', () => {
      const text = 'refer: whois.root.test\nwhois: whois.registry.test\n';
      expect(extractReferral(text)).toEqual({ host: 'whois.registry.test', port: 43 });
    });

    test('should keep only the hostname of a url', () => {
      expect(extractReferral('ReferralServer: whois://whois.arin.net\n')).toEqual({
        host: 'whois.arin.net',
        port: 43,
      });
      expect(
        extractReferral('Registrar WHOIS Server: https://whois.registrar.test/lookup?q=1\n')
      ).toEqual({ host: 'whois.registrar.test', port: 43 });
      expect(extractReferral('ReferralServer: rwhois://rwhois.example.net:4321\n')).toEqual({
        host: 'rwhois.example.net',
        port: 43,
      });
    });

    test('should lowercase the host', () => {
      expect(extractReferral('Registrar WHOIS Server: WHOIS.Registrar.TEST\n')).toEqual({
        host: 'whois.registrar.test',
        port: 43,
      });
    });

    test('should return null when the first matched token has no value', () => {
      expect(extractReferral('Registrar WHOIS Server: \nwhois: whois.registry.test\n')).toBeNull();
    });
  });

  describe('parseServerAddress', () => {
    test('should parse a bare hostname', () => {
      expect(parseServerAddress('whois.example.com')).toEqual({
        host: 'whois.example.com',
        port: 43,
      });
    });

    test('should fall back to the default port for invalid ports', () => {
      expect(parseServerAddress('whois.example.org:abc')).toEqual({
        host: 'whois.example.org',
        port: 43,
      });
      expect(parseServerAddress('whois.example.org:70000')).toEqual({
        host: 'whois.example.org',
        port: 43,
      });
    });

    test('should keep bare IPv6 addresses whole', () => {
      expect(parseServerAddress('2001:db8::1')).toEqual({ host: '2001:db8::1', port: 43 });
    });

    test('should parse bracketed IPv6 addresses with a port', () => {
      expect(parseServerAddress('[2001:db8::1]:4321')).toEqual({ host: '2001:db8::1', port: 4321 });
    });

    test('should drop a trailing path', () => {
      expect(parseServerAddress('whois.example.com/')).toEqual({
        host: 'whois.example.com',
        port: 43,
      });
    });

    test('should return null for empty values', () => {
      expect(parseServerAddress('   ')).toBeNull();
      expect(parseServerAddress(':4321')).toBeNull();
    });
  });

  describe('extractHostname', () => {
    test('should return the hostname of a url', () => {
      expect(extractHostname('https://whois.example.com:8080/path')).toBe('whois.example.com');
      expect(extractHostname('https://[2001:db8::1]:8080/')).toBe('2001:db8::1');
    });
  });
});
