import {
  appendStats,
  formatQueryDate,
  getExtension,
  isAsn,
  isValidIp,
  normalizeQuery,
  stripProtocol,
  toAsn,
} from '../src/utils';

describe('Utility Functions', () => {
  describe('normalizeQuery', () => {
    test('should strip whitespace and trailing dots', () => {
      expect(normalizeQuery('example.com.')).toBe('example.com');
      expect(normalizeQuery(' example.com ')).toBe('example.com');
      expect(normalizeQuery('\texample.com.\n')).toBe('example.com');
    });

    test('should strip leading dots', () => {
      expect(normalizeQuery('..example.com')).toBe('example.com');
      expect(normalizeQuery('. example.com')).toBe('example.com');
    });

    test('should keep the case of the query', () => {
      expect(normalizeQuery('Example.COM')).toBe('Example.COM');
    });

    test('should return empty string for blank queries', () => {
      expect(normalizeQuery('')).toBe('');
      expect(normalizeQuery('   ')).toBe('');
      expect(normalizeQuery(' ... ')).toBe('');
    });
  });

  describe('isAsn', () => {
    test('should detect prefixed and bare ASNs', () => {
      expect(isAsn('AS15169')).toBe(true);
      expect(isAsn('as15169')).toBe(true);
      expect(isAsn('As15169')).toBe(true);
      expect(isAsn('15169')).toBe(true);
    });

    test('should reject non-ASN queries', () => {
      expect(isAsn('AS')).toBe(false);
      expect(isAsn('ASN15169')).toBe(false);
      expect(isAsn('example.com')).toBe(false);
      expect(isAsn('8.8.8.8')).toBe(false);
      expect(isAsn('AS15169.example')).toBe(false);
    });
  });

  describe('toAsn', () => {
    test('should canonicalize to the uppercase prefix exactly once', () => {
      expect(toAsn('AS15169')).toBe('AS15169');
      expect(toAsn('as15169')).toBe('AS15169');
      expect(toAsn('15169')).toBe('AS15169');
    });

    test('should be idempotent', () => {
      expect(toAsn(toAsn('as64500'))).toBe('AS64500');
    });
  });

  describe('isValidIp', () => {
    test('should detect IPv4 and IPv6 addresses', () => {
      expect(isValidIp('192.0.2.1')).toBe(true);
      expect(isValidIp('2001:db8::1')).toBe(true);
      expect(isValidIp('example.com')).toBe(false);
      expect(isValidIp('192.0.2.0/24')).toBe(false);
    });
  });

  describe('getExtension', () => {
    test('should return the lowercase final label of a domain', () => {
      expect(getExtension('example.com')).toBe('com');
      expect(getExtension('Sub.Example.CO.UK')).toBe('uk');
    });

    test('should return the whole address for IP queries', () => {
      expect(getExtension('192.0.2.1')).toBe('192.0.2.1');
      expect(getExtension('2001:DB8::1')).toBe('2001:db8::1');
    });

    test('should drop the prefix length of a CIDR block', () => {
      expect(getExtension('192.0.2.0/24')).toBe('192.0.2.0');
    });

    test('should return the lowercase ASN for ASN queries', () => {
      expect(getExtension('AS15169')).toBe('as15169');
    });
  });

  describe('stripProtocol', () => {
    test('should strip url schemes', () => {
      expect(stripProtocol('https://whois.example.com')).toBe('whois.example.com');
      expect(stripProtocol('whois://whois.example.com/')).toBe('whois.example.com/');
      expect(stripProtocol('whois.example.com')).toBe('whois.example.com');
    });
  });

  describe('formatQueryDate', () => {
    test('should format the date in UTC', () => {
      const date = new Date(Date.UTC(2006, 0, 2, 15, 4, 5));
      expect(formatQueryDate(date)).toBe('Mon Jan 02 15:04:05 UTC 2006');
    });

    test('should pad single digit fields', () => {
      const date = new Date(Date.UTC(2024, 8, 7, 3, 2, 1));
      expect(formatQueryDate(date)).toBe('Sat Sep 07 03:02:01 UTC 2024');
    });
  });

  describe('appendStats', () => {
    test('should append the two line footer', () => {
      const date = new Date(Date.UTC(2006, 0, 2, 15, 4, 5));
      expect(appendStats('Domain Name: EXAMPLE.TEST', 12, date)).toBe(
        'Domain Name: EXAMPLE.TEST\n\n% Query time: 12 msec\n% WHEN: Mon Jan 02 15:04:05 UTC 2006\n'
      );
    });
  });
});
