// the IANA root whois server, used to discover the server for an extension
export const DEFAULT_WHOIS_SERVER = 'whois.iana.org';

// default whois port (RFC 3912)
export const DEFAULT_WHOIS_PORT = 43;

// ARIN expects its legacy query syntax: 'a + ' for ASNs, 'n + ' for networks
export const ARIN_WHOIS_SERVER = 'whois.arin.net';
export const ARIN_ASN_QUERY_PREFIX = 'a + ';
export const ARIN_NETWORK_QUERY_PREFIX = 'n + ';

// canonical prefix of an autonomous system number, e.g. AS15169
export const ASN_PREFIX = 'AS';

// marker tokens naming a referral server, in priority order
export const REFERRAL_TOKENS = [
  'Registrar WHOIS Server: ',
  'whois: ',
  'ReferralServer: ',
  'refer: ',
] as const;

// timeouts in ms
export const DEFAULT_TIMEOUT = 15_000; // overall deadline of a single raw query
export const DEFAULT_DIAL_TIMEOUT = 5_000; // connect timeout of the default dialer

// maximum whois response size to prevent memory exhaustion
export const MAX_RESPONSE_SIZE = 1024 * 1024;

// debug namespace prefix
export const LOG_NAMESPACE = 'whois-client';
