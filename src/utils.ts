import { isIP } from 'net';
import { ASN_PREFIX } from './constants';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// normalize a query: trim spaces and leading/trailing periods
export const normalizeQuery = (query: string): string => {
  return String(query)
    .trim()
    .replace(/^[.]+|[.]+$/g, '')
    .trim();
};

// query is an autonomous system number, with or without the AS prefix
export function isAsn(query: string): boolean {
  return /^(as)?\d+$/i.test(query);
}

// canonical ASN form, the uppercase prefix exactly once: 15169, as15169 => AS15169
export function toAsn(query: string): string {
  return ASN_PREFIX + query.replace(/^as/i, '');
}

// query is an IPv4/IPv6 address
export function isValidIp(ip: string): boolean {
  return isIP(ip) !== 0;
}

// the server-selection key of a query
// domains => final label, IP addresses and CIDR blocks => the address, ASNs => the ASN
export function getExtension(query: string): string {
  // drop a CIDR prefix length or path
  const [base] = query.split('/');
  if (isValidIp(base)) {
    return base.toLowerCase();
  }
  const labels = base.split('.');
  return labels[labels.length - 1].toLowerCase();
}

// strip http, https, or whois protocol from a url
export function stripProtocol(url: string): string {
  // strip only alphabetic protocols followed by ://
  return String(url)
    .trim()
    .replace(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//, '');
}

// timestamp of the stats footer, e.g. 'Mon Jan 02 15:04:05 UTC 2006'
export function formatQueryDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${WEEKDAYS[date.getUTCDay()]} ${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())} ${time} UTC ${date.getUTCFullYear()}`;
}

// append the query time footer to a whois result
export function appendStats(result: string, elapsed: number, start: Date): string {
  return `${result}\n\n% Query time: ${elapsed} msec\n% WHEN: ${formatQueryDate(start)}\n`;
}
