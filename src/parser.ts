import { DEFAULT_WHOIS_PORT, REFERRAL_TOKENS } from './constants';
import type { WhoisServer } from './types';
import { stripProtocol } from './utils';

/**
 * Extract the referral server named in a whois response.
 *
 * Tokens are tried in priority order, not by position in the text: a
 * `Registrar WHOIS Server:` line wins over an earlier `refer:` line. Only the
 * first token found is considered.
 *
 * @returns the server, or `null` when the response names none
 */
export function extractReferral(text: string): WhoisServer | null {
  for (const token of REFERRAL_TOKENS) {
    const index = text.indexOf(token);
    if (index === -1) continue;

    // the value runs to the end of the line, or the end of the text
    const start = index + token.length;
    const end = text.indexOf('\n', start);
    const value = text.slice(start, end === -1 ? undefined : end);
    return parseServerAddress(value);
  }
  return null;
}

/**
 * Parse a server value as found in whois responses into a host and port.
 *
 * Accepts a bare hostname, `host:port`, `[v6]:port`, a bare IPv6 address, or
 * a URL (only its hostname is kept).
 */
export function parseServerAddress(value: string): WhoisServer | null {
  let server = value.trim();
  if (!server) return null;

  // urls keep only the hostname
  if (/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(server)) {
    return { host: extractHostname(server), port: DEFAULT_WHOIS_PORT };
  }

  // drop anything after the authority, e.g. a trailing slash
  server = server.split('/')[0];

  // bracketed IPv6 with optional port
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(server);
  if (bracketed) {
    return { host: bracketed[1].toLowerCase(), port: parsePort(bracketed[2]) };
  }

  // host:port, but not a bare IPv6 address
  const parts = server.split(':');
  if (parts.length === 2) {
    const [host, port] = parts;
    if (!host) return null;
    return { host: host.toLowerCase(), port: parsePort(port) };
  }
  return server ? { host: server.toLowerCase(), port: DEFAULT_WHOIS_PORT } : null;
}

// hostname of a url, falls back to stripping the scheme when the url does not parse
export function extractHostname(url: string): string {
  const hostname = URL.canParse(url) ? new URL(url).hostname : '';
  if (hostname) {
    return hostname.replace(/^\[|\]$/g, '').toLowerCase();
  }
  return stripProtocol(url).split(/[/:?#]/)[0].toLowerCase();
}

// valid tcp port, or the default whois port
function parsePort(port: string | undefined): number {
  if (!port || !/^\d+$/.test(port)) return DEFAULT_WHOIS_PORT;
  const value = Number(port);
  return value > 0 && value <= 65535 ? value : DEFAULT_WHOIS_PORT;
}
