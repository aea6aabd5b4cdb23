import debug from 'debug';
import { getDefaultDirectory } from './caches/servers';
import {
  ARIN_ASN_QUERY_PREFIX,
  ARIN_NETWORK_QUERY_PREFIX,
  ARIN_WHOIS_SERVER,
  DEFAULT_TIMEOUT,
  DEFAULT_WHOIS_PORT,
  DEFAULT_WHOIS_SERVER,
  LOG_NAMESPACE,
} from './constants';
import { ConfigurationError, EmptyQueryError, ServerNotFoundError, toWhoisError } from './errors';
import { extractReferral } from './parser';
import { NetDialer } from './transports/dial';
import { tcpQuery } from './transports/tcp';
import type { Dialer, WhoisOptions, WhoisQuestion, WhoisServer } from './types';
import { appendStats, getExtension, isAsn, normalizeQuery, toAsn } from './utils';

const log = debug(`${LOG_NAMESPACE}:client`);

// the root server every discovery starts from
const ROOT_SERVER: WhoisServer = { host: DEFAULT_WHOIS_SERVER, port: DEFAULT_WHOIS_PORT };

// default options for WhoisClient, the directory defaults to the process-wide one
export const DEFAULT_OPTIONS: Omit<WhoisOptions, 'directory'> = {
  dialer: new NetDialer(), // direct TCP, 5s connect timeout
  timeout: DEFAULT_TIMEOUT, // overall deadline of a single raw query in ms
  disableStats: false, // append the query time footer
  disableReferral: false, // follow one registrar referral
};

export class WhoisClient {
  // the client-level options
  options: WhoisOptions;

  // setup client-level options
  constructor(opts?: Partial<WhoisOptions>) {
    this.options = this.getOptions(opts);
  }

  // process partial options into full WhoisOptions with all defaults
  protected getOptions(opts: Partial<WhoisOptions> = {}): WhoisOptions {
    const options: WhoisOptions = {
      ...DEFAULT_OPTIONS,
      ...opts,
      directory: opts.directory ?? getDefaultDirectory(),
    };

    if (!Number.isFinite(options.timeout) || options.timeout <= 0) {
      throw new ConfigurationError(`Invalid timeout: ${options.timeout}`);
    }
    return options;
  }

  // set the dialer used to open connections, e.g. a SocksDialer
  setDialer(dialer: Dialer): this {
    this.options = this.getOptions({ ...this.options, dialer });
    return this;
  }

  // set the overall deadline of a single raw query in ms
  setTimeout(timeout: number): this {
    this.options = this.getOptions({ ...this.options, timeout });
    return this;
  }

  // skip the query time footer
  setDisableStats(disabled: boolean): this {
    this.options = this.getOptions({ ...this.options, disableStats: disabled });
    return this;
  }

  // do not query the referral server named in the first response
  setDisableReferral(disabled: boolean): this {
    this.options = this.getOptions({ ...this.options, disableReferral: disabled });
    return this;
  }

  /**
   * Query whois information for a domain, IP address or ASN.
   *
   * The first non-empty entry of `servers` overrides server resolution.
   * Resolves with the trimmed response, followed by the referral server's
   * response when there is one, and the query time footer unless stats are
   * disabled.
   */
  public async whois(query: string, ...servers: string[]): Promise<string> {
    // options are fixed for the duration of the query
    const options = this.options;

    const start = new Date();
    const startTime = performance.now();

    const result = (await this.lookup(query, servers, options)).trim();
    if (!result || options.disableStats) {
      return result;
    }
    return appendStats(result, Math.round(performance.now() - startTime), start);
  }

  // resolve the server for a query, query it, and chase one referral
  protected async lookup(query: string, servers: string[], options: WhoisOptions): Promise<string> {
    let domain = normalizeQuery(query);
    if (!domain) {
      throw new EmptyQueryError();
    }

    // a directory that failed to load makes every query fail the same way
    await options.directory.init();

    const asn = isAsn(domain);
    if (asn) {
      domain = toAsn(domain);
    }

    // bare labels such as a TLD go straight to the root server
    if (!domain.includes('.') && !domain.includes(':') && !asn) {
      log('querying root server for bare label %s', domain);
      return await this.rawQuery(domain, ROOT_SERVER, options);
    }

    const server = await this.resolveServer(domain, servers, options);
    const result = await this.rawQuery(domain, server, options);

    if (options.disableReferral) {
      return result;
    }

    // follow the referral only when it names another server
    const referral = extractReferral(result);
    if (!referral || referral.host === server.host) {
      return result;
    }

    try {
      log('following referral from %s to %s:%d', server.host, referral.host, referral.port);
      return result + (await this.rawQuery(domain, referral, options));
    } catch (error) {
      // the primary response stands on its own
      log('referral query to %s failed: %s', referral.host, toWhoisError(error).message);
      return result;
    }
  }

  // resolve the server for a query: override, then directory, then discovery through the root server
  protected async resolveServer(
    domain: string,
    servers: string[],
    options: WhoisOptions
  ): Promise<WhoisServer> {
    const override = servers[0]?.trim();
    if (override) {
      return { host: override.toLowerCase(), port: DEFAULT_WHOIS_PORT };
    }

    const extension = getExtension(domain);
    const cached = options.directory.getWhoisServer(extension);
    if (cached) {
      return { host: cached, port: DEFAULT_WHOIS_PORT };
    }

    // ask the root server which server is authoritative for the extension
    log('discovering whois server for %s', extension);
    const response = await this.rawQuery(extension, ROOT_SERVER, options);
    const discovered = extractReferral(response);
    if (!discovered) {
      throw new ServerNotFoundError(`No whois server found for '${domain}'`);
    }

    // remember the server for every later query with this extension
    options.directory.setWhoisServer(extension, discovered.host);
    log('discovered %s for %s', discovered.host, extension);
    return discovered;
  }

  // query a server with its query syntax, dialing its rewrite target if it has one
  protected async rawQuery(query: string, server: WhoisServer, options: WhoisOptions): Promise<string> {
    let line = query;
    if (server.host === ARIN_WHOIS_SERVER) {
      line = (isAsn(query) ? ARIN_ASN_QUERY_PREFIX : ARIN_NETWORK_QUERY_PREFIX) + query;
    }

    const host = options.directory.getRewriteServer(server.host) ?? server.host;
    return await this.transportQuery({ query: line, server: { host, port: server.port } }, options);
  }

  // send a raw query over TCP
  protected async transportQuery(question: WhoisQuestion, options: WhoisOptions): Promise<string> {
    return await tcpQuery(question, {
      dialer: options.dialer,
      timeout: options.timeout,
      signal: options.signal,
    });
  }
}

// shared client behind the module-level whois()
let defaultClient: WhoisClient | null = null;

// the shared client, created on first use with the default options
export function getDefaultClient(): WhoisClient {
  if (!defaultClient) {
    defaultClient = new WhoisClient();
  }
  return defaultClient;
}

// query whois information with the default client
export function whois(query: string, ...servers: string[]): Promise<string> {
  return getDefaultClient().whois(query, ...servers);
}

// export types and constants
export type * from './types';
export * from './constants';
export * from './utils';
export * from './errors';
export { extractReferral, parseServerAddress, extractHostname } from './parser';
export { ServerDirectory, getDefaultDirectory, initWhois } from './caches/servers';
export {
  FileDirectorySource,
  StaticDirectorySource,
  builtinDirectorySource,
  parseDirectoryData,
} from './sources';
export { NetDialer, cancelable, cancelableDial } from './transports/dial';
export { SocksDialer, parseProxyUrl } from './transports/socks';
export { tcpQuery } from './transports/tcp';
