import { SocksClient, type SocksProxy } from 'socks';
import { DEFAULT_DIAL_TIMEOUT } from '../constants';
import { ConfigurationError } from '../errors';
import type { Dialer, WhoisConnection, WhoisServer } from '../types';

// parse a socks4://, socks5:// or socks:// proxy url
export function parseProxyUrl(url: string): SocksProxy {
  if (!URL.canParse(url)) {
    throw new ConfigurationError(`Invalid proxy url: ${url}`);
  }
  const { protocol, hostname, port, username, password } = new URL(url);

  let type: 4 | 5;
  switch (protocol) {
    case 'socks4:':
    case 'socks4a:':
      type = 4;
      break;
    case 'socks:':
    case 'socks5:':
    case 'socks5h:':
      type = 5;
      break;
    default:
      throw new ConfigurationError(`Unsupported proxy protocol: ${protocol}`);
  }

  return {
    host: hostname,
    port: port ? Number(port) : 1080,
    type,
    ...(username && { userId: decodeURIComponent(username) }),
    ...(password && { password: decodeURIComponent(password) }),
  };
}

// connections tunnelled through a SOCKS proxy
// the proxy resolves the whois server hostname
export class SocksDialer implements Dialer {
  readonly proxy: SocksProxy;

  constructor(
    proxy: SocksProxy | string,
    private readonly timeout: number = DEFAULT_DIAL_TIMEOUT
  ) {
    this.proxy = typeof proxy === 'string' ? parseProxyUrl(proxy) : proxy;
  }

  async dial(server: WhoisServer): Promise<WhoisConnection> {
    const { socket } = await SocksClient.createConnection({
      proxy: this.proxy,
      command: 'connect',
      destination: { host: server.host, port: server.port },
      timeout: this.timeout,
    });
    return socket;
  }
}
