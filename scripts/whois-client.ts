import { SocksDialer, WhoisClient } from '../src/index';

// process command line arguments
const args = process.argv.slice(2);
const query = args[0] || 'example.com';
const server = args[1] || undefined; // resolve through the directory and the root server
const proxy = args[2] || process.env.WHOIS_PROXY; // e.g. socks5://127.0.0.1:1080
// const server = args[1] || 'whois.verisign-grs.com'; // .com registry
// const server = args[1] || 'whois.arin.net'; // ARIN, for IPs and ASNs

async function main() {
  console.log(`%%% whois-client::main()`, query, server, proxy);
  const client = new WhoisClient();
  if (proxy) {
    client.setDialer(new SocksDialer(proxy));
  }
  // client.setDisableReferral(true);
  // client.setDisableStats(true);
  const result = server ? await client.whois(query, server) : await client.whois(query);
  console.log(result);
}

main().catch((error: unknown) => {
  console.error(`%%% whois-client::error`, error);
  process.exitCode = 1;
});
