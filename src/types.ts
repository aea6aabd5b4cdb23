import type { Duplex } from 'stream';
import type { ServerDirectory } from './caches/servers';

// a whois server address, as passed between resolution, parsing and transport
export interface WhoisServer {
  host: string;
  port: number;
}

// an open, readable and writable connection to a whois server
// net.Socket and the socket handed out by a SOCKS proxy both qualify
export type WhoisConnection = Duplex;

// opens connections to whois servers
// dial() may ignore the signal; cancelableDial() enforces it either way
export interface Dialer {
  dial(server: WhoisServer, signal?: AbortSignal): Promise<WhoisConnection>;
}

// client options
// external API uses Partial<WhoisOptions>, internal uses full WhoisOptions
export interface WhoisOptions {
  dialer: Dialer; // how connections are opened (default: direct TCP)
  timeout: number; // overall deadline of a single raw query in ms (default: 15000)
  disableStats: boolean; // skip the query time footer (default: false)
  disableReferral: boolean; // skip the registrar referral chase (default: false)
  directory: ServerDirectory; // extension -> server directory (default: process-wide directory)
  signal?: AbortSignal; // for cancellation of every query made by the client
}

// a single raw exchange with a whois server
export type WhoisQuestion = {
  query: string; // the query line, without CRLF
  server: WhoisServer; // the server actually dialed
};

// options for one raw exchange
export type WhoisTransportOptions = {
  dialer: Dialer;
  timeout: number;
  signal?: AbortSignal;
};

// the transport function signature
export interface WhoisTransportQuery {
  (question: WhoisQuestion, options: WhoisTransportOptions): Promise<string>;
}

// the tables a directory is populated from
export interface DirectoryData {
  servers: Record<string, string>; // extension -> whois server
  rewrites: Record<string, string>; // whois server -> host actually dialed
}

// external source populating a ServerDirectory
export interface DirectorySource {
  // human-readable origin for log and error messages
  readonly name: string;
  load(): Promise<DirectoryData>;
}
