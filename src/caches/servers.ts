import debug from 'debug';
import { LOG_NAMESPACE } from '../constants';
import { DirectoryInitError } from '../errors';
import { builtinDirectorySource, FileDirectorySource } from '../sources';
import type { DirectorySource } from '../types';

const log = debug(`${LOG_NAMESPACE}:directory`);

// normalize a directory key: lowercase, no leading dot
const toKey = (key: string): string =>
  String(key)
    .trim()
    .replace(/^\.+/, '')
    .toLowerCase();

/**
 * Maps extensions to their whois servers, and whois servers to the host
 * actually dialed.
 *
 * One directory is usually shared by every client in the process. Entries
 * learned through discovery never expire. Node runs all directory calls on
 * one event loop, so the maps need no locking; the asynchronous part is
 * initialization, which runs once behind a shared promise.
 */
export class ServerDirectory {
  private servers: Map<string, string>;
  private rewrites: Map<string, string>;
  private initialization: Promise<void> | null = null;

  constructor(private source?: DirectorySource) {
    this.servers = new Map();
    this.rewrites = new Map();
  }

  // replace the source init() populates from, only while initialization has not started
  useSource(source: DirectorySource): void {
    if (this.initialization) {
      const current = this.source ? `'${this.source.name}'` : 'no source';
      throw new DirectoryInitError(
        `Cannot load server directory '${source.name}': already initialized from ${current}`
      );
    }
    this.source = source;
  }

  // populate from the source exactly once; every caller awaits the same result
  // a failed initialization stays failed and rejects every later caller too
  init(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.source ? this.load(this.source) : Promise.resolve();
    }
    return this.initialization;
  }

  // replace both tables with the contents of a source
  // the tables are swapped only once the source has loaded and validated
  async load(source: DirectorySource): Promise<void> {
    try {
      const data = await source.load();
      const servers = new Map<string, string>();
      for (const [extension, server] of Object.entries(data.servers)) {
        servers.set(toKey(extension), server);
      }
      const rewrites = new Map<string, string>();
      for (const [server, target] of Object.entries(data.rewrites)) {
        rewrites.set(toKey(server), target);
      }
      this.servers = servers;
      this.rewrites = rewrites;
      log('loaded %d servers and %d rewrites from %s', servers.size, rewrites.size, source.name);
    } catch (error) {
      log('failed to load %s: %O', source.name, error);
      if (error instanceof DirectoryInitError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new DirectoryInitError(`Failed to load server directory '${source.name}': ${message}`, error);
    }
  }

  loadFromFile(path: string): Promise<void> {
    return this.load(new FileDirectorySource(path));
  }

  getWhoisServer(extension: string): string | null {
    return this.servers.get(toKey(extension)) ?? null;
  }

  setWhoisServer(extension: string, server: string): void {
    this.servers.set(toKey(extension), server.toLowerCase());
  }

  getRewriteServer(server: string): string | null {
    return this.rewrites.get(toKey(server)) ?? null;
  }

  clear(): void {
    this.servers.clear();
    this.rewrites.clear();
  }

  size(): number {
    return this.servers.size;
  }
}

// process-wide directory shared by clients that are not given one
let defaultDirectory: ServerDirectory | null = null;

// the process-wide directory, populated from the built-in server list on first use
export function getDefaultDirectory(): ServerDirectory {
  if (!defaultDirectory) {
    defaultDirectory = new ServerDirectory(builtinDirectorySource());
  }
  return defaultDirectory;
}

// populate the process-wide directory from a JSON file instead of the built-in list
// rejects with DirectoryInitError once the directory has been initialized from another source
export async function initWhois(path: string): Promise<void> {
  const directory = getDefaultDirectory();
  directory.useSource(new FileDirectorySource(path));
  await directory.init();
}
