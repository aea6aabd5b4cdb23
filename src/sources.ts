import { readFile } from 'fs/promises';
import { z } from 'zod';
import builtinServers from './data/servers.json';
import { DirectoryInitError } from './errors';
import type { DirectoryData, DirectorySource } from './types';

const HostnameSchema = z
  .string()
  .trim()
  .min(1)
  .transform(host => host.toLowerCase());

// on-disk format of a server directory
export const DirectoryDataSchema = z.object({
  servers: z.record(HostnameSchema),
  rewrites: z.record(HostnameSchema).default({}),
});

// validate raw directory data and lowercase its keys
export function parseDirectoryData(raw: unknown, name: string): DirectoryData {
  const result = DirectoryDataSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DirectoryInitError(`Invalid server directory '${name}': ${issues}`, result.error);
  }
  return {
    servers: lowercaseKeys(result.data.servers),
    rewrites: lowercaseKeys(result.data.rewrites),
  };
}

function lowercaseKeys(record: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    // extensions are stored without a leading dot
    out[key.trim().replace(/^\.+/, '').toLowerCase()] = value;
  }
  return out;
}

// a server directory stored as a JSON file
export class FileDirectorySource implements DirectorySource {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = path;
  }

  async load(): Promise<DirectoryData> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DirectoryInitError(`Failed to read server directory '${this.path}': ${message}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DirectoryInitError(`Malformed server directory '${this.path}': ${message}`, error);
    }
    return parseDirectoryData(raw, this.path);
  }
}

// a server directory already in memory, validated on load
export class StaticDirectorySource implements DirectorySource {
  constructor(
    private readonly data: unknown,
    readonly name = 'static'
  ) {}

  async load(): Promise<DirectoryData> {
    return parseDirectoryData(this.data, this.name);
  }
}

// the directory shipped with the package
export function builtinDirectorySource(): DirectorySource {
  return new StaticDirectorySource(builtinServers, 'builtin');
}
