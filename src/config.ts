import fs from 'node:fs';
import path from 'node:path';

export interface ServerCliOptions {
  port?: string;
  host?: string;
  directory?: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  directory: string;
  searchParentTree: boolean;
  searchDepth: number;
  searchDirectoryLimit: number;
  accessLogDir: string | null;
  accessLogRetentionDays: number;
  trustProxy: boolean;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 8081;
const DEFAULT_SEARCH_DEPTH = 4;
const DEFAULT_SEARCH_DIRECTORY_LIMIT = 10_000;
const DEFAULT_ACCESS_LOG_RETENTION_DAYS = 30;

const CLI_FLAGS: Record<string, keyof ServerCliOptions> = {
  '--port': 'port',
  '-p': 'port',
  '--host': 'host',
  '--directory': 'directory',
  '-d': 'directory'
};

function lookupFlag(flag: string): keyof ServerCliOptions | undefined {
  return Object.hasOwn(CLI_FLAGS, flag) ? CLI_FLAGS[flag] : undefined;
}

export function isEnabledEnvFlag(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return /^(1|true|yes|on)$/i.test(value.trim());
}

export function parseServerCliOptions(args: string[]): ServerCliOptions {
  const options: ServerCliOptions = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 0) {
      const key = lookupFlag(arg.slice(0, eq));
      if (key) {
        options[key] = arg.slice(eq + 1);
      }
      continue;
    }

    const key = lookupFlag(arg);
    if (!key) {
      continue;
    }
    const next = args[i + 1];
    if (next === undefined || next.startsWith('-')) {
      console.log(`[lanshare] cli: missing value for ${arg}`);
      continue;
    }
    options[key] = next;
    i += 1;
  }
  return options;
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    console.log(`[lanshare] config: invalid port ${raw}, ignored`);
    return undefined;
  }
  return value;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function resolveServeDirectory(rawDirectory: string | undefined, cwd: string): string {
  if (!rawDirectory || rawDirectory.trim().length === 0) {
    return cwd;
  }
  const candidate = path.resolve(cwd, rawDirectory.trim());
  try {
    if (fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
  } catch {
    // fall through to default
  }
  console.log(`[lanshare] config: invalid directory ${rawDirectory}, fallback to ${cwd}`);
  return cwd;
}

export function resolveServerConfig(args: string[], env: Env = process.env, cwd = process.cwd()): ServerConfig {
  const cli = parseServerCliOptions(args);
  const port = parsePort(cli.port) ?? parsePort(env.PORT) ?? DEFAULT_PORT;
  const host = (cli.host ?? env.HOST ?? '').trim() || 'auto';
  const accessLogDir = env.ACCESS_LOG_DIR?.trim();

  return {
    port,
    host,
    directory: resolveServeDirectory(cli.directory ?? env.SERVE_DIRECTORY, cwd),
    searchParentTree: isEnabledEnvFlag(env.SEARCH_PARENT_TREE),
    searchDepth: parsePositiveInt(env.SEARCH_DEPTH, DEFAULT_SEARCH_DEPTH),
    searchDirectoryLimit: parsePositiveInt(env.SEARCH_DIRECTORY_LIMIT, DEFAULT_SEARCH_DIRECTORY_LIMIT),
    accessLogDir: accessLogDir ? path.resolve(cwd, accessLogDir) : null,
    accessLogRetentionDays: parsePositiveInt(env.ACCESS_LOG_RETENTION_DAYS, DEFAULT_ACCESS_LOG_RETENTION_DAYS),
    trustProxy: isEnabledEnvFlag(env.TRUST_PROXY)
  };
}
