import fs from 'node:fs';
import path from 'node:path';
import { fromFsError } from './errors.js';
import { classifyMedia, type MediaCategory } from './media-types.js';

export type EntryKind = 'file' | 'directory' | 'other';
export type EntryCategory = MediaCategory | 'directory';

export interface ResolvedEntry {
  name: string;
  path: string;
  relativePath: string;
  kind: EntryKind;
  category: EntryCategory;
  size: number;
  modifiedMs: number;
  permissions: string;
  readable: boolean;
  writable: boolean;
}

export interface DirectoryListing {
  path: string;
  parent: string | null;
  entries: ResolvedEntry[];
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function toPortablePath(value: string): string {
  return value.split(path.sep).join('/');
}

export function toRelativePath(baseDir: string, absolutePath: string): string {
  const relative = path.relative(baseDir, absolutePath);
  if (!relative) {
    return '.';
  }
  return toPortablePath(relative);
}

export function parentOf(relativePath: string): string | null {
  if (relativePath === '.') {
    return null;
  }
  return path.posix.dirname(relativePath);
}

export function formatFileSize(bytes: number): string {
  if (bytes <= 0) {
    return '0 B';
  }
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit += 1;
  }
  if (unit === 0) {
    return `${Math.floor(size)} ${SIZE_UNITS[unit]}`;
  }
  return `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

function permissionBits(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, '0');
}

async function canAccess(absolutePath: string, mode: number): Promise<boolean> {
  try {
    await fs.promises.access(absolutePath, mode);
    return true;
  } catch {
    return false;
  }
}

function kindOf(stat: fs.Stats): EntryKind {
  if (stat.isDirectory()) {
    return 'directory';
  }
  if (stat.isFile()) {
    return 'file';
  }
  return 'other';
}

export async function describe(rootDir: string, absolutePath: string): Promise<ResolvedEntry> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(absolutePath);
  } catch (error) {
    throw fromFsError(error, toRelativePath(rootDir, absolutePath));
  }

  const kind = kindOf(stat);
  const name = path.basename(absolutePath);
  const [readable, writable] = await Promise.all([
    canAccess(absolutePath, fs.constants.R_OK),
    canAccess(absolutePath, fs.constants.W_OK)
  ]);

  return {
    name,
    path: absolutePath,
    relativePath: toRelativePath(rootDir, absolutePath),
    kind,
    category: kind === 'directory' ? 'directory' : classifyMedia(name),
    size: kind === 'directory' ? 0 : stat.size,
    modifiedMs: Math.round(stat.mtimeMs),
    permissions: permissionBits(stat.mode),
    readable,
    writable
  };
}

export function compareEntries(left: ResolvedEntry, right: ResolvedEntry): number {
  const leftIsDir = left.kind === 'directory';
  const rightIsDir = right.kind === 'directory';
  if (leftIsDir !== rightIsDir) {
    return leftIsDir ? -1 : 1;
  }
  const leftName = left.name.toLowerCase();
  const rightName = right.name.toLowerCase();
  if (leftName !== rightName) {
    return leftName < rightName ? -1 : 1;
  }
  if (left.name === right.name) {
    return 0;
  }
  return left.name < right.name ? -1 : 1;
}

export async function describeChildren(rootDir: string, dirPath: string): Promise<ResolvedEntry[]> {
  let names: string[];
  try {
    names = await fs.promises.readdir(dirPath);
  } catch (error) {
    throw fromFsError(error, toRelativePath(rootDir, dirPath));
  }

  const described = await Promise.all(
    names.map(async (name) => {
      try {
        return await describe(rootDir, path.join(dirPath, name));
      } catch {
        // entries that vanish or refuse stat mid-listing are left out
        return null;
      }
    })
  );

  const entries = described.filter((entry): entry is ResolvedEntry => entry !== null);
  entries.sort(compareEntries);
  return entries;
}

export async function buildListing(rootDir: string, directory: ResolvedEntry): Promise<DirectoryListing> {
  const entries = await describeChildren(rootDir, directory.path);
  return {
    path: directory.relativePath,
    parent: parentOf(directory.relativePath),
    entries
  };
}
