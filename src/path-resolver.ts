import fs from 'node:fs';
import path from 'node:path';
import { forbidden, fromFsError, notFound } from './errors.js';
import { describe, type ResolvedEntry } from './metadata.js';

export interface FindByNameOptions {
  searchParentTree: boolean;
  parentDepth: number;
  directoryLimit: number;
}

interface SearchBudget {
  remaining: number;
}

const DEFAULT_FIND_OPTIONS: FindByNameOptions = {
  searchParentTree: false,
  parentDepth: 4,
  directoryLimit: 10_000
};

export function isWithinBase(baseDir: string, absolutePath: string): boolean {
  const relative = path.relative(baseDir, absolutePath);
  if (relative === '') {
    return true;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

function normalizeRequestPath(requestPath: string): string {
  const trimmed = requestPath.replace(/^[/\\]+/, '');
  return trimmed.length === 0 ? '.' : trimmed;
}

export class PathResolver {
  readonly root: string;
  private readonly findOptions: FindByNameOptions;

  private constructor(root: string, findOptions: FindByNameOptions) {
    this.root = root;
    this.findOptions = findOptions;
  }

  static async create(rootDir: string, findOptions: Partial<FindByNameOptions> = {}): Promise<PathResolver> {
    const root = await fs.promises.realpath(path.resolve(rootDir));
    const stat = await fs.promises.stat(root);
    if (!stat.isDirectory()) {
      throw new Error(`served root is not a directory: ${root}`);
    }
    return new PathResolver(root, { ...DEFAULT_FIND_OPTIONS, ...findOptions });
  }

  async canonicalize(requestPath: string): Promise<string> {
    const joined = path.resolve(this.root, normalizeRequestPath(requestPath));
    if (!isWithinBase(this.root, joined)) {
      throw forbidden(`access denied: ${requestPath}`);
    }

    let canonical: string;
    try {
      canonical = await fs.promises.realpath(joined);
    } catch (error) {
      throw fromFsError(error, requestPath);
    }

    if (!isWithinBase(this.root, canonical)) {
      throw forbidden(`access denied: ${requestPath}`);
    }
    return canonical;
  }

  async resolve(requestPath: string): Promise<ResolvedEntry> {
    const canonical = await this.canonicalize(requestPath);
    return describe(this.root, canonical);
  }

  async findByName(name: string): Promise<ResolvedEntry> {
    if (!name || name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
      throw notFound(`file not found: ${name}`);
    }

    const budget: SearchBudget = { remaining: this.findOptions.directoryLimit };

    const direct = await this.acceptMatch(path.join(this.root, name), this.root);
    if (direct) {
      return direct;
    }

    const inRoot = await this.searchTree(this.root, name, Number.POSITIVE_INFINITY, budget, null);
    if (inRoot) {
      return inRoot;
    }

    if (this.findOptions.searchParentTree) {
      const parentDir = path.dirname(this.root);
      if (parentDir !== this.root && parentDir !== path.parse(parentDir).root) {
        console.log(`[lanshare] search: '${name}' not under root, trying parent tree ${parentDir}`);
        const inParent = await this.searchTree(parentDir, name, this.findOptions.parentDepth, budget, this.root);
        if (inParent) {
          return inParent;
        }
      }
    }

    throw notFound(`file not found: ${name}`);
  }

  private async searchTree(
    baseDir: string,
    name: string,
    maxDepth: number,
    budget: SearchBudget,
    skipDir: string | null
  ): Promise<ResolvedEntry | null> {
    let level: string[] = [baseDir];
    let depth = 0;

    while (level.length > 0 && depth < maxDepth) {
      const next: string[] = [];
      for (const dir of level) {
        if (budget.remaining <= 0) {
          console.log(`[lanshare] search: directory limit reached looking for '${name}'`);
          return null;
        }
        budget.remaining -= 1;

        let entries: fs.Dirent[];
        try {
          entries = await fs.promises.readdir(dir, { withFileTypes: true });
        } catch {
          // unreadable directories are passed over
          continue;
        }

        for (const entry of entries) {
          const entryPath = path.join(dir, entry.name);
          if (entry.isDirectory()) {
            if (entryPath !== skipDir) {
              next.push(entryPath);
            }
            continue;
          }
          if (entry.name !== name || !(entry.isFile() || entry.isSymbolicLink())) {
            continue;
          }
          const accepted = await this.acceptMatch(entryPath, baseDir);
          if (accepted) {
            return accepted;
          }
        }
      }
      level = next;
      depth += 1;
    }
    return null;
  }

  private async acceptMatch(candidate: string, boundary: string): Promise<ResolvedEntry | null> {
    let canonical: string;
    try {
      canonical = await fs.promises.realpath(candidate);
    } catch {
      return null;
    }
    if (!isWithinBase(boundary, canonical) || canonical === this.root) {
      return null;
    }
    try {
      const entry = await describe(this.root, canonical);
      return entry.kind === 'file' ? entry : null;
    } catch {
      return null;
    }
  }
}
