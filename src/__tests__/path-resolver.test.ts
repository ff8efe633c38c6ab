import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FileServerError } from '../errors.js';
import { PathResolver } from '../path-resolver.js';

async function expectKind(promise: Promise<unknown>, kind: FileServerError['kind']): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(FileServerError);
  await expect(promise).rejects.toMatchObject({ kind });
}

describe('PathResolver', () => {
  let sandbox: string;
  let root: string;

  beforeAll(async () => {
    sandbox = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'lanshare-resolver-')));
    root = path.join(sandbox, 'served');
    await fs.mkdir(path.join(root, 'sub', 'deeper'), { recursive: true });
    await fs.mkdir(path.join(sandbox, 'outside'), { recursive: true });
    await fs.writeFile(path.join(root, 'a.txt'), 'hello');
    await fs.writeFile(path.join(root, 'sub', 'b.txt'), 'inner');
    await fs.writeFile(path.join(root, 'sub', 'deeper', 'report.csv'), 'x,y\n1,2\n');
    await fs.writeFile(path.join(sandbox, 'outside', 'secret.txt'), 'secret');
    await fs.writeFile(path.join(sandbox, 'sibling-only.txt'), 'parent tree');
    await fs.symlink(path.join(sandbox, 'outside'), path.join(root, 'escape'));
    await fs.symlink(path.join(root, 'sub', 'b.txt'), path.join(root, 'link-to-b.txt'));
  });

  afterAll(async () => {
    await fs.rm(sandbox, { recursive: true, force: true });
  });

  describe('resolve', () => {
    it('resolves the root for an empty or slash-only path', async () => {
      const resolver = await PathResolver.create(root);
      const entry = await resolver.resolve('/');
      expect(entry.path).toBe(root);
      expect(entry.relativePath).toBe('.');
      expect(entry.kind).toBe('directory');
      expect((await resolver.resolve('')).path).toBe(root);
    });

    it('resolves a file below the root', async () => {
      const resolver = await PathResolver.create(root);
      const entry = await resolver.resolve('/sub/b.txt');
      expect(entry.path).toBe(path.join(root, 'sub', 'b.txt'));
      expect(entry.relativePath).toBe('sub/b.txt');
      expect(entry.kind).toBe('file');
      expect(entry.size).toBe(5);
    });

    it('keeps dot-dot sequences that stay inside the root', async () => {
      const resolver = await PathResolver.create(root);
      const entry = await resolver.resolve('/sub/../a.txt');
      expect(entry.path).toBe(path.join(root, 'a.txt'));
    });

    it('rejects dot-dot sequences that climb out of the root', async () => {
      const resolver = await PathResolver.create(root);
      for (const attempt of ['/../outside/secret.txt', '../../etc/passwd', '/sub/../../outside/secret.txt']) {
        await expectKind(resolver.resolve(attempt), 'forbidden');
      }
    });

    it('rejects symlinks that point outside the root', async () => {
      const resolver = await PathResolver.create(root);
      await expectKind(resolver.resolve('/escape/secret.txt'), 'forbidden');
      await expectKind(resolver.resolve('/escape'), 'forbidden');
    });

    it('follows symlinks that stay inside the root to their canonical path', async () => {
      const resolver = await PathResolver.create(root);
      const entry = await resolver.resolve('/link-to-b.txt');
      expect(entry.path).toBe(path.join(root, 'sub', 'b.txt'));
      expect(entry.relativePath).toBe('sub/b.txt');
    });

    it('reports missing paths as not found', async () => {
      const resolver = await PathResolver.create(root);
      await expectKind(resolver.resolve('/nope.txt'), 'not_found');
      await expectKind(resolver.resolve('/a.txt/child'), 'not_found');
    });

    it('canonicalizes a root given through a symlink', async () => {
      const alias = path.join(sandbox, 'alias');
      await fs.symlink(root, alias);
      const resolver = await PathResolver.create(alias);
      expect(resolver.root).toBe(root);
      expect((await resolver.resolve('a.txt')).path).toBe(path.join(root, 'a.txt'));
    });
  });

  describe('findByName', () => {
    beforeEach(() => {
      jest.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('finds a file directly under the root', async () => {
      const resolver = await PathResolver.create(root);
      expect((await resolver.findByName('a.txt')).relativePath).toBe('a.txt');
    });

    it('finds a file nested two directories below the root', async () => {
      const resolver = await PathResolver.create(root);
      const entry = await resolver.findByName('report.csv');
      expect(entry.path).toBe(path.join(root, 'sub', 'deeper', 'report.csv'));
      expect(entry.relativePath).toBe('sub/deeper/report.csv');
    });

    it('prefers the match closest to the root', async () => {
      await fs.writeFile(path.join(root, 'sub', 'dup.txt'), 'shallow');
      await fs.mkdir(path.join(root, 'sub', 'deeper', 'deepest'), { recursive: true });
      await fs.writeFile(path.join(root, 'sub', 'deeper', 'deepest', 'dup.txt'), 'deep');
      const resolver = await PathResolver.create(root);
      expect((await resolver.findByName('dup.txt')).relativePath).toBe('sub/dup.txt');
    });

    it('does not return directories or names with separators', async () => {
      const resolver = await PathResolver.create(root);
      await expectKind(resolver.findByName('deeper'), 'not_found');
      await expectKind(resolver.findByName('sub/b.txt'), 'not_found');
      await expectKind(resolver.findByName('..'), 'not_found');
    });

    it('skips matches reached through a symlink that leaves the root', async () => {
      const resolver = await PathResolver.create(root);
      await expectKind(resolver.findByName('secret.txt'), 'not_found');
    });

    it('stays inside the root unless the parent tree search is enabled', async () => {
      const strict = await PathResolver.create(root);
      await expectKind(strict.findByName('sibling-only.txt'), 'not_found');

      const permissive = await PathResolver.create(root, { searchParentTree: true });
      const entry = await permissive.findByName('sibling-only.txt');
      expect(entry.path).toBe(path.join(sandbox, 'sibling-only.txt'));
    });

    it('respects the parent tree depth limit', async () => {
      await fs.mkdir(path.join(sandbox, 'l1', 'l2'), { recursive: true });
      await fs.writeFile(path.join(sandbox, 'l1', 'l2', 'far.txt'), 'far');
      const shallow = await PathResolver.create(root, { searchParentTree: true, parentDepth: 2 });
      await expectKind(shallow.findByName('far.txt'), 'not_found');
      const deep = await PathResolver.create(root, { searchParentTree: true, parentDepth: 3 });
      expect((await deep.findByName('far.txt')).path).toBe(path.join(sandbox, 'l1', 'l2', 'far.txt'));
    });

    it('gives up once the directory budget is spent', async () => {
      const capped = await PathResolver.create(root, { directoryLimit: 1 });
      await expectKind(capped.findByName('report.csv'), 'not_found');
      const roomy = await PathResolver.create(root, { directoryLimit: 3 });
      expect((await roomy.findByName('report.csv')).relativePath).toBe('sub/deeper/report.csv');
    });
  });
});
