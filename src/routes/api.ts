import type { Application, Request, Response } from 'express';
import type { ServerContext } from '../context.js';
import { notFound } from '../errors.js';
import { describeChildren, formatFileSize, parentOf, type ResolvedEntry } from '../metadata.js';
import { collectSystemInfo } from '../system-info.js';
import { encodeUrlPath } from '../views/listing-view.js';
import { readSubPath, respondError, setNoCache } from './respond.js';

export const SERVER_VERSION = '1.0.0';
const SERVER_FEATURES = ['directory_navigation', 'range_streaming', 'download_management', 'system_info'];

function entryToJson(entry: ResolvedEntry): Record<string, unknown> {
  return {
    name: entry.name,
    path: entry.relativePath,
    kind: entry.kind,
    category: entry.category,
    size: entry.size,
    sizeFormatted: entry.kind === 'directory' ? 'Directory' : formatFileSize(entry.size),
    modifiedMs: entry.modifiedMs,
    modified: new Date(entry.modifiedMs).toISOString(),
    permissions: entry.permissions,
    readable: entry.readable,
    writable: entry.writable
  };
}

function fileUrls(entry: ResolvedEntry): { playUrl: string; downloadUrl: string; directUrl: string } {
  const direct = encodeUrlPath(entry.relativePath);
  return {
    playUrl: `/play${direct}`,
    downloadUrl: `/download${direct}`,
    directUrl: direct
  };
}

function sendJson(res: Response, payload: unknown): void {
  setNoCache(res);
  res.status(200).json(payload);
}

export function registerApiRoutes(app: Application, context: ServerContext): void {
  const { resolver } = context;

  app.get('/api/status', async (_req: Request, res: Response) => {
    try {
      const children = await describeChildren(resolver.root, resolver.root);
      const directories = children.filter((entry) => entry.kind === 'directory');
      const files = children.filter((entry) => entry.kind !== 'directory');
      sendJson(res, {
        status: 'running',
        directory: resolver.root,
        timestamp: new Date().toISOString(),
        totalFiles: files.length,
        totalDirectories: directories.length,
        videosCount: files.filter((entry) => entry.category === 'video').length,
        imagesCount: files.filter((entry) => entry.category === 'image').length,
        version: SERVER_VERSION,
        features: SERVER_FEATURES
      });
    } catch (error) {
      respondError(res, error, 'api');
    }
  });

  app.get('/api/videos', async (_req: Request, res: Response) => {
    try {
      const children = await describeChildren(resolver.root, resolver.root);
      const videos = children
        .filter((entry) => entry.kind === 'file' && entry.category === 'video')
        .map((entry) => ({ ...entryToJson(entry), ...fileUrls(entry) }));
      sendJson(res, videos);
    } catch (error) {
      respondError(res, error, 'api');
    }
  });

  app.get('/api/system', async (_req: Request, res: Response) => {
    try {
      sendJson(res, await collectSystemInfo(resolver.root));
    } catch (error) {
      respondError(res, error, 'api');
    }
  });

  app.get('/api/directory/*', async (req: Request, res: Response) => {
    try {
      const target = readSubPath(req.path, '/api/directory/');
      const directory = await resolver.resolve(target);
      if (directory.kind !== 'directory') {
        throw notFound(`directory not found: ${target}`);
      }

      const children = await describeChildren(resolver.root, directory.path);
      const directories = children.filter((entry) => entry.kind === 'directory');
      const files = children.filter((entry) => entry.kind !== 'directory');
      const totalSize = files.reduce((sum, entry) => sum + entry.size, 0);

      sendJson(res, {
        path: directory.relativePath,
        parent: parentOf(directory.relativePath),
        directories: directories.map(entryToJson),
        files: files.map((entry) => ({ ...entryToJson(entry), ...fileUrls(entry) })),
        totalFiles: files.length,
        totalDirectories: directories.length,
        totalSize,
        totalSizeFormatted: formatFileSize(totalSize)
      });
    } catch (error) {
      respondError(res, error, 'api');
    }
  });

  app.get('/api/video/*', async (req: Request, res: Response) => {
    try {
      const target = readSubPath(req.path, '/api/video/');
      const entry = await resolver.resolve(target);
      if (entry.kind !== 'file') {
        throw notFound(`video not found: ${target}`);
      }
      sendJson(res, { ...entryToJson(entry), ...fileUrls(entry) });
    } catch (error) {
      respondError(res, error, 'api');
    }
  });

  app.get('/api/*', (req: Request, res: Response) => {
    respondError(res, notFound(`API endpoint not found: ${req.path}`), 'api');
  });
}
