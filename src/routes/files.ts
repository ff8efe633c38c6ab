import type { Application, Request, Response } from 'express';
import { getClientAddress, type AccessEvent } from '../access-log.js';
import type { ServerContext } from '../context.js';
import { badRequest, FileServerError, notFound } from '../errors.js';
import { contentTypeFor } from '../media-types.js';
import { buildListing, formatFileSize, type ResolvedEntry } from '../metadata.js';
import type { PathResolver } from '../path-resolver.js';
import { contentRangeHeader, parseRange } from '../range.js';
import { streamFile } from '../stream-writer.js';
import { encodeDirectoryPath, encodeUrlPath } from '../views/listing-view.js';
import { decodeRequestPath, readSubPath, respondError, setNoCache } from './respond.js';

export const DOWNLOAD_PREFIX = '/download/';
export const PLAY_PREFIX = '/play/';

interface SendFileOptions {
  attachment: boolean;
}

function toAttachmentFilename(filename: string): string {
  return filename.replace(/[^\w.\-]/g, '_');
}

// RFC 5987 ext-value: encodeURIComponent leaves these four bare
function encodeExtValue(value: string): string {
  return encodeURIComponent(value).replace(/['()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

function queryOf(req: Request): string {
  const index = req.originalUrl.indexOf('?');
  return index >= 0 ? req.originalUrl.slice(index) : '';
}

async function resolveDownloadTarget(resolver: PathResolver, target: string): Promise<ResolvedEntry> {
  try {
    return await resolver.resolve(target);
  } catch (error) {
    const name = target.replace(/^\/+/, '');
    if (!(error instanceof FileServerError) || error.kind !== 'not_found' || name.includes('/')) {
      throw error;
    }
    const found = await resolver.findByName(name);
    console.log(`[lanshare] download: '${name}' found at ${found.relativePath}`);
    return found;
  }
}

async function sendFile(
  req: Request,
  res: Response,
  entry: ResolvedEntry,
  context: ServerContext,
  options: SendFileOptions
): Promise<void> {
  const event: AccessEvent = options.attachment ? 'file.download' : 'file.stream';
  const client = `ip:${getClientAddress(req, context.config.trustProxy)}`;
  const range = parseRange(req.headers.range, entry.size);

  res.setHeader('Accept-Ranges', 'bytes');
  res.setHeader('Content-Type', contentTypeFor(entry.name));
  if (options.attachment) {
    const filename = toAttachmentFilename(entry.name);
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${filename}"; filename*=UTF-8''${encodeExtValue(entry.name)}`
    );
    setNoCache(res);
  }

  if (range.type === 'unsatisfiable') {
    res.status(416);
    res.setHeader('Content-Range', contentRangeHeader(range));
    res.setHeader('Content-Length', '0');
    res.end();
    context.accessLog.log({
      event,
      client,
      resource: entry.relativePath,
      outcome: 'failure',
      metadata: { status: 416, bytes: 0, expected: 0, range: req.headers.range ?? '' }
    });
    return;
  }

  if (range.type === 'partial') {
    res.status(206);
    res.setHeader('Content-Range', contentRangeHeader(range));
  } else {
    res.status(200);
  }
  res.setHeader('Content-Length', String(range.length));

  if (req.method === 'HEAD' || range.length === 0) {
    res.end();
    return;
  }

  const outcome = await streamFile(entry.path, range, res, { chunkSize: context.chunkSize });
  if (outcome.completed) {
    res.end();
  } else if (!res.destroyed) {
    // Content-Length was promised; a short body must not look complete
    res.destroy();
  }

  if (options.attachment) {
    const progress = `${formatFileSize(outcome.bytesWritten)}/${formatFileSize(outcome.expected)}`;
    console.log(
      `[lanshare] download: ${entry.name} ${outcome.completed ? 'complete' : 'incomplete'} (${progress})`
    );
  }

  context.accessLog.log({
    event,
    client,
    resource: entry.relativePath,
    outcome: outcome.completed ? 'success' : 'partial',
    metadata: {
      status: res.statusCode,
      bytes: outcome.bytesWritten,
      expected: outcome.expected,
      disconnected: outcome.disconnected
    }
  });
}

export function registerFileRoutes(app: Application, context: ServerContext): void {
  const { resolver, renderer } = context;

  app.get(`${DOWNLOAD_PREFIX}*`, async (req: Request, res: Response) => {
    try {
      const target = readSubPath(req.path, DOWNLOAD_PREFIX);
      const entry = await resolveDownloadTarget(resolver, target);
      if (entry.kind !== 'file') {
        throw badRequest(`not a file: ${target}`);
      }
      await sendFile(req, res, entry, context, { attachment: true });
    } catch (error) {
      respondError(res, error, 'download');
    }
  });

  app.get(`${PLAY_PREFIX}*`, async (req: Request, res: Response) => {
    try {
      const target = readSubPath(req.path, PLAY_PREFIX);
      const entry = await resolver.resolve(target);
      const location =
        entry.kind === 'directory' ? encodeDirectoryPath(entry.relativePath) : encodeUrlPath(entry.relativePath);
      setNoCache(res);
      res.redirect(302, location);
    } catch (error) {
      respondError(res, error, 'play');
    }
  });

  app.get('*', async (req: Request, res: Response) => {
    try {
      const requestPath = decodeRequestPath(req.path);
      const entry = await resolver.resolve(requestPath);

      if (requestPath === '/' || requestPath.endsWith('/')) {
        if (entry.kind !== 'directory') {
          throw notFound(`directory not found: ${requestPath}`);
        }
        const listing = await buildListing(resolver.root, entry);
        const html = renderer.render(listing);
        setNoCache(res);
        res.status(200);
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.send(html);
        return;
      }

      if (entry.kind === 'directory') {
        res.redirect(301, `${encodeDirectoryPath(entry.relativePath)}${queryOf(req)}`);
        return;
      }
      if (entry.kind !== 'file') {
        throw notFound(`not a regular file: ${requestPath}`);
      }
      await sendFile(req, res, entry, context, { attachment: false });
    } catch (error) {
      respondError(res, error, 'files');
    }
  });
}
