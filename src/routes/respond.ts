import type { Response } from 'express';
import { badRequest, toFileServerError } from '../errors.js';

const STALE_FILE_HEADERS = ['Content-Range', 'Content-Disposition', 'Content-Length', 'Accept-Ranges'];

export function setNoCache(res: Response): void {
  res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Expires', '0');
}

export function decodeRequestPath(rawPath: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    throw badRequest('malformed request path');
  }
  if (decoded.includes('\0')) {
    throw badRequest('malformed request path');
  }
  return decoded;
}

export function readSubPath(rawPath: string, prefix: string): string {
  return decodeRequestPath(rawPath.startsWith(prefix) ? rawPath.slice(prefix.length) : '');
}

export function respondError(res: Response, error: unknown, topic: string): void {
  const failure = toFileServerError(error);
  if (failure.kind === 'io_failure') {
    console.log(`[lanshare] ${topic}: ${failure.message}`);
  }

  if (res.headersSent) {
    res.destroy();
    return;
  }

  try {
    for (const header of STALE_FILE_HEADERS) {
      res.removeHeader(header);
    }
    const message = failure.kind === 'io_failure' ? 'internal server error' : failure.message;
    setNoCache(res);
    res.status(failure.status);
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.send(`${failure.status} ${message}\n`);
  } catch (sendError) {
    // the connection is usually gone by now; nothing left to tell the client
    const text = sendError instanceof Error ? sendError.message : String(sendError);
    console.log(`[lanshare] ${topic}: failed to send error response (${text})`);
  }
}
