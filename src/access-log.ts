import fs from 'node:fs';
import type { IncomingMessage } from 'node:http';
import path from 'node:path';

export type AccessEvent = 'file.stream' | 'file.download';
export type AccessOutcome = 'success' | 'partial' | 'failure';

export interface AccessLogEntry {
  timestamp?: string;
  event: AccessEvent;
  client: string;
  resource: string;
  outcome: AccessOutcome;
  metadata?: Record<string, unknown>;
}

export interface AccessLogSink {
  log(entry: AccessLogEntry): void;
  flush(): Promise<void>;
}

export interface AccessLoggerOptions {
  dir: string;
  retentionDays?: number;
}

const CLEANUP_INTERVAL_MS = 12 * 60 * 60 * 1000;
const DAY_FILE_RE = /^\d{4}-\d{2}-\d{2}\.jsonl$/;

function toSafeDate(input: string): string {
  return /^\d{4}-\d{2}-\d{2}$/.test(input) ? input : new Date().toISOString().slice(0, 10);
}

function firstForwardedAddress(header: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(header) ? header[0] : header;
  const first = raw?.split(',')[0]?.trim();
  return first || undefined;
}

export function getClientAddress(req: IncomingMessage, trustProxy = false): string {
  if (trustProxy) {
    const forwarded = firstForwardedAddress(req.headers['x-forwarded-for']);
    if (forwarded) {
      return forwarded;
    }
  }
  return req.socket.remoteAddress || 'unknown';
}

export const noopAccessLog: AccessLogSink = {
  log: () => {},
  flush: () => Promise.resolve()
};

export class AccessLogger implements AccessLogSink {
  private readonly dir: string;
  private readonly retentionDays: number;
  private lastCleanupAt = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: AccessLoggerOptions) {
    this.dir = path.resolve(options.dir);
    this.retentionDays = Math.max(1, Math.min(3650, options.retentionDays ?? 30));
    fs.mkdirSync(this.dir, { recursive: true });
    this.cleanupOldFiles();
  }

  getDir(): string {
    return this.dir;
  }

  log(entry: AccessLogEntry): void {
    const timestamp = entry.timestamp ?? new Date().toISOString();
    const day = toSafeDate(timestamp.slice(0, 10));
    const payload = {
      timestamp,
      event: entry.event,
      client: entry.client,
      resource: entry.resource,
      outcome: entry.outcome,
      metadata: entry.metadata ?? {}
    };

    const filePath = path.join(this.dir, `${day}.jsonl`);
    const line = `${JSON.stringify(payload)}\n`;
    this.pending = this.pending
      .then(() => fs.promises.appendFile(filePath, line, { encoding: 'utf8', mode: 0o600 }))
      .catch((error) => {
        const text = error instanceof Error ? error.message : String(error);
        console.warn(`[lanshare] access-log: write failed (${text})`);
      });

    if (Date.now() - this.lastCleanupAt > CLEANUP_INTERVAL_MS) {
      this.cleanupOldFiles();
    }
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private cleanupOldFiles(): void {
    this.lastCleanupAt = Date.now();
    let files: string[] = [];
    try {
      files = fs.readdirSync(this.dir);
    } catch {
      return;
    }

    const cutoffMs = Date.now() - this.retentionDays * 24 * 60 * 60 * 1000;
    for (const file of files) {
      if (!DAY_FILE_RE.test(file)) {
        continue;
      }
      const filePath = path.join(this.dir, file);
      try {
        const stat = fs.statSync(filePath);
        if (stat.mtimeMs < cutoffMs) {
          fs.unlinkSync(filePath);
        }
      } catch (error) {
        const text = error instanceof Error ? error.message : String(error);
        console.warn(`[lanshare] access-log: retention cleanup skipped ${file} (${text})`);
      }
    }
  }
}
