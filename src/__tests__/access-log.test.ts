import fs from 'node:fs/promises';
import type { IncomingMessage } from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { AccessLogger, getClientAddress } from '../access-log.js';

function fakeRequest(headers: IncomingMessage['headers'], remoteAddress?: string): IncomingMessage {
  return { headers, socket: { remoteAddress } } as unknown as IncomingMessage;
}

describe('AccessLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lanshare-access-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per entry to the file of the entry day', async () => {
    const logger = new AccessLogger({ dir });
    logger.log({
      timestamp: '2026-03-04T10:00:00.000Z',
      event: 'file.download',
      client: 'ip:10.0.0.5',
      resource: 'sub/report.csv',
      outcome: 'success',
      metadata: { bytes: 12, expected: 12, status: 200 }
    });
    logger.log({
      timestamp: '2026-03-04T10:00:01.000Z',
      event: 'file.stream',
      client: 'ip:10.0.0.6',
      resource: 'movie.mp4',
      outcome: 'partial'
    });
    await logger.flush();

    const lines = (await fs.readFile(path.join(dir, '2026-03-04.jsonl'), 'utf8')).trim().split('\n');
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        timestamp: '2026-03-04T10:00:00.000Z',
        event: 'file.download',
        client: 'ip:10.0.0.5',
        resource: 'sub/report.csv',
        outcome: 'success',
        metadata: { bytes: 12, expected: 12, status: 200 }
      },
      {
        timestamp: '2026-03-04T10:00:01.000Z',
        event: 'file.stream',
        client: 'ip:10.0.0.6',
        resource: 'movie.mp4',
        outcome: 'partial',
        metadata: {}
      }
    ]);
  });

  it('removes day files older than the retention window on start-up', async () => {
    const stale = path.join(dir, '2020-01-01.jsonl');
    const fresh = path.join(dir, '2026-01-01.jsonl');
    const unrelated = path.join(dir, 'notes.txt');
    for (const file of [stale, fresh, unrelated]) {
      await fs.writeFile(file, '{}\n');
    }
    const old = new Date(Date.now() - 10 * 24 * 60 * 60 * 1000);
    await fs.utimes(stale, old, old);
    await fs.utimes(unrelated, old, old);

    new AccessLogger({ dir, retentionDays: 5 });

    expect((await fs.readdir(dir)).sort()).toEqual(['2026-01-01.jsonl', 'notes.txt']);
  });
});

describe('getClientAddress', () => {
  it('uses the socket address and ignores forwarded headers by default', () => {
    expect(getClientAddress(fakeRequest({ 'x-forwarded-for': '203.0.113.7, 10.0.0.1' }, '127.0.0.1'))).toBe(
      '127.0.0.1'
    );
    expect(getClientAddress(fakeRequest({}, '192.168.1.20'))).toBe('192.168.1.20');
    expect(getClientAddress(fakeRequest({}))).toBe('unknown');
  });

  it('takes the first forwarded address when the proxy is trusted', () => {
    expect(getClientAddress(fakeRequest({ 'x-forwarded-for': '203.0.113.7, 10.0.0.1' }, '127.0.0.1'), true)).toBe(
      '203.0.113.7'
    );
    expect(getClientAddress(fakeRequest({ 'x-forwarded-for': ' ' }, '127.0.0.1'), true)).toBe('127.0.0.1');
  });
});
