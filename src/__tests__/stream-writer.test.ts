import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { fullRange, parseRange, type ByteRange } from '../range.js';
import { streamFile } from '../stream-writer.js';

class CollectingSink extends Writable {
  readonly chunks: Buffer[] = [];
  private readonly failOnWrite: number | null;
  private writes = 0;

  constructor(failOnWrite: number | null = null) {
    super();
    this.failOnWrite = failOnWrite;
  }

  get body(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.writes += 1;
    if (this.failOnWrite !== null && this.writes >= this.failOnWrite) {
      const error: NodeJS.ErrnoException = new Error('write EPIPE');
      error.code = 'EPIPE';
      callback(error);
      return;
    }
    this.chunks.push(chunk);
    callback();
  }
}

function partial(start: number, end: number, total: number): ByteRange {
  return { type: 'partial', start, end, total, length: end - start + 1 };
}

describe('streamFile', () => {
  const content = 'abcdefghijklmnopqrst';
  let dir: string;
  let filePath: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lanshare-stream-'));
    filePath = path.join(dir, 'letters.txt');
    await fs.writeFile(filePath, content);
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the whole file in chunks', async () => {
    const sink = new CollectingSink();
    const outcome = await streamFile(filePath, fullRange(content.length), sink, { chunkSize: 6 });
    expect(sink.body).toBe(content);
    expect(sink.chunks.map((chunk) => chunk.length)).toEqual([6, 6, 6, 2]);
    expect(outcome).toEqual({ bytesWritten: 20, expected: 20, completed: true, disconnected: false });
  });

  it('seeks to the range start and stops at the range end', async () => {
    const sink = new CollectingSink();
    const outcome = await streamFile(filePath, partial(5, 14, content.length), sink, { chunkSize: 4 });
    expect(sink.body).toBe('fghijklmno');
    expect(outcome.bytesWritten).toBe(10);
    expect(outcome.completed).toBe(true);
  });

  it('serves a suffix range parsed from a header', async () => {
    const range = parseRange('bytes=-3', content.length);
    if (range.type !== 'partial') {
      throw new Error('expected a partial range');
    }
    const sink = new CollectingSink();
    await streamFile(filePath, range, sink);
    expect(sink.body).toBe('rst');
  });

  it('returns a partial count when the peer goes away mid-stream', async () => {
    const sink = new CollectingSink(3);
    const outcome = await streamFile(filePath, fullRange(content.length), sink, { chunkSize: 4 });
    expect(outcome).toEqual({ bytesWritten: 8, expected: 20, completed: false, disconnected: true });
    expect(sink.body).toBe('abcdefgh');
  });

  it('writes nothing into a sink that is already closed', async () => {
    const sink = new CollectingSink();
    sink.destroy();
    const outcome = await streamFile(filePath, fullRange(content.length), sink);
    expect(outcome).toEqual({ bytesWritten: 0, expected: 20, completed: false, disconnected: true });
  });

  it('stops early without a disconnect when the file is shorter than promised', async () => {
    const sink = new CollectingSink();
    const outcome = await streamFile(filePath, partial(0, 29, 30), sink);
    expect(outcome).toEqual({ bytesWritten: 20, expected: 30, completed: false, disconnected: false });
  });

  it('rejects with a not-found error when the file is missing', async () => {
    const sink = new CollectingSink();
    await expect(streamFile(path.join(dir, 'missing.bin'), fullRange(1), sink)).rejects.toMatchObject({
      kind: 'not_found'
    });
  });
});
