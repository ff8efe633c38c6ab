import fs from 'node:fs';
import type { Writable } from 'node:stream';
import { fromFsError } from './errors.js';
import type { ByteRange, FullRange } from './range.js';

export const STREAM_CHUNK_BYTES = 64 * 1024;

export interface StreamOptions {
  chunkSize?: number;
}

export interface StreamOutcome {
  bytesWritten: number;
  expected: number;
  completed: boolean;
  disconnected: boolean;
}

function isSinkClosed(sink: Writable): boolean {
  return sink.destroyed || sink.writableEnded;
}

function writeChunk(sink: Writable, chunk: Buffer): Promise<boolean> {
  return new Promise((resolve) => {
    let done = false;

    const settle = (value: boolean): void => {
      if (done) {
        return;
      }
      done = true;
      sink.off('close', onClose);
      resolve(value);
    };

    const onClose = (): void => {
      settle(false);
    };

    sink.once('close', onClose);
    try {
      sink.write(chunk, (error) => {
        settle(!error);
      });
    } catch {
      settle(false);
    }
  });
}

export async function streamFile(
  filePath: string,
  range: ByteRange | FullRange,
  sink: Writable,
  options: StreamOptions = {}
): Promise<StreamOutcome> {
  const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? STREAM_CHUNK_BYTES));
  const expected = range.length;

  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(filePath, 'r');
  } catch (error) {
    throw fromFsError(error, filePath);
  }

  let disconnected = false;
  const onSinkError = (): void => {
    disconnected = true;
  };
  sink.on('error', onSinkError);
  sink.once('close', () => {
    sink.off('error', onSinkError);
  });

  let bytesWritten = 0;
  let position = range.start;
  try {
    const buffer = Buffer.allocUnsafe(Math.min(chunkSize, Math.max(1, expected)));
    while (bytesWritten < expected) {
      if (disconnected || isSinkClosed(sink)) {
        disconnected = true;
        break;
      }

      const wanted = Math.min(buffer.length, expected - bytesWritten);
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buffer, 0, wanted, position));
      } catch (error) {
        if (bytesWritten === 0) {
          throw fromFsError(error, filePath);
        }
        console.log(`[lanshare] stream: read failed mid-transfer (${error instanceof Error ? error.message : String(error)})`);
        break;
      }
      if (bytesRead === 0) {
        break;
      }

      // the buffer is reused for the next read, so hand the sink its own copy
      const written = await writeChunk(sink, Buffer.from(buffer.subarray(0, bytesRead)));
      if (!written) {
        disconnected = true;
        break;
      }
      bytesWritten += bytesRead;
      position += bytesRead;
    }
  } finally {
    await handle.close();
  }

  return {
    bytesWritten,
    expected,
    completed: bytesWritten === expected,
    disconnected
  };
}
