export interface ByteRange {
  type: 'partial';
  start: number;
  end: number;
  total: number;
  length: number;
}

export interface FullRange {
  type: 'full';
  start: 0;
  total: number;
  length: number;
}

export interface UnsatisfiableRange {
  type: 'unsatisfiable';
  total: number;
}

export type RangeResult = ByteRange | FullRange | UnsatisfiableRange;

const BYTES_RANGE_RE = /^bytes\s*=\s*(\d*)\s*-\s*(\d*)\s*$/i;

export function fullRange(total: number): FullRange {
  return { type: 'full', start: 0, total, length: total };
}

function partialRange(start: number, end: number, total: number): ByteRange {
  return { type: 'partial', start, end, total, length: end - start + 1 };
}

export function parseRange(header: string | undefined, total: number): RangeResult {
  if (header === undefined || header.trim().length === 0) {
    return fullRange(total);
  }

  // multi-range requests are answered with the whole representation
  if (header.includes(',')) {
    return fullRange(total);
  }

  const match = BYTES_RANGE_RE.exec(header.trim());
  if (!match) {
    return fullRange(total);
  }

  const [, rawStart, rawEnd] = match;
  if (!rawStart && !rawEnd) {
    return fullRange(total);
  }

  if (!rawStart) {
    const suffixLength = Number.parseInt(rawEnd, 10);
    if (suffixLength === 0 || total === 0) {
      return { type: 'unsatisfiable', total };
    }
    // a suffix too large to represent still covers the whole file
    const from = Number.isSafeInteger(suffixLength) ? Math.max(0, total - suffixLength) : 0;
    return partialRange(from, total - 1, total);
  }

  const start = Number.parseInt(rawStart, 10);
  if (!Number.isSafeInteger(start) || start >= total) {
    return { type: 'unsatisfiable', total };
  }
  const parsedEnd = rawEnd ? Number.parseInt(rawEnd, 10) : total - 1;
  const requestedEnd = Number.isSafeInteger(parsedEnd) ? parsedEnd : total - 1;
  if (start > requestedEnd) {
    return { type: 'unsatisfiable', total };
  }

  return partialRange(start, Math.min(requestedEnd, total - 1), total);
}

export function contentRangeHeader(range: ByteRange | UnsatisfiableRange): string {
  if (range.type === 'unsatisfiable') {
    return `bytes */${range.total}`;
  }
  return `bytes ${range.start}-${range.end}/${range.total}`;
}
