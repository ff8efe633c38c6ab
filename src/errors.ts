export type FileServerErrorKind = 'not_found' | 'forbidden' | 'unsatisfiable_range' | 'bad_request' | 'io_failure';

const STATUS_BY_KIND: Record<FileServerErrorKind, number> = {
  not_found: 404,
  forbidden: 403,
  unsatisfiable_range: 416,
  bad_request: 400,
  io_failure: 500
};

export class FileServerError extends Error {
  readonly kind: FileServerErrorKind;
  readonly status: number;

  constructor(kind: FileServerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileServerError';
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export function notFound(message = 'not found'): FileServerError {
  return new FileServerError('not_found', message);
}

export function forbidden(message = 'access denied'): FileServerError {
  return new FileServerError('forbidden', message);
}

export function badRequest(message = 'bad request'): FileServerError {
  return new FileServerError('bad_request', message);
}

export function readErrnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

function readHttpStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

export function fromFsError(error: unknown, resource: string): FileServerError {
  if (error instanceof FileServerError) {
    return error;
  }
  const code = readErrnoCode(error);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new FileServerError('not_found', `not found: ${resource}`, { cause: error });
  }
  if (code === 'EACCES' || code === 'EPERM' || code === 'ELOOP') {
    return new FileServerError('forbidden', `access denied: ${resource}`, { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new FileServerError('io_failure', `filesystem operation failed (${detail})`, { cause: error });
}

export function toFileServerError(error: unknown): FileServerError {
  if (error instanceof FileServerError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  // express and its parsers tag client errors with an http status
  switch (readHttpStatus(error)) {
    case 400:
      return new FileServerError('bad_request', 'malformed request', { cause: error });
    case 403:
      return new FileServerError('forbidden', 'access denied', { cause: error });
    case 404:
      return new FileServerError('not_found', 'not found', { cause: error });
    default:
      return new FileServerError('io_failure', detail, { cause: error });
  }
}
