import { ErrorCodes, ExternalApiError, type ExternalApiErrorCode } from '@errors';
import { sanitizeErrorMessage } from '@kernel/redaction';

/**
* gRPC status codes returned by the Data API client
* https://grpc.github.io/grpc/core/md_doc_statuscodes.html
*/
const GRPC_STATUS: Record<number, ExternalApiErrorCode> = {
  3: ErrorCodes.INVALID_REQUEST,   // INVALID_ARGUMENT
  4: ErrorCodes.TIMEOUT_ERROR,     // DEADLINE_EXCEEDED
  5: ErrorCodes.INVALID_REQUEST,   // NOT_FOUND
  7: ErrorCodes.AUTH_ERROR,        // PERMISSION_DENIED
  8: ErrorCodes.QUOTA_EXCEEDED,    // RESOURCE_EXHAUSTED
  14: ErrorCodes.NETWORK_ERROR,    // UNAVAILABLE
  16: ErrorCodes.AUTH_ERROR,       // UNAUTHENTICATED
};

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'ENETUNREACH']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ABORT_ERR']);

function readField(error: unknown, field: string): unknown {
  if (typeof error !== 'object' || error === null || !(field in error)) return undefined;
  return Reflect.get(error, field);
}

function httpStatus(error: unknown): number | undefined {
  const status = readField(error, 'status');
  if (typeof status === 'number') return status;
  const responseStatus = readField(readField(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : undefined;
}

function classifyHttpStatus(status: number): ExternalApiErrorCode {
  if (status === 401 || status === 403) return ErrorCodes.AUTH_ERROR;
  if (status === 429) return ErrorCodes.QUOTA_EXCEEDED;
  if (status === 408 || status === 504) return ErrorCodes.TIMEOUT_ERROR;
  if (status >= 500) return ErrorCodes.NETWORK_ERROR;
  return ErrorCodes.INVALID_REQUEST;
}

/**
* Map a Google client failure onto an error kind
*/
export function classifyGoogleError(error: unknown): ExternalApiErrorCode {
  const code = readField(error, 'code');

  if (typeof code === 'number' && code in GRPC_STATUS) {
    const kind = GRPC_STATUS[code];
    if (kind) return kind;
  }

  const status = httpStatus(error);
  if (status !== undefined && status >= 400) {
    return classifyHttpStatus(status);
  }

  if (typeof code === 'string') {
    if (TIMEOUT_CODES.has(code)) return ErrorCodes.TIMEOUT_ERROR;
    if (NETWORK_CODES.has(code)) return ErrorCodes.NETWORK_ERROR;
    if (code === 'ENOENT' || code === 'EACCES') return ErrorCodes.AUTH_ERROR;
    const numeric = Number(code);
    if (Number.isInteger(numeric) && numeric >= 400) return classifyHttpStatus(numeric);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') return ErrorCodes.TIMEOUT_ERROR;
    if (/default credentials|invalid_grant|private key|client_email/i.test(error.message)) {
      return ErrorCodes.AUTH_ERROR;
    }
  }

  return ErrorCodes.NETWORK_ERROR;
}

/**
* Wrap a Google client failure as ExternalApiError, with credentials stripped
* from the message
*/
export function toExternalApiError(error: unknown, operation: string): ExternalApiError {
  if (error instanceof ExternalApiError) return error;

  const kind = classifyGoogleError(error);
  const status = httpStatus(error);
  const code = readField(error, 'code');
  return new ExternalApiError(
    `${operation} failed: ${sanitizeErrorMessage(error)}`,
    kind,
    {
      ...(typeof code === 'number' || typeof code === 'string' ? { code } : {}),
      ...(status !== undefined ? { status } : {}),
    },
    { cause: error }
  );
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new ExternalApiError(`${operation} was cancelled`, ErrorCodes.TIMEOUT_ERROR);
  }
}
