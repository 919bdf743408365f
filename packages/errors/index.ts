import { getLogger } from '@kernel/logger';
import { sanitizeErrorMessage } from '@kernel/redaction';

const logger = getLogger('errors');

/**
* Unified Error Handling Package
*
* Provides standardized error classes, error codes, and the structured error
* object every tool returns instead of throwing across the agent boundary.
*
* Tool Error Format:
* {
*   error_kind: string;  // Machine-readable error code
*   message: string;     // Human-readable message naming the property/step
*   hint?: string;       // Actionable next step for the agent
*   details?: unknown;   // Extra context, omitted when details are masked
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Resolution / discovery
  DISCOVERY_FAILED: 'DISCOVERY_FAILED',
  PROPERTY_NOT_FOUND: 'PROPERTY_NOT_FOUND',
  AMBIGUOUS_PROPERTY: 'AMBIGUOUS_PROPERTY',

  // Querying
  QUERY_FAILED: 'QUERY_FAILED',

  // Input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNPARSEABLE_DATE: 'UNPARSEABLE_DATE',

  // Startup
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // External API failures
  AUTH_ERROR: 'AUTH_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  INVALID_REQUEST: 'INVALID_REQUEST',
  TIMEOUT_ERROR: 'TIMEOUT_ERROR',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/** Failure kinds a GA API adapter can report */
export type ExternalApiErrorCode =
  | typeof ErrorCodes.AUTH_ERROR
  | typeof ErrorCodes.NETWORK_ERROR
  | typeof ErrorCodes.QUOTA_EXCEEDED
  | typeof ErrorCodes.INVALID_REQUEST
  | typeof ErrorCodes.TIMEOUT_ERROR;

const LIST_HINT = 'Try list_properties or search_properties to find the exact property name or ID.';

const EXTERNAL_API_HINTS: Record<ExternalApiErrorCode, string> = {
  AUTH_ERROR: 'Check that the service account has at least Viewer access to the GA4 property and that the credentials file is valid.',
  NETWORK_ERROR: 'The Google Analytics API could not be reached. Retry the request.',
  QUOTA_EXCEEDED: 'GA4 quota is exhausted for now. Wait before retrying, or narrow the date range and dimensions.',
  INVALID_REQUEST: 'Use get_property_metadata to list the valid metric and dimension names for this property.',
  TIMEOUT_ERROR: 'The request timed out. Retry, or narrow the date range and dimensions.',
};

// ============================================================================
// Tool Error Interface
// ============================================================================

/**
 * Structured error returned by every tool in place of an exception.
 */
export interface ToolErrorPayload {
  error_kind: ErrorCode;
  message: string;
  hint?: string;
  details?: unknown;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly hint: string | undefined;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: unknown,
    hint?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
    this.hint = hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ToolErrorPayload {
    return {
      error_kind: this.code,
      message: this.message,
      ...(this.hint !== undefined && { hint: this.hint }),
      ...(this.details !== undefined && { details: this.details }),
    };
  }

  /**
  * Get the version returned to the agent.
  * details are dropped when masking is on.
  */
  toToolError(maskDetails = false): ToolErrorPayload {
    return {
      error_kind: this.code,
      message: this.message,
      ...(this.hint !== undefined && { hint: this.hint }),
      ...(!maskDetails && this.details !== undefined && { details: this.details }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', details?: unknown, hint?: string) {
    super(message, ErrorCodes.VALIDATION_ERROR, details, hint);
  }

  /**
  * Create ValidationError from Zod error issues
  */
  static fromZodIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string; code: string }>): ValidationError {
    const summary = issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'input'}: ${issue.message}`)
      .join('; ');
    return new ValidationError(
      `Invalid arguments: ${summary}`,
      issues.map(issue => ({
        path: [...issue.path],
        message: issue.message,
        code: issue.code,
      })),
    );
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(
      message,
      ErrorCodes.CONFIGURATION_ERROR,
      details,
      'Set GOOGLE_APPLICATION_CREDENTIALS (or GA_CREDENTIALS_PATH) to the path of a service account JSON file and fix the listed settings.'
    );
  }
}

export class UnparseableDateError extends AppError {
  constructor(expression: string) {
    super(
      `Could not parse date: '${expression}'`,
      ErrorCodes.UNPARSEABLE_DATE,
      { expression },
      'Supported formats: YYYY-MM-DD, MM/DD/YYYY, today, yesterday, NdaysAgo, N weeks ago, N months ago, this/last week, this/last month, this/last year, ytd.'
    );
  }
}

export class PropertyNotFoundError extends AppError {
  constructor(reference: string, suggestions: readonly string[] = [], message?: string) {
    const suffix = suggestions.length > 0
      ? ` Did you mean: ${suggestions.join(', ')}?`
      : '';
    super(
      message ?? `Property '${reference}' not found.${suffix}`,
      ErrorCodes.PROPERTY_NOT_FOUND,
      { reference, suggestions: [...suggestions] },
      LIST_HINT
    );
  }
}

export class DiscoveryFailedError extends AppError {
  constructor(message: string, cause?: unknown) {
    const causeCode = cause instanceof AppError ? cause.code : undefined;
    super(
      message,
      ErrorCodes.DISCOVERY_FAILED,
      causeCode ? { cause: causeCode } : undefined,
      cause instanceof ExternalApiError
        ? EXTERNAL_API_HINTS[cause.code]
        : 'Make sure the service account has been added to at least one GA4 property, then retry list_properties with force_refresh.',
      { cause }
    );
  }
}

/**
* Failure reported by a GA API adapter, already classified and sanitized
*/
export class ExternalApiError extends AppError {
  declare public readonly code: ExternalApiErrorCode;

  constructor(message: string, code: ExternalApiErrorCode, details?: unknown, options?: { cause?: unknown }) {
    super(sanitizeErrorMessage(message), code, details, EXTERNAL_API_HINTS[code], options);
  }
}

export class QueryFailedError extends AppError {
  constructor(
    propertyLabel: string,
    cause: unknown
  ) {
    const reason = cause instanceof AppError ? cause.message : 'Unexpected error while querying the Data API';
    super(
      `Query failed for property ${propertyLabel}: ${reason}`,
      ErrorCodes.QUERY_FAILED,
      cause instanceof AppError ? { cause: cause.code } : undefined,
      cause instanceof ExternalApiError ? cause.hint : 'Retry the request.',
      { cause }
    );
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
* Convert any thrown value into the structured tool error.
* Unknown errors are logged server-side and reported generically.
*/
export function toToolError(error: unknown, maskDetails = false): ToolErrorPayload {
  if (error instanceof AppError) {
    return error.toToolError(maskDetails);
  }

  logger.error('Unexpected error', error instanceof Error ? error : new Error(String(error)));
  return {
    error_kind: ErrorCodes.INTERNAL_ERROR,
    message: 'An unexpected error occurred while processing the request',
    hint: 'Retry the request. If it keeps failing, check the server logs.',
  };
}

/**
* Type guard for structured tool errors
*/
const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCodes));

export function isToolErrorPayload(value: unknown): value is ToolErrorPayload {
  if (!value || typeof value !== 'object') return false;
  const kind: unknown = Reflect.get(value, 'error_kind');
  return typeof kind === 'string' && KNOWN_ERROR_CODES.has(kind);
}
