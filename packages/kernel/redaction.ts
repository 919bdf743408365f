/**
 * Sensitive Data Redaction Engine
 *
 * Field-name and value-pattern redaction for log metadata and for error text
 * that is relayed from Google APIs to the agent.
 */

// Patterns for detecting sensitive fields (by key name)
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^access[_-]?token$/i,
  /^refresh[_-]?token$/i,
  /^id[_-]?token$/i,
  /^private[_-]?key$/i,
  /^private[_-]?key[_-]?id$/i,
  /^client[_-]?secret$/i,
  /^credentials$/i,
  /^authorization$/i,
  /^cookie$/i,
  /_secret$/i,
  /_token$/i,
];

// Patterns for detecting sensitive values (by content)
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^-----BEGIN (RSA |EC )?PRIVATE KEY-----/, // PEM keys (service account JSON)
  /^ya29\.[a-zA-Z0-9_-]+/,                  // Google OAuth access token
  /^1\/\/[a-zA-Z0-9_-]{20,}/,               // Google refresh token
  /^[a-zA-Z0-9_-]+\.eyJ/,                   // JWT
  /^Bearer\s+[a-zA-Z0-9._-]+/,              // Bearer token
  /^AIza[0-9A-Za-z_-]{35}$/,                // Google API key
];

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like sensitive data
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

/** Type for sanitized output */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 * Removes or masks sensitive fields and values.
 */
export function sanitizeForLogging(
  data: unknown,
  options: { depth?: number; maxDepth?: number } = {}
): SanitizedData {
  const maxDepth = options.maxDepth ?? 10;
  const currentDepth = options.depth ?? 0;

  if (currentDepth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return isSensitiveValue(data) ? maskValue(data) : data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (typeof data === 'function' || typeof data === 'symbol') {
    return `[${typeof data}]`;
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return { name: data.name, message: sanitizeErrorMessage(data) };
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item, { ...options, depth: currentDepth + 1 }));
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveField(key)
      ? '[REDACTED]'
      : sanitizeForLogging(value, { ...options, depth: currentDepth + 1 });
  }
  return sanitized;
}

/**
 * Sanitize an error message before it is logged or relayed to a caller.
 * Strips tokens, keys and credential file contents from Google client errors.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  let message: string;
  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === 'string') {
    message = error;
  } else {
    message = String(error);
  }

  const patterns = [
    { pattern: /-----BEGIN (RSA |EC )?PRIVATE KEY-----[\s\S]*?-----END (RSA |EC )?PRIVATE KEY-----/g, replacement: '[PRIVATE KEY]' },
    { pattern: /ya29\.[a-zA-Z0-9_-]+/g, replacement: 'ya29.***' },
    { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
    { pattern: /Bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer ***' },
    { pattern: /AIza[0-9A-Za-z_-]{35}/g, replacement: 'AIza***' },
  ];

  for (const { pattern, replacement } of patterns) {
    message = message.replace(pattern, replacement);
  }

  return message;
}
