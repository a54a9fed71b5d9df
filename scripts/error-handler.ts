/**
 * Error handling for the repository scout
 */

export enum ErrorCode {
  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  VALIDATION_FAILED = 'VALIDATION_FAILED',

  // API errors
  API_RATE_LIMIT = 'API_RATE_LIMIT',
  API_UNAUTHORIZED = 'API_UNAUTHORIZED',
  API_NOT_FOUND = 'API_NOT_FOUND',
  API_SERVER_ERROR = 'API_SERVER_ERROR',
  API_NETWORK_ERROR = 'API_NETWORK_ERROR',

  // Processing errors
  SEARCH_FAILED = 'SEARCH_FAILED',
  STORAGE_FAILED = 'STORAGE_FAILED',
  EXPORT_FAILED = 'EXPORT_FAILED',

  UNKNOWN = 'UNKNOWN'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface ErrorContext {
  component?: string;
  operation?: string;
  resource?: string;
  originalError?: string;
  statusCode?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Error with a code, context and recovery suggestions
 */
export class SelectorError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;
  public readonly suggestions: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext = {},
    recoverable: boolean = true,
    suggestions: string[] = []
  ) {
    super(message);
    this.name = 'SelectorError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();
    this.recoverable = recoverable;
    this.suggestions = suggestions;
  }

  /**
   * Get formatted error message with context
   */
  getFormattedMessage(): string {
    let message = `[${this.code}] ${this.message}`;

    if (this.context.component) {
      message += ` (Component: ${this.context.component})`;
    }

    if (this.context.operation) {
      message += ` (Operation: ${this.context.operation})`;
    }

    if (this.context.resource) {
      message += ` (Resource: ${this.context.resource})`;
    }

    return message;
  }

  /**
   * Get recovery suggestions, falling back to defaults for the error code
   */
  getRecoverySuggestions(): string[] {
    if (this.suggestions.length > 0) {
      return this.suggestions;
    }

    switch (this.code) {
      case ErrorCode.CONFIG_INVALID:
        return [
          'Check repo-scout.yml syntax',
          'Remove unknown or mistyped values and retry'
        ];

      case ErrorCode.API_RATE_LIMIT:
        return [
          'Wait for the rate limit to reset',
          'Lower --limit to reduce the cost of each search'
        ];

      case ErrorCode.API_UNAUTHORIZED:
        return [
          'Check that GITHUB_TOKEN is valid',
          'Generate a new personal access token if needed'
        ];

      case ErrorCode.API_NETWORK_ERROR:
        return [
          'Check your network connection',
          'Retry the command in a moment'
        ];

      case ErrorCode.STORAGE_FAILED:
        return [
          'Check that the database path is writable',
          'Run `repo-scout backup` before repairing the database'
        ];

      default:
        return [
          'Check the error message for specific details',
          'Try running with --verbose for more information'
        ];
    }
  }
}

/**
 * Outcome of a single fallible lookup
 */
export type LookupResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string; error: SelectorError };

/**
 * Run a lookup and capture its failure instead of throwing
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<LookupResult<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    const normalized = normalizeError(error);
    return { ok: false, reason: normalized.message, error: normalized };
  }
}

/**
 * Read the HTTP status off an Octokit request error
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];

/**
 * Convert any thrown value to a SelectorError
 */
export function normalizeError(error: unknown, context: ErrorContext = {}): SelectorError {
  if (error instanceof SelectorError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = getErrorStatus(error);

  if (status !== undefined) {
    return createApiError(message, status, context);
  }

  const code = getErrorCode(error);
  const name = error instanceof Error ? error.name : '';
  const lowerMessage = message.toLowerCase();

  if ((code && NETWORK_ERROR_CODES.includes(code)) ||
      name === 'AbortError' ||
      name === 'TimeoutError' ||
      lowerMessage.includes('network') ||
      lowerMessage.includes('timeout')) {
    return new SelectorError(
      message,
      ErrorCode.API_NETWORK_ERROR,
      ErrorSeverity.MEDIUM,
      { component: 'api', originalError: code ?? name, ...context }
    );
  }

  return new SelectorError(
    message,
    ErrorCode.UNKNOWN,
    ErrorSeverity.MEDIUM,
    { originalError: name || typeof error, ...context }
  );
}

/**
 * Whether a failed API call is worth retrying
 */
export function isRetryable(error: SelectorError): boolean {
  if (error.code === ErrorCode.API_RATE_LIMIT || error.code === ErrorCode.API_NETWORK_ERROR) {
    return true;
  }
  const status = error.context.statusCode;
  return error.code === ErrorCode.API_SERVER_ERROR &&
    (status === 502 || status === 503 || status === 504);
}

/**
 * Print an error with severity-appropriate level and suggestions
 */
export function reportError(error: unknown): void {
  const normalized = normalizeError(error);
  const message = normalized.getFormattedMessage();

  switch (normalized.severity) {
    case ErrorSeverity.CRITICAL:
    case ErrorSeverity.HIGH:
      console.error('❌', message);
      break;
    case ErrorSeverity.MEDIUM:
      console.warn('⚠️', message);
      break;
    default:
      console.info('ℹ️', message);
  }

  const suggestions = normalized.getRecoverySuggestions();
  if (suggestions.length > 0) {
    console.log('💡 Recovery suggestions:');
    suggestions.forEach(suggestion => console.log(`   • ${suggestion}`));
  }
}

/**
 * Utility functions for creating specific errors
 */
export const createConfigError = (message: string, context?: ErrorContext): SelectorError => {
  return new SelectorError(
    message,
    ErrorCode.CONFIG_INVALID,
    ErrorSeverity.HIGH,
    { component: 'config', ...context },
    false
  );
};

export const createApiError = (message: string, statusCode?: number, context?: ErrorContext): SelectorError => {
  let code = ErrorCode.API_SERVER_ERROR;
  let severity = ErrorSeverity.MEDIUM;
  let suggestions: string[] = [];

  if (statusCode === 401) {
    code = ErrorCode.API_UNAUTHORIZED;
    severity = ErrorSeverity.HIGH;
    suggestions = ['Check GITHUB_TOKEN is valid', 'Ensure token has required permissions'];
  } else if (statusCode === 403 || statusCode === 429) {
    code = ErrorCode.API_RATE_LIMIT;
    severity = ErrorSeverity.HIGH;
    suggestions = ['Wait for rate limit reset', 'Lower --limit to reduce API cost'];
  } else if (statusCode === 404) {
    code = ErrorCode.API_NOT_FOUND;
    severity = ErrorSeverity.LOW;
    suggestions = ['Check the repository exists', 'Verify the owner/repo spelling'];
  }

  return new SelectorError(
    message,
    code,
    severity,
    { component: 'api', statusCode, ...context },
    true,
    suggestions
  );
};

export const createSearchError = (message: string, context?: ErrorContext): SelectorError => {
  return new SelectorError(
    message,
    ErrorCode.SEARCH_FAILED,
    ErrorSeverity.HIGH,
    { component: 'search', ...context },
    true,
    [
      'Try checking your GitHub token or network connection',
      'Narrow the star range and retry'
    ]
  );
};

export const createStorageError = (message: string, databasePath?: string, context?: ErrorContext): SelectorError => {
  return new SelectorError(
    message,
    ErrorCode.STORAGE_FAILED,
    ErrorSeverity.MEDIUM,
    { component: 'storage', resource: databasePath, ...context }
  );
};

export const createExportError = (message: string, filePath?: string, context?: ErrorContext): SelectorError => {
  return new SelectorError(
    message,
    ErrorCode.EXPORT_FAILED,
    ErrorSeverity.MEDIUM,
    { component: 'export', resource: filePath, ...context },
    true,
    ['Check the output directory exists and is writable']
  );
};
