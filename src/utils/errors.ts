import axios from 'axios';

/**
 * How a failure should be handled by the copier
 */
export enum ErrorCategory {
  /** Network timeout, rate limit, temporary exchange unavailability - retried with backoff */
  TRANSIENT = 'transient',
  /** Invalid market, insufficient funds, exchange-side validation - recorded, never retried */
  REJECTED = 'rejected',
  /** Local ledger disagrees with the exchange */
  INCONSISTENCY = 'inconsistency',
  /** Invalid configuration or credentials at startup */
  FATAL = 'fatal',
}

/**
 * Base error carrying a category and the context needed to replay the failure by hand
 */
export class CopyTradingError extends Error {
  public readonly category: ErrorCategory;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    options: { context?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CopyTradingError';
    this.category = category;
    this.context = options.context ?? {};
  }

  get isRetryable(): boolean {
    return this.category === ErrorCategory.TRANSIENT;
  }
}

/**
 * Exchange refused the order outright
 */
export class OrderRejectedError extends CopyTradingError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, ErrorCategory.REJECTED, options);
    this.name = 'OrderRejectedError';
  }
}

/**
 * Ledger and exchange disagree about a position
 */
export class InconsistencyError extends CopyTradingError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, ErrorCategory.INCONSISTENCY, options);
    this.name = 'InconsistencyError';
  }
}

export class ConfigurationError extends CopyTradingError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, ErrorCategory.FATAL, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A processed marker already exists for the idempotence key being committed
 */
export class DuplicateEventError extends CopyTradingError {
  public readonly idempotenceKey: string;

  constructor(idempotenceKey: string) {
    super(`Event already processed: ${idempotenceKey}`, ErrorCategory.REJECTED, {
      context: { idempotenceKey },
    });
    this.name = 'DuplicateEventError';
    this.idempotenceKey = idempotenceKey;
  }
}

const TRANSIENT_MESSAGE_PATTERNS = [
  'network',
  'timeout',
  'timed out',
  'econnrefused',
  'econnreset',
  'etimedout',
  'enotfound',
  'socket hang up',
  'rate limit',
  'too many requests',
  'service unavailable',
  'bad gateway',
];

const REJECTED_MESSAGE_PATTERNS = [
  'insufficient',
  'not enough balance',
  'invalid',
  'market not found',
  'not found',
  'closed',
  'minimum',
];

function categoryForStatus(status: number): ErrorCategory {
  if (status === 429 || status === 408 || status >= 500) {
    return ErrorCategory.TRANSIENT;
  }
  if (status === 401 || status === 403) {
    return ErrorCategory.FATAL;
  }
  return ErrorCategory.REJECTED;
}

/**
 * Map any thrown value onto the copier's error taxonomy
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof CopyTradingError) {
    return error.category;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      return categoryForStatus(error.response.status);
    }
    // No response at all: connection reset, DNS failure, client timeout
    return ErrorCategory.TRANSIENT;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (TRANSIENT_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern))) {
      return ErrorCategory.TRANSIENT;
    }
    if (/\b(429|500|502|503|504)\b/.test(message)) {
      return ErrorCategory.TRANSIENT;
    }
    if (REJECTED_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern))) {
      return ErrorCategory.REJECTED;
    }
  }

  // Unknown failures are retried within the attempt bound
  return ErrorCategory.TRANSIENT;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
