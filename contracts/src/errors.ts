// errors.ts - Error Types

export type ErrorCategory =
  | 'validation'
  | 'not_found'
  | 'configuration'
  | 'provider'
  | 'internal';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all offerdesk errors */
export class OfferDeskError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'OfferDeskError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
  }
}

/** Validation error (bad input, disallowed instance type) */
export class ValidationError extends OfferDeskError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_INPUT', message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** Resource not found error */
export class NotFoundError extends OfferDeskError {
  constructor(
    resourceType: string,
    resourceId: number | string,
    options?: { cause?: unknown },
  ) {
    super(
      `${resourceType.toUpperCase().replace(/\s+/g, '_')}_NOT_FOUND`,
      `${resourceType} ${resourceId} not found`,
      'not_found',
      options,
    );
    this.name = 'NotFoundError';
  }
}

/** Misconfigured preference or environment value */
export class ConfigurationError extends OfferDeskError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_CONFIGURATION', message, 'configuration', options);
    this.name = 'ConfigurationError';
  }
}

/** Provider-specific error (cloud API failures) */
export class ProviderError extends OfferDeskError {
  readonly provider: string;
  readonly retryable: boolean;

  constructor(
    provider: string,
    message: string,
    options?: {
      code?: string;
      retryable?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'PROVIDER_INTERNAL', message, 'provider', options);
    this.name = 'ProviderError';
    this.provider = provider;
    this.retryable = options?.retryable ?? false;
  }
}

/** Render any thrown value as a one-line message for logs. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
