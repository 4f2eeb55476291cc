/**
 * Error types shared across the application
 */

export const GENERIC_FAILURE_MESSAGE =
  'Sorry, I could not get an answer right now. Please try again later.';

/**
 * Raised at startup when configuration or prompt templates are missing or invalid.
 * Always fatal: the process prints the message and exits.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  • ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export type UpstreamFailureReason =
  | 'network'
  | 'timeout'
  | 'aborted'
  | 'auth'
  | 'rate-limit'
  | 'quota'
  | 'http'
  | 'invalid-response'
  | 'blocked';

export interface UpstreamErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * Raised when the Gemini API call fails for any reason
 */
export class UpstreamError extends Error {
  readonly reason: UpstreamFailureReason;
  readonly status?: number;

  constructor(reason: UpstreamFailureReason, message: string, options: UpstreamErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'UpstreamError';
    this.reason = reason;
    this.status = options.status;
  }

  /**
   * Transient failures worth another attempt when retries are enabled
   */
  get retryable(): boolean {
    switch (this.reason) {
      case 'network':
      case 'timeout':
      case 'rate-limit':
        return true;
      case 'http':
        return this.status !== undefined && this.status >= 500;
      default:
        return false;
    }
  }
}

/**
 * Message safe to show an end user. Details stay in the logs.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof ConfigError) {
    return error.message;
  }
  return GENERIC_FAILURE_MESSAGE;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
