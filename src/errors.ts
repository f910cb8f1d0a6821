/**
 * Error types for flake-scan
 * Fatal errors abort the run, the rest are classified by the scan engine
 */

/**
 * Base error class for scan operations
 */
export class FlakeScanError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FlakeScanError';
  }
}

/**
 * Error for invalid or missing configuration (including the API token)
 */
export class ConfigurationError extends FlakeScanError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error for a rejected credential (HTTP 401)
 */
export class AuthenticationError extends FlakeScanError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error for a non-2xx response that was not retried, or ran out of retries
 */
export class HttpStatusError extends FlakeScanError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    cause?: Error
  ) {
    super(message, 'HTTP_STATUS_ERROR', cause);
    this.name = 'HttpStatusError';
  }
}

/**
 * Error for timeouts and network failures (no HTTP status available)
 */
export class TransportError extends FlakeScanError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly retryable: boolean = true,
    cause?: Error
  ) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

/**
 * Raised at a suspension point once the scan has been aborted
 */
export class ScanInterruptedError extends FlakeScanError {
  constructor(message: string = 'Scan interrupted') {
    super(message, 'INTERRUPTED');
    this.name = 'ScanInterruptedError';
  }
}

/**
 * Throw at a suspension point when the scan has been aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ScanInterruptedError();
  }
}

/**
 * Errors that must abort the whole run wherever they occur
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof ConfigurationError ||
    error instanceof ScanInterruptedError
  );
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
