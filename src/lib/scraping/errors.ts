/**
 * Scraping Error Handling
 * Fetch failure classification and retry guidance
 */

export enum ScrapingErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingError {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

/**
 * Raised for a non-2xx response
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number,
    statusText: string
  ) {
    super(`HTTP ${statusCode} ${statusText} for ${url}`.trim());
    this.name = 'HttpStatusError';
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify an error and provide retry guidance
 */
export function classifyError(error: unknown, statusCode?: number): ScrapingError {
  const message = errorMessage(error);
  const code = statusCode ?? (error instanceof HttpStatusError ? error.statusCode : undefined);
  const name = error instanceof Error ? error.name : '';

  // AbortController timeouts surface as AbortError / TimeoutError
  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT')
  ) {
    return {
      type: ScrapingErrorType.TIMEOUT,
      message: 'Request timed out',
      statusCode: code,
      retryable: true,
    };
  }

  if (code !== undefined) {
    if (code === 429) {
      return {
        type: ScrapingErrorType.RATE_LIMITED,
        message: 'Rate limited by server',
        statusCode: code,
        retryable: true,
      };
    }

    if (code === 401 || code === 403) {
      return {
        type: ScrapingErrorType.AUTH_REQUIRED,
        message: 'Access denied',
        statusCode: code,
        retryable: false,
      };
    }

    if (code === 404) {
      return {
        type: ScrapingErrorType.NOT_FOUND,
        message: 'Page not found',
        statusCode: code,
        retryable: false,
      };
    }

    if (code >= 500) {
      return {
        type: ScrapingErrorType.SERVER_ERROR,
        message: 'Server error',
        statusCode: code,
        retryable: true,
      };
    }
  }

  if (
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN') ||
    message.includes('fetch failed')
  ) {
    return {
      type: ScrapingErrorType.NETWORK_ERROR,
      message: 'Network connection failed',
      statusCode: code,
      retryable: true,
    };
  }

  return {
    type: ScrapingErrorType.UNKNOWN,
    message: message || 'Unknown error',
    statusCode: code,
    retryable: true,
  };
}
