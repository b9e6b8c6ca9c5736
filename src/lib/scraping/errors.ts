/**
 * Crawl Error Handling
 * Fetch failure classification and the error classes raised by the crawl core
 */

export enum ScrapingErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  BLOCKED = 'BLOCKED',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingError {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
}

/**
 * Thrown when the crawl entry point has no usable scheme or host
 */
export class InvalidEntryPointError extends Error {
  constructor(public readonly url: string, reason: string) {
    super(`Invalid URL "${url}": ${reason}. Please use format: https://example.com`);
    this.name = 'InvalidEntryPointError';
  }
}

/**
 * Thrown when a crawl session lifecycle step is called out of order
 */
export class CrawlStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrawlStateError';
  }
}

/**
 * Thrown when classification results are requested or mutated outside their phase
 */
export class ClassificationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationStateError';
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Classify a failed response by status code
 */
export function classifyStatus(statusCode: number): ScrapingError {
  if (statusCode === 429) {
    return { type: ScrapingErrorType.RATE_LIMITED, message: 'Rate limited by server', statusCode };
  }

  if (statusCode === 401 || statusCode === 403) {
    return { type: ScrapingErrorType.AUTH_REQUIRED, message: 'Access denied by server', statusCode };
  }

  if (statusCode === 404 || statusCode === 410) {
    return { type: ScrapingErrorType.NOT_FOUND, message: 'Page not found', statusCode };
  }

  if (statusCode >= 500) {
    return { type: ScrapingErrorType.SERVER_ERROR, message: 'Server error', statusCode };
  }

  return {
    type: ScrapingErrorType.HTTP_ERROR,
    message: `Unexpected status code ${statusCode}`,
    statusCode,
  };
}

/**
 * Classify a thrown fetch error
 */
export function classifyError(error: unknown): ScrapingError {
  const message = describeError(error);

  // AbortController timeouts surface as AbortError
  if (
    (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT')
  ) {
    return {
      type: ScrapingErrorType.TIMEOUT,
      message: 'Request timed out',
    };
  }

  if (
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN') ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return {
      type: ScrapingErrorType.NETWORK_ERROR,
      message: `Network connection failed (${message})`,
    };
  }

  if (message.includes('blocked') || message.includes('denied')) {
    return {
      type: ScrapingErrorType.BLOCKED,
      message: 'Request blocked',
    };
  }

  return {
    type: ScrapingErrorType.UNKNOWN,
    message: message || 'Unknown error',
  };
}
