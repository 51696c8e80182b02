import {
  APICallError,
  JSONParseError,
  LoadAPIKeyError,
  NoObjectGeneratedError,
  RetryError,
  TypeValidationError,
} from 'ai';

export type LlmErrorKind =
  | 'AUTHENTICATION'
  | 'RATE_LIMIT'
  | 'SERVICE_UNAVAILABLE'
  | 'CONNECTION'
  | 'INVALID_REQUEST'
  | 'RESPONSE_PARSING'
  | 'MODEL'
  | 'UNEXPECTED';

const RETRYABLE_KINDS: ReadonlySet<LlmErrorKind> = new Set<LlmErrorKind>([
  'AUTHENTICATION',
  'RATE_LIMIT',
  'SERVICE_UNAVAILABLE',
  'CONNECTION',
]);

const NETWORK_FAILURE = /fetch failed|ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|socket hang up/i;

export class LlmClientError extends Error {
  readonly retryable: boolean;

  constructor(
    readonly kind: LlmErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LlmClientError';
    this.retryable = RETRYABLE_KINDS.has(kind);
  }
}

export type LlmResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LlmClientError };

/**
 * AI SDK 및 네트워크 오류를 도메인 오류 종류로 매핑합니다
 */
export function toLlmClientError(error: unknown): LlmClientError {
  if (error instanceof LlmClientError) {
    return error;
  }

  // SDK 재시도가 모두 실패한 경우 마지막 오류 기준으로 분류
  if (RetryError.isInstance(error)) {
    return toLlmClientError(error.lastError);
  }

  if (APICallError.isInstance(error)) {
    return fromApiCallError(error);
  }

  if (LoadAPIKeyError.isInstance(error)) {
    return new LlmClientError('AUTHENTICATION', error.message, {
      cause: error,
    });
  }

  if (
    NoObjectGeneratedError.isInstance(error) ||
    JSONParseError.isInstance(error) ||
    TypeValidationError.isInstance(error)
  ) {
    return new LlmClientError(
      'RESPONSE_PARSING',
      `Failed to parse model response: ${error.message}`,
      { cause: error },
    );
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new LlmClientError('CONNECTION', 'Request aborted', {
        cause: error,
      });
    }
    if (NETWORK_FAILURE.test(error.message)) {
      return new LlmClientError(
        'CONNECTION',
        `Connection error: ${error.message}`,
        { cause: error },
      );
    }
    return new LlmClientError('UNEXPECTED', error.message, { cause: error });
  }

  return new LlmClientError('UNEXPECTED', String(error), { cause: error });
}

function fromApiCallError(error: APICallError): LlmClientError {
  const status = error.statusCode;
  const options = { cause: error };

  if (status === undefined) {
    return new LlmClientError(
      'CONNECTION',
      `Connection error: ${error.message}`,
      options,
    );
  }

  const message = `OpenRouter API error (${status}): ${error.message}`;

  if (status === 401 || status === 403) {
    return new LlmClientError('AUTHENTICATION', message, options);
  }
  if (status === 429) {
    return new LlmClientError('RATE_LIMIT', message, options);
  }
  if (status === 408) {
    return new LlmClientError('CONNECTION', message, options);
  }
  if (status >= 500) {
    return new LlmClientError('SERVICE_UNAVAILABLE', message, options);
  }
  if ([400, 404, 413, 422].includes(status)) {
    return new LlmClientError('INVALID_REQUEST', message, options);
  }
  return new LlmClientError('UNEXPECTED', message, options);
}
