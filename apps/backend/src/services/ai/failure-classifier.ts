import { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import type { RemoteFailure, RemoteFailureKind } from '../resume/errors';

/**
 * Error-code rules win over status rules; OpenAI reports a permanently exhausted
 * quota as a 429 with `insufficient_quota`.
 */
export type FailureRules = Readonly<{
  byCode: Readonly<Record<string, RemoteFailureKind>>;
  byStatus: Readonly<Record<number, RemoteFailureKind>>;
}>;

export const DEFAULT_FAILURE_RULES: FailureRules = {
  byCode: {
    insufficient_quota: 'QuotaExceeded',
    billing_hard_limit_reached: 'QuotaExceeded',
    invalid_api_key: 'AuthenticationFailed',
    rate_limit_exceeded: 'RateLimited',
    model_not_found: 'MalformedRequest',
    context_length_exceeded: 'MalformedRequest',
  },
  byStatus: {
    400: 'MalformedRequest',
    401: 'AuthenticationFailed',
    403: 'AuthenticationFailed',
    404: 'MalformedRequest',
    408: 'Timeout',
    413: 'MalformedRequest',
    422: 'MalformedRequest',
    429: 'RateLimited',
    500: 'ServiceUnavailable',
    502: 'ServiceUnavailable',
    503: 'ServiceUnavailable',
    504: 'ServiceUnavailable',
  },
};

const CONNECTION_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
]);

export function mergeFailureRules(overrides: Partial<FailureRules> = {}): FailureRules {
  return {
    byCode: { ...DEFAULT_FAILURE_RULES.byCode, ...overrides.byCode },
    byStatus: { ...DEFAULT_FAILURE_RULES.byStatus, ...overrides.byStatus },
  };
}

function readSystemCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function classifyOpenAiError(error: unknown, rules: FailureRules = DEFAULT_FAILURE_RULES): RemoteFailure {
  if (error instanceof APIUserAbortError) {
    return { kind: 'Timeout', message: 'Request aborted before a response arrived', cause: error };
  }
  if (error instanceof APIConnectionTimeoutError) {
    return { kind: 'Timeout', message: error.message, cause: error };
  }
  if (error instanceof APIConnectionError) {
    return { kind: 'ConnectionError', message: error.message, cause: error };
  }
  if (error instanceof APIError) {
    const code = typeof error.code === 'string' ? error.code.toLowerCase() : undefined;
    const status = typeof error.status === 'number' ? error.status : undefined;
    const kind =
      (code !== undefined ? rules.byCode[code] : undefined) ??
      (status !== undefined ? rules.byStatus[status] : undefined) ??
      'RemoteError';
    return { kind, message: error.message, status, code, cause: error };
  }

  const systemCode = readSystemCode(error);
  if (systemCode && CONNECTION_ERROR_CODES.has(systemCode)) {
    return {
      kind: 'ConnectionError',
      message: error instanceof Error ? error.message : systemCode,
      code: systemCode,
      cause: error,
    };
  }

  return {
    kind: 'RemoteError',
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
}
