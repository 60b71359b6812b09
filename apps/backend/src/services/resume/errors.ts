export type InputErrorKind =
  | 'BriefEmpty'
  | 'BriefTooLong'
  | 'InvalidColor'
  | 'UnsupportedModel'
  | 'UnsupportedFormat'
  | 'PayloadTooLarge'
  | 'InvalidUpload';

/** Closed classification of a failed dispatch against the remote endpoint. */
export type RemoteFailureKind =
  | 'RateLimited'
  | 'ConnectionError'
  | 'Timeout'
  | 'ServiceUnavailable'
  | 'AuthenticationFailed'
  | 'QuotaExceeded'
  | 'MalformedRequest'
  | 'RemoteError';

export type GenerationErrorKind =
  | InputErrorKind
  | RemoteFailureKind
  | 'RetriesExhausted'
  | 'InvalidHTMLResponse'
  | 'Cancelled';

export const REMOTE_FAILURE_KINDS: readonly RemoteFailureKind[] = [
  'RateLimited',
  'ConnectionError',
  'Timeout',
  'ServiceUnavailable',
  'AuthenticationFailed',
  'QuotaExceeded',
  'MalformedRequest',
  'RemoteError',
];

export const DEFAULT_RETRYABLE_FAILURES: readonly RemoteFailureKind[] = [
  'RateLimited',
  'ConnectionError',
  'Timeout',
  'ServiceUnavailable',
];

export function isRemoteFailureKind(value: unknown): value is RemoteFailureKind {
  return REMOTE_FAILURE_KINDS.some((kind) => kind === value);
}

export type RemoteFailure = {
  kind: RemoteFailureKind;
  message: string;
  status?: number;
  code?: string;
  cause?: unknown;
};

type ErrorOptions = {
  cause?: unknown;
  lastFailure?: RemoteFailure;
  attempts?: number;
};

export class ResumeGenerationError extends Error {
  readonly kind: GenerationErrorKind;
  readonly lastFailure?: RemoteFailure;
  readonly attempts?: number;

  constructor(kind: GenerationErrorKind, message: string, options: ErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResumeGenerationError';
    this.kind = kind;
    this.lastFailure = options.lastFailure;
    this.attempts = options.attempts;
  }

  static fromFailure(failure: RemoteFailure, attempts: number): ResumeGenerationError {
    return new ResumeGenerationError(failure.kind, failure.message, {
      cause: failure.cause,
      lastFailure: failure,
      attempts,
    });
  }
}

export function isResumeGenerationError(error: unknown): error is ResumeGenerationError {
  return error instanceof ResumeGenerationError;
}

const REMEDIATION_HINTS: Record<GenerationErrorKind, string> = {
  BriefEmpty: 'Write a brief with your profile before generating.',
  BriefTooLong: 'Shorten the brief and try again.',
  InvalidColor: 'Pick an accent color in #RRGGBB format.',
  UnsupportedModel: 'Choose one of the listed models.',
  UnsupportedFormat: 'Upload PNG, JPEG, WebP images or PDF documents only.',
  PayloadTooLarge: 'The file is too large; upload a smaller one.',
  InvalidUpload: 'Send at most one avatar, one QR code and ten context files, using only those field names.',
  RateLimited: 'Rate limited, please retry shortly.',
  ConnectionError: 'Could not reach the generation service; check the connection and retry.',
  Timeout: 'The generation service took too long to answer; retry or lower the token limit.',
  ServiceUnavailable: 'The generation service is temporarily unavailable; retry shortly.',
  AuthenticationFailed: 'The API key was rejected; check OPENAI_API_KEY.',
  QuotaExceeded: 'The account has no remaining quota; review the billing settings.',
  MalformedRequest: 'The generation service rejected the request; review the inputs.',
  RemoteError: 'The generation service returned an unexpected error.',
  RetriesExhausted: 'The generation service kept failing; please retry in a few minutes.',
  InvalidHTMLResponse: 'The model did not return a complete HTML document; try generating again.',
  Cancelled: 'Generation was cancelled.',
};

export function describeErrorKind(kind: GenerationErrorKind): string {
  return REMEDIATION_HINTS[kind];
}
