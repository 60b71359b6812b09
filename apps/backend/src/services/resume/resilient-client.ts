import { createLogger, type Logger } from '../../lib/logger';
import {
  ResumeGenerationError,
  isRemoteFailureKind,
  type RemoteFailure,
  type RemoteFailureKind,
} from './errors';
import type { GenerationRequest } from './types';

export type RetryPolicy = Readonly<{
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: 2;
  maxDelayMs: number;
  retryable: ReadonlySet<RemoteFailureKind>;
}>;

export type DispatchOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'failure'; failure: RemoteFailure };

/** One physical call to the generation endpoint. Must be safe to share across requests. */
export interface GenerationTransport {
  dispatch(request: GenerationRequest, signal: AbortSignal): Promise<DispatchOutcome>;
}

export type ClientState = 'Idle' | 'Attempting' | 'Retrying' | 'Succeeded' | 'Failed';

export type RetryEvent = {
  attempt: number;
  delayMs: number;
  failure: RemoteFailure;
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type ResilientClientOptions = {
  transport: GenerationTransport;
  policy: RetryPolicy;
  apiTimeoutMs: number;
  logger?: Logger;
  sleep?: SleepFn;
  onRetry?: (event: RetryEvent) => void;
  onStateChange?: (state: ClientState) => void;
};

export type ExecutionResult = {
  text: string;
  attempts: number;
};

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function nextDelay(current: number, policy: RetryPolicy): number {
  return Math.min(current * policy.backoffMultiplier, policy.maxDelayMs);
}

function unexpectedFailure(error: unknown): RemoteFailure {
  if (error instanceof ResumeGenerationError && isRemoteFailureKind(error.kind)) {
    return { kind: error.kind, message: error.message, cause: error };
  }
  return {
    kind: 'RemoteError',
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
}

/**
 * Runs a request once logically and up to `policy.maxAttempts` times physically.
 *
 *   Idle -> Attempting -> Succeeded
 *                      -> Retrying -> Attempting
 *                      -> Failed
 */
export class ResilientClient {
  private readonly transport: GenerationTransport;
  private readonly policy: RetryPolicy;
  private readonly apiTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly onRetry?: (event: RetryEvent) => void;
  private readonly onStateChange?: (state: ClientState) => void;

  constructor(options: ResilientClientOptions) {
    if (!Number.isInteger(options.policy.maxAttempts) || options.policy.maxAttempts < 1) {
      throw new Error(`[ResilientClient] maxAttempts must be a positive integer, got ${options.policy.maxAttempts}`);
    }
    this.transport = options.transport;
    this.policy = options.policy;
    this.apiTimeoutMs = options.apiTimeoutMs;
    this.logger = options.logger ?? createLogger('ResilientClient');
    this.sleep = options.sleep ?? sleep;
    this.onRetry = options.onRetry;
    this.onStateChange = options.onStateChange;
  }

  async execute(request: GenerationRequest, options: { signal?: AbortSignal } = {}): Promise<ExecutionResult> {
    const { signal } = options;
    const maxAttempts = this.policy.maxAttempts;
    let delayMs = this.policy.initialDelayMs;

    this.transition('Idle');

    for (let attempt = 1; ; attempt += 1) {
      this.throwIfCancelled(signal, attempt - 1);
      this.transition('Attempting');

      const outcome = await this.dispatchOnce(request, attempt, signal);

      if (outcome.kind === 'success') {
        this.transition('Succeeded');
        this.logger.debug(`Attempt ${attempt}/${maxAttempts} succeeded`, { model: request.model });
        return { text: outcome.text, attempts: attempt };
      }

      const { failure } = outcome;
      this.throwIfCancelled(signal, attempt);

      if (!this.policy.retryable.has(failure.kind)) {
        this.transition('Failed');
        this.logger.error(`${failure.kind} on attempt ${attempt}/${maxAttempts}; not retrying`, {
          status: failure.status,
          code: failure.code,
          message: failure.message,
        });
        throw ResumeGenerationError.fromFailure(failure, attempt);
      }

      if (attempt >= maxAttempts) {
        this.transition('Failed');
        this.logger.error(`${failure.kind}: giving up after ${attempt} attempt(s)`);
        throw new ResumeGenerationError(
          'RetriesExhausted',
          `Generation failed after ${attempt} attempt(s); last error: ${failure.kind} (${failure.message})`,
          { cause: failure.cause, lastFailure: failure, attempts: attempt },
        );
      }

      this.transition('Retrying');
      this.logger.warn(`${failure.kind} on attempt ${attempt}/${maxAttempts}; retrying in ${delayMs}ms`, {
        attempt,
        delayMs,
        cause: failure.kind,
        status: failure.status,
      });
      this.onRetry?.({ attempt, delayMs, failure });

      try {
        await this.sleep(delayMs, signal);
      } catch (error) {
        this.throwIfCancelled(signal, attempt);
        throw error;
      }
      delayMs = nextDelay(delayMs, this.policy);
    }
  }

  private transition(state: ClientState): void {
    this.onStateChange?.(state);
  }

  private throwIfCancelled(signal: AbortSignal | undefined, attempts: number): void {
    if (!signal?.aborted) return;
    this.transition('Failed');
    this.logger.info(`Cancelled after ${attempts} attempt(s)`);
    throw new ResumeGenerationError('Cancelled', 'Generation was cancelled', { cause: signal.reason, attempts });
  }

  /**
   * Races the transport against the per-attempt deadline and the caller's signal.
   * Never rejects: transport exceptions become `RemoteError` failures.
   */
  private async dispatchOnce(
    request: GenerationRequest,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<DispatchOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onCallerAbort: (() => void) | undefined;

    const deadline = new Promise<DispatchOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new Error(`Attempt ${attempt} exceeded ${this.apiTimeoutMs}ms`));
        resolve({
          kind: 'failure',
          failure: { kind: 'Timeout', message: `No response within ${this.apiTimeoutMs}ms` },
        });
      }, this.apiTimeoutMs);
    });

    const cancelled = new Promise<DispatchOutcome>((resolve) => {
      onCallerAbort = () => {
        controller.abort(signal?.reason);
        resolve({ kind: 'failure', failure: { kind: 'RemoteError', message: 'Aborted by caller', cause: signal?.reason } });
      };
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    });

    const dispatched = Promise.resolve()
      .then(() => this.transport.dispatch(request, controller.signal))
      .catch((error: unknown): DispatchOutcome => ({ kind: 'failure', failure: unexpectedFailure(error) }));

    try {
      return await Promise.race([dispatched, deadline, cancelled]);
    } finally {
      clearTimeout(timer);
      if (onCallerAbort) signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
