import OpenAI from 'openai';
import type { RequestOptions } from 'openai/core';
import type {
  Response as OpenAIResponse,
  ResponseCreateParamsNonStreaming,
  ResponseInputContent,
} from 'openai/resources/responses/responses';
import type { OpenAiSettings } from '../../lib/generator-config';
import { createLogger, maskSecret, type Logger } from '../../lib/logger';
import type { DispatchOutcome, GenerationTransport } from '../resume/resilient-client';
import type { ContentBlock, GenerationRequest } from '../resume/types';
import { classifyOpenAiError, mergeFailureRules, type FailureRules } from './failure-classifier';

export type ResponseSummary = Pick<OpenAIResponse, 'id' | 'status' | 'output_text' | 'incomplete_details' | 'error'>;

/** The slice of `OpenAI#responses` the transport calls. */
export interface ResponsesEndpoint {
  create(body: ResponseCreateParamsNonStreaming, options?: RequestOptions): PromiseLike<ResponseSummary>;
}

export type OpenAiTransportOptions = {
  apiTimeoutMs: number;
  rules?: Partial<FailureRules>;
  logger?: Logger;
};

function toInputContent(block: ContentBlock): ResponseInputContent {
  switch (block.type) {
    case 'text':
      return { type: 'input_text', text: block.text };
    case 'inline_image':
      return { type: 'input_image', image_url: block.dataUri, detail: 'auto' };
    case 'inline_file':
      return { type: 'input_file', filename: block.filename, file_data: block.dataUri };
  }
}

export function toResponsesParams(request: GenerationRequest): ResponseCreateParamsNonStreaming {
  return {
    model: request.model,
    instructions: request.systemInstructions,
    input: [{ role: 'user', content: request.contentBlocks.map(toInputContent) }],
    max_output_tokens: request.maxTokens,
    temperature: request.temperature,
  };
}

/**
 * Sends one attempt to the Responses API and folds every SDK error into the
 * closed failure variant. SDK-side retries are disabled; the resilient client
 * owns that loop.
 */
export class OpenAiResponsesTransport implements GenerationTransport {
  private readonly rules: FailureRules;
  private readonly logger: Logger;

  constructor(
    private readonly responses: ResponsesEndpoint,
    private readonly options: OpenAiTransportOptions,
  ) {
    this.rules = mergeFailureRules(options.rules);
    this.logger = options.logger ?? createLogger('OpenAI');
  }

  async dispatch(request: GenerationRequest, signal: AbortSignal): Promise<DispatchOutcome> {
    const startedAt = Date.now();
    let response: ResponseSummary;
    try {
      response = await this.responses.create(toResponsesParams(request), {
        signal,
        timeout: this.options.apiTimeoutMs,
        maxRetries: 0,
      });
    } catch (error) {
      const failure = classifyOpenAiError(error, this.rules);
      this.logger.debug(`Request failed as ${failure.kind}`, { status: failure.status, code: failure.code });
      return { kind: 'failure', failure };
    }

    if (response.status === 'failed') {
      return {
        kind: 'failure',
        failure: {
          kind: 'RemoteError',
          message: response.error?.message ?? `Response ${response.id} failed`,
          code: response.error?.code,
        },
      };
    }
    if (response.status === 'incomplete') {
      this.logger.warn(`Response ${response.id} is incomplete`, {
        reason: response.incomplete_details?.reason ?? 'unknown',
        maxOutputTokens: request.maxTokens,
      });
    }

    this.logger.info(`Response ${response.id} received`, {
      chars: response.output_text.length,
      elapsedMs: Date.now() - startedAt,
    });
    return { kind: 'success', text: response.output_text };
  }
}

let sharedClient: OpenAI | undefined;

/** One SDK client per process: it holds the connection pool and the credentials. */
export function getOpenAiClient(settings: OpenAiSettings, apiTimeoutMs: number, logger: Logger = createLogger('OpenAI')): OpenAI {
  if (!sharedClient) {
    if (!settings.apiKey) {
      throw new Error('[OpenAI] OPENAI_API_KEY is missing');
    }
    logger.debug(`Creating client with key ${maskSecret(settings.apiKey)}`);
    sharedClient = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL,
      organization: settings.organization ?? null,
      project: settings.project ?? null,
      timeout: apiTimeoutMs,
      maxRetries: 0,
    });
  }
  return sharedClient;
}

export function createOpenAiTransport(
  settings: OpenAiSettings,
  options: OpenAiTransportOptions,
): OpenAiResponsesTransport {
  return new OpenAiResponsesTransport(getOpenAiClient(settings, options.apiTimeoutMs, options.logger).responses, options);
}
