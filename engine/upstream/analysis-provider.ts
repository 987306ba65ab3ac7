// engine/upstream/analysis-provider.ts — Language-model analysis client (OpenAI-compatible chat completions)

import OpenAI from 'openai';
import type { ContextBundle } from '../types.js';
import {
  CommitLensError,
  ContentRejectedError,
  ProviderRateLimitedError,
  ProviderUnavailableError,
  UpstreamTimeoutError,
  errorMessage,
  isCommitLensError,
} from '../errors.js';
import { renderBundle } from '../context/bundle.js';
import { retryWithBackoff, withTimeout } from '../util/async.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { TASK_INSTRUCTIONS } from './prompts.js';

// ─── Contract ────────────────────────────────────────────────────────────────

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

/**
 * Turns a context bundle into Markdown text.
 *
 * Failures reject with ProviderUnavailableError, ProviderRateLimitedError,
 * ContentRejectedError or UpstreamTimeoutError.
 */
export interface AnalysisProvider {
  analyze(bundle: ContextBundle, options?: AnalyzeOptions): Promise<string>;
}

// ─── Error Mapping ───────────────────────────────────────────────────────────

const CONTENT_POLICY = /content[_ ]?(filter|policy|management)/i;

export function mapProviderError(error: unknown, operation: string, timeoutMs: number): CommitLensError {
  if (isCommitLensError(error)) return error;

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new UpstreamTimeoutError(operation, timeoutMs);
  }
  if (error instanceof OpenAI.APIError) {
    const detail = `${operation} failed${error.status ? ` with HTTP ${error.status}` : ''}: ${error.message}`;
    if (error.status === 429) return new ProviderRateLimitedError(detail, error);
    if (error.status === 400 && (error.code === 'content_filter' || CONTENT_POLICY.test(error.message))) {
      return new ContentRejectedError(detail, error);
    }
    return new ProviderUnavailableError(detail, error);
  }

  return new ProviderUnavailableError(`${operation} failed: ${errorMessage(error)}`, error);
}

// ─── OpenAI Implementation ───────────────────────────────────────────────────

export interface OpenAIAnalysisProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  /** Pre-built client; tests pass one with a fake `fetch`. */
  client?: OpenAI;
  logger?: Logger;
}

export class OpenAIAnalysisProvider implements AnalysisProvider {
  private client: OpenAI | null;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string | undefined;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: OpenAIAnalysisProviderOptions) {
    this.client = options.client ?? null;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async analyze(bundle: ContextBundle, options: AnalyzeOptions = {}): Promise<string> {
    const operation = `${this.model} ${bundle.task}`;
    this.logger.debug(`requesting ${operation} (~${bundle.tokenEstimate} tokens)`);

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await withTimeout(
        operation,
        this.timeoutMs,
        signal =>
          this.getClient().chat.completions.create(
            {
              model: this.model,
              messages: [
                { role: 'system', content: TASK_INSTRUCTIONS[bundle.task] },
                { role: 'user', content: renderBundle(bundle) },
              ],
              ...(bundle.task === 'trend-classification' ? { response_format: { type: 'json_object' as const } } : {}),
            },
            { signal, maxRetries: 0 },
          ),
        options.signal,
      );
    } catch (error) {
      throw mapProviderError(error, operation, this.timeoutMs);
    }

    const choice = completion.choices[0];
    if (choice?.finish_reason === 'content_filter') {
      throw new ContentRejectedError(`${operation} was stopped by the provider's content filter`);
    }

    const content = choice?.message.content?.trim();
    if (!content) {
      throw new ProviderUnavailableError(`${operation} returned an empty response`);
    }
    return content;
  }

  // Created on first use so commands that never call the provider need no key
  private getClient(): OpenAI {
    if (!this.client) {
      // Retries are layered on by RetryingAnalysisProvider
      this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseUrl, maxRetries: 0 });
    }
    return this.client;
  }
}

// ─── Retry Decorator ─────────────────────────────────────────────────────────

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

/**
 * Retries retryable provider failures with exponential backoff.
 * ContentRejected and cancellations surface immediately.
 */
export class RetryingAnalysisProvider implements AnalysisProvider {
  private readonly inner: AnalysisProvider;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;

  constructor(inner: AnalysisProvider, policy: RetryPolicy, logger: Logger = silentLogger) {
    this.inner = inner;
    this.policy = policy;
    this.logger = logger;
  }

  analyze(bundle: ContextBundle, options: AnalyzeOptions = {}): Promise<string> {
    return retryWithBackoff(() => this.inner.analyze(bundle, options), {
      retries: this.policy.maxRetries,
      baseDelayMs: this.policy.baseDelayMs,
      signal: options.signal,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warning(
          `retrying ${bundle.task} (${attempt}/${this.policy.maxRetries}) in ${delayMs}ms: ${errorMessage(error)}`,
        );
      },
    });
  }
}
