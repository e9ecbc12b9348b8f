/**
 * Content Generator
 *
 * Asks the generation service for the resume payload, strips a code fence if
 * the model added one, parses and validates the JSON. A parse or validation
 * failure is retried once with a stricter instruction; service failures are
 * not retried here.
 */

import type { AppConfig } from '../lib/config.js';
import { ResumeError, isResumeError } from '../lib/errors.js';
import { parseJson, stripCodeFence } from '../lib/json-response.js';
import type { ChatResponse, LLMProvider } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { toServiceError } from '../lib/service-errors.js';
import { buildResumePrompt, type ResumeRequest } from './prompt.js';
import { validateContentPayload, type ContentPayload } from './schemas.js';

export const MAX_GENERATION_ATTEMPTS = 2;
export const RAW_SNIPPET_LENGTH = 200;

export type GenerationSettings = Pick<AppConfig, 'model' | 'candidateName' | 'maxTokens' | 'temperature'>;

export interface GenerateOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

export class ContentGenerator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly settings: GenerationSettings,
    private readonly logger: Logger,
  ) {}

  async generate(request: ResumeRequest, options: GenerateOptions = {}): Promise<ContentPayload> {
    const log = options.logger ?? this.logger;
    const normalized = normalizeResumeRequest(request);

    for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
      const prompt = buildResumePrompt(
        { ...normalized, candidateName: this.settings.candidateName },
        { strict: attempt > 1 },
      );
      const response = await this.callService(prompt, attempt, log, options.signal);
      const raw = stripCodeFence(response.text);

      try {
        return decodeContentPayload(raw);
      } catch (err) {
        if (!isResumeError(err)) throw err;

        if (attempt >= MAX_GENERATION_ATTEMPTS) {
          const rawSnippet = raw.slice(0, RAW_SNIPPET_LENGTH);
          log.error({ attempt, code: err.code, field: err.field, rawSnippet }, 'Resume content generation failed');
          throw new ResumeError(`Parse failed: ${err.message}\nRaw: ${rawSnippet}`, 'generation_failed', {
            cause: err,
            field: err.field,
            rawSnippet,
          });
        }

        log.warn(
          { attempt, code: err.code, field: err.field, reason: err.message },
          'Resume payload rejected, retrying with raw JSON instruction',
        );
      }
    }

    throw new ResumeError('No generation attempt was made', 'generation_failed');
  }

  private async callService(
    prompt: string,
    attempt: number,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<ChatResponse> {
    const startedAt = Date.now();
    try {
      const response = await this.provider.chat({
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        messages: [{ role: 'user', content: prompt }],
        signal,
      });
      log.info({
        attempt,
        provider: this.provider.name,
        model: this.settings.model,
        latencyMs: Date.now() - startedAt,
        usage: response.usage,
      }, 'Resume content call completed');
      return response;
    } catch (err) {
      const wrapped = toServiceError(err);
      log.error({ attempt, code: wrapped.code, latencyMs: Date.now() - startedAt, err: wrapped }, 'Resume content call failed');
      throw wrapped;
    }
  }
}

/**
 * Parse fence-stripped text and validate it. Throws a `parse` or
 * `validation` ResumeError.
 */
export function decodeContentPayload(raw: string): ContentPayload {
  const parsed = parseJson(raw);
  if (!parsed.ok) {
    throw new ResumeError(parsed.reason, 'parse');
  }
  return validateContentPayload(parsed.data);
}

/**
 * Trim each request field and reject blanks before anything is sent.
 */
export function normalizeResumeRequest(request: ResumeRequest): ResumeRequest {
  const normalized: ResumeRequest = {
    jobTitle: request.jobTitle.trim(),
    industry: request.industry.trim(),
    seniority: request.seniority.trim(),
  };
  for (const [field, value] of Object.entries(normalized)) {
    if (!value) {
      throw new ResumeError(`${field} must not be empty`, 'invalid_request', { field });
    }
  }
  return normalized;
}
