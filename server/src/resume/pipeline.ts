import { randomUUID } from 'node:crypto';
import type { AppConfig } from '../lib/config.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import baseLogger, { type Logger } from '../lib/logger.js';
import { ContentGenerator } from './content-generator.js';
import { renderResumeDocx } from './document-renderer.js';
import { buildResumeFilename, writeResumeFile } from './output.js';
import type { ResumeRequest } from './prompt.js';
import type { ContentPayload } from './schemas.js';

export interface ResumeResult {
  runId: string;
  payload: ContentPayload;
  document: Buffer;
  filename: string;
}

export type ResumeStage = 'generating' | 'rendering';

export interface GenerateResumeOptions {
  now?: Date;
  signal?: AbortSignal;
  logger?: Logger;
  onStage?: (stage: ResumeStage) => void;
}

/**
 * Single-shot resume run: generate validated content, then render it.
 * Any failure aborts the run; no partial document is produced.
 */
export class ResumePipeline {
  private readonly generator: ContentGenerator;

  constructor(
    private readonly config: AppConfig,
    provider: LLMProvider,
    private readonly logger: Logger = baseLogger,
  ) {
    this.generator = new ContentGenerator(provider, config, logger);
  }

  async generateResume(request: ResumeRequest, options: GenerateResumeOptions = {}): Promise<ResumeResult> {
    const runId = randomUUID();
    const log = (options.logger ?? this.logger).child({ runId });
    const startedAt = Date.now();

    log.info({ jobTitle: request.jobTitle, industry: request.industry, seniority: request.seniority }, 'Resume run started');
    options.onStage?.('generating');
    const payload = await this.generator.generate(request, { logger: log, signal: options.signal });
    options.onStage?.('rendering');
    const document = await renderResumeDocx(payload);
    const filename = buildResumeFilename(options.now);
    log.info({ filename, bytes: document.length, durationMs: Date.now() - startedAt }, 'Resume rendered');

    return { runId, payload, document, filename };
  }

  /**
   * Generate, then write the document under the configured output directory.
   * Returns the written path alongside the run result.
   */
  async generateAndSave(
    request: ResumeRequest,
    options: GenerateResumeOptions = {},
  ): Promise<ResumeResult & { path: string }> {
    const result = await this.generateResume(request, options);
    const written = await writeResumeFile(this.config.outputDir, result.filename, result.document);
    return { ...result, path: written };
  }

  /** Fill blank industry/seniority from configured defaults. */
  withDefaults(request: Partial<ResumeRequest> & Pick<ResumeRequest, 'jobTitle'>): ResumeRequest {
    return {
      jobTitle: request.jobTitle,
      industry: request.industry?.trim() || this.config.defaultIndustry,
      seniority: request.seniority?.trim() || this.config.defaultSeniority,
    };
  }
}
