export type ResumeErrorCode =
  | 'configuration'
  | 'invalid_request'
  | 'connectivity'
  | 'service'
  | 'parse'
  | 'validation'
  | 'generation_failed';

export interface ResumeErrorOptions {
  cause?: unknown;
  /** Payload field or section that failed validation. */
  field?: string;
  /** Leading slice of the raw service response, kept for diagnosis. */
  rawSnippet?: string;
}

export class ResumeError extends Error {
  readonly field?: string;
  readonly rawSnippet?: string;

  constructor(
    message: string,
    readonly code: ResumeErrorCode,
    options: ResumeErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResumeError';
    this.field = options.field;
    this.rawSnippet = options.rawSnippet;
  }
}

export function isResumeError(err: unknown, code?: ResumeErrorCode): err is ResumeError {
  return err instanceof ResumeError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
