import { buildPayloadJsonSchema } from './schemas.js';
import { BULLETS_PER_SECTION } from './sections.js';

export interface ResumeRequest {
  jobTitle: string;
  industry: string;
  seniority: string;
}

export interface PromptInput extends ResumeRequest {
  candidateName: string;
}

export const MAX_WORDS_PER_BULLET = 16;

/** Appended on the retry attempt after an unparseable or invalid reply. */
export const STRICT_JSON_SUFFIX = ' OUTPUT ONLY RAW JSON.';

/**
 * Compact single-message instruction. The schema is serialised without
 * whitespace to keep the prompt short.
 */
export function buildResumePrompt(input: PromptInput, options: { strict?: boolean } = {}): string {
  const schema = JSON.stringify(buildPayloadJsonSchema());
  const prompt =
    `Generate resume JSON for "${input.jobTitle}" level "${input.seniority}" ` +
    `industry: ${input.industry}. Name: "${input.candidateName}". ` +
    `Schema: ${schema} ` +
    `Rules: ${BULLETS_PER_SECTION} bullets each, <=${MAX_WORDS_PER_BULLET} words, achievement-focused, ` +
    'no markdown, ASCII quotes only.';
  return options.strict ? prompt + STRICT_JSON_SUFFIX : prompt;
}
