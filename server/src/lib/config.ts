import { z } from 'zod';
import { ResumeError } from './errors.js';

export type LlmProviderName = 'openai' | 'anthropic';

export interface AppConfig {
  provider: LlmProviderName;
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint root; unused by the Anthropic provider. */
  baseUrl: string;
  candidateName: string;
  defaultSeniority: string;
  defaultIndustry: string;
  maxTokens: number;
  temperature: number;
  outputDir: string;
  port: number;
}

export const DEFAULT_MODELS: Record<LlmProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  LLM_PROVIDER: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || 'openai')
    .pipe(z.enum(['openai', 'anthropic'])),
  OPENAI_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  ANTHROPIC_MODEL: optionalText,
  OPENAI_BASE_URL: optionalText.pipe(z.string().url().optional()),
  CANDIDATE_NAME: optionalText,
  TARGET_SENIORITY: optionalText,
  INDUSTRY_CONTEXT: optionalText,
  MAX_TOKENS: optionalText.pipe(z.coerce.number().int().positive().max(32_000).optional()),
  TEMPERATURE: optionalText.pipe(z.coerce.number().min(0).max(2).optional()),
  OUTPUT_DIR: optionalText,
  PORT: optionalText.pipe(z.coerce.number().int().min(1).max(65_535).optional()),
});

/**
 * Build the process-wide configuration from an environment map.
 *
 * Throws a `configuration` ResumeError when the credential for the selected
 * provider is missing or a numeric setting is out of range. Nothing else in
 * the library reads `process.env`; entry points call this once and pass the
 * result down.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new ResumeError(
      `Invalid ${variable}: ${issue?.message ?? 'unrecognised value'}`,
      'configuration',
      { field: variable },
    );
  }

  const vars = parsed.data;
  const provider = vars.LLM_PROVIDER;
  const keyVariable = provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
  const apiKey = provider === 'anthropic' ? vars.ANTHROPIC_API_KEY : vars.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ResumeError(`Missing ${keyVariable} in .env`, 'configuration', { field: keyVariable });
  }

  return Object.freeze({
    provider,
    apiKey,
    model: (provider === 'anthropic' ? vars.ANTHROPIC_MODEL : vars.OPENAI_MODEL) ?? DEFAULT_MODELS[provider],
    baseUrl: vars.OPENAI_BASE_URL ?? 'https://api.openai.com/v1',
    candidateName: vars.CANDIDATE_NAME ?? 'Your Name',
    defaultSeniority: vars.TARGET_SENIORITY ?? 'Senior',
    defaultIndustry: vars.INDUSTRY_CONTEXT ?? 'AI engineering for medical software',
    maxTokens: vars.MAX_TOKENS ?? 700,
    temperature: vars.TEMPERATURE ?? 0.1,
    outputDir: vars.OUTPUT_DIR ?? '.',
    port: vars.PORT ?? 3001,
  });
}
