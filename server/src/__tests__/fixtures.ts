import type { AppConfig } from '../lib/config.js';
import type { ChatParams, ChatResponse, LLMProvider } from '../lib/llm-provider.js';
import { mapSections, type SectionId } from '../resume/sections.js';

export type PayloadData = { name: string } & Record<SectionId, string[]>;

export function makePayloadData(name = 'Jane Doe', tag = 'bullet'): PayloadData {
  return {
    name,
    ...mapSections((id) => {
      const label = id.replace(/_/g, ' ');
      return [`${label} ${tag} 1`, `${label} ${tag} 2`, `${label} ${tag} 3`];
    }),
  };
}

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    provider: 'openai',
    apiKey: 'test-key',
    model: 'test-model',
    baseUrl: 'https://llm.example.test/v1',
    candidateName: 'Jane Doe',
    defaultSeniority: 'Senior',
    defaultIndustry: 'fintech',
    maxTokens: 700,
    temperature: 0.1,
    outputDir: '.',
    port: 3001,
    ...overrides,
  };
}

export const GENERATION_SETTINGS = {
  model: 'test-model',
  candidateName: 'Jane Doe',
  maxTokens: 700,
  temperature: 0.1,
};

/**
 * In-process stand-in for the generation service. Replies are consumed in
 * order; the last one repeats once the list is exhausted. An Error reply is
 * thrown instead of returned.
 */
export class FakeProvider implements LLMProvider {
  readonly name = 'fake';
  readonly calls: ChatParams[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    this.calls.push(params);
    const reply = this.replies[Math.min(this.calls.length, this.replies.length) - 1];
    if (reply === undefined) {
      throw new Error('FakeProvider has no replies configured');
    }
    if (reply instanceof Error) throw reply;
    return { text: reply, usage: { input_tokens: 10, output_tokens: 20 } };
  }

  promptAt(index: number): string {
    return this.calls[index]?.messages[0]?.content ?? '';
  }
}
