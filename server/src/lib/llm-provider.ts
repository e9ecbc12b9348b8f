import type Anthropic from '@anthropic-ai/sdk';
import { extractResponseText } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResponse {
  text: string;
  usage: ChatUsage;
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly client: Anthropic) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        temperature: params.temperature,
        messages: params.messages,
      },
      { signal: params.signal },
    );

    return {
      text: extractResponseText(response),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAIConfig {
  apiKey: string;
  baseUrl: string;
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(this.buildRequestBody(params)),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new Error(`OpenAI API error ${response.status}: ${errText}`);
    }

    const data = await response.json() as OpenAIChatResponse;
    return this.parseResponse(data);
  }

  buildRequestBody(params: ChatParams) {
    return {
      model: params.model,
      max_tokens: params.max_tokens,
      temperature: params.temperature,
      messages: params.messages,
    };
  }

  private parseResponse(data: OpenAIChatResponse): ChatResponse {
    const content = data.choices?.[0]?.message?.content;
    return {
      text: typeof content === 'string' ? content : '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
