import Anthropic from '@anthropic-ai/sdk';

const clients = new Map<string, Anthropic>();

/**
 * Reuse one Anthropic client per credential for the lifetime of the process.
 */
export function getAnthropicClient(apiKey: string): Anthropic {
  let client = clients.get(apiKey);
  if (!client) {
    client = new Anthropic({ apiKey });
    clients.set(apiKey, client);
  }
  return client;
}

/**
 * Concatenate the text blocks of an Anthropic API response.
 * Returns an empty string if the response has no text block.
 */
export function extractResponseText(response: Anthropic.Message): string {
  let text = '';
  for (const block of response.content) {
    if (block.type === 'text') {
      text += block.text;
    }
  }
  return text;
}
