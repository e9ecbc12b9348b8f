import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { ResumeError } from '../lib/errors.js';
import {
  ContentGenerator,
  MAX_GENERATION_ATTEMPTS,
  decodeContentPayload,
  normalizeResumeRequest,
} from '../resume/content-generator.js';
import { STRICT_JSON_SUFFIX } from '../resume/prompt.js';
import { FakeProvider, GENERATION_SETTINGS, makePayloadData } from './fixtures.js';

const silent = pino({ level: 'silent' });
const REQUEST = { jobTitle: 'ML Engineer', industry: 'fintech', seniority: 'Senior' };

function makeGenerator(replies: Array<string | Error>) {
  const provider = new FakeProvider(replies);
  const generator = new ContentGenerator(provider, GENERATION_SETTINGS, silent);
  return { provider, generator };
}

async function failure(promise: Promise<unknown>): Promise<ResumeError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ResumeError) return err;
    throw err;
  }
  throw new Error('expected generation to fail');
}

describe('ContentGenerator: successful generation', () => {
  it('returns the validated payload from a single call', async () => {
    const data = makePayloadData();
    const { provider, generator } = makeGenerator([JSON.stringify(data)]);

    const payload = await generator.generate(REQUEST);

    expect(payload).toEqual(data);
    expect(provider.calls).toHaveLength(1);
  });

  it('sends one user message with the configured sampling settings', async () => {
    const { provider, generator } = makeGenerator([JSON.stringify(makePayloadData())]);

    await generator.generate(REQUEST);

    const call = provider.calls[0];
    expect(call?.model).toBe('test-model');
    expect(call?.max_tokens).toBe(700);
    expect(call?.temperature).toBe(0.1);
    expect(call?.messages).toHaveLength(1);
    expect(call?.messages[0]?.role).toBe('user');
  });

  it('builds the prompt from the trimmed request and the configured name', async () => {
    const { provider, generator } = makeGenerator([JSON.stringify(makePayloadData())]);

    await generator.generate({ jobTitle: '  ML Engineer ', industry: ' fintech', seniority: 'Senior  ' });

    const prompt = provider.promptAt(0);
    expect(prompt.startsWith('Generate resume JSON for "ML Engineer" level "Senior" industry: fintech. Name: "Jane Doe". Schema: ')).toBe(true);
    expect(prompt.endsWith(STRICT_JSON_SUFFIX)).toBe(false);
  });

  it('accepts a reply wrapped in a json code fence', async () => {
    const data = makePayloadData();
    const { generator } = makeGenerator(['```json\n' + JSON.stringify(data, null, 2) + '\n```']);

    await expect(generator.generate(REQUEST)).resolves.toEqual(data);
  });

  it('uses the name the model returned', async () => {
    const data = makePayloadData('J. Doe');
    const { generator } = makeGenerator([JSON.stringify(data)]);

    const payload = await generator.generate(REQUEST);
    expect(payload.name).toBe('J. Doe');
  });
});

describe('ContentGenerator: retry on bad output', () => {
  it('retries once with the raw JSON instruction after unparseable text', async () => {
    const data = makePayloadData();
    const { provider, generator } = makeGenerator(['Here is your resume!', JSON.stringify(data)]);

    const payload = await generator.generate(REQUEST);

    expect(payload).toEqual(data);
    expect(provider.calls).toHaveLength(2);
    expect(provider.promptAt(1)).toBe(provider.promptAt(0) + STRICT_JSON_SUFFIX);
  });

  it('retries after a payload that fails validation', async () => {
    const bad = { ...makePayloadData(), work_experience: ['only one'] };
    const good = makePayloadData();
    const { provider, generator } = makeGenerator([JSON.stringify(bad), JSON.stringify(good)]);

    await expect(generator.generate(REQUEST)).resolves.toEqual(good);
    expect(provider.calls).toHaveLength(2);
  });

  it(`stops after ${MAX_GENERATION_ATTEMPTS} attempts with a parse failure`, async () => {
    const { provider, generator } = makeGenerator(['not json']);

    const err = await failure(generator.generate(REQUEST));

    expect(provider.calls).toHaveLength(MAX_GENERATION_ATTEMPTS);
    expect(err.code).toBe('generation_failed');
    expect(err.message.startsWith('Parse failed: ')).toBe(true);
    expect(err.message.endsWith('\nRaw: not json')).toBe(true);
    expect(err.rawSnippet).toBe('not json');
    expect(err.cause).toBeInstanceOf(ResumeError);
  });

  it('reports the failing section when the second reply is still invalid', async () => {
    const bad = JSON.stringify({ ...makePayloadData(), work_experience: ['a', 'b'] });
    const { generator } = makeGenerator([bad, bad]);

    const err = await failure(generator.generate(REQUEST));

    expect(err.code).toBe('generation_failed');
    expect(err.field).toBe('work_experience');
    expect(err.message).toBe(`Parse failed: 'work_experience' needs 3 non-empty strings\nRaw: ${bad.slice(0, 200)}`);
  });

  it('keeps only the first 200 characters of the fence-stripped reply', async () => {
    const longReply = '```\n' + 'x'.repeat(500) + '\n```';
    const { generator } = makeGenerator([longReply]);

    const err = await failure(generator.generate(REQUEST));

    expect(err.rawSnippet).toBe('x'.repeat(200));
    expect(err.message.endsWith(`\nRaw: ${'x'.repeat(200)}`)).toBe(true);
  });
});

describe('ContentGenerator: service failures', () => {
  it('raises a connectivity error without retrying', async () => {
    const { provider, generator } = makeGenerator([new TypeError('fetch failed')]);

    const err = await failure(generator.generate(REQUEST));

    expect(provider.calls).toHaveLength(1);
    expect(err.code).toBe('connectivity');
    expect(err.message).toBe('Connection error: Check your internet connection and API key. Details: fetch failed');
  });

  it('raises a service error without retrying', async () => {
    const { provider, generator } = makeGenerator([new Error('OpenAI API error 401: invalid key')]);

    const err = await failure(generator.generate(REQUEST));

    expect(provider.calls).toHaveLength(1);
    expect(err.code).toBe('service');
    expect(err.message).toBe('API error: OpenAI API error 401: invalid key');
  });

  it('stops when the retry call fails at the service', async () => {
    const { provider, generator } = makeGenerator(['nope', new Error('OpenAI API error 500: overloaded')]);

    const err = await failure(generator.generate(REQUEST));

    expect(provider.calls).toHaveLength(2);
    expect(err.code).toBe('service');
  });
});

describe('ContentGenerator: request checks', () => {
  it.each([
    ['jobTitle', { ...REQUEST, jobTitle: '   ' }],
    ['industry', { ...REQUEST, industry: '' }],
    ['seniority', { ...REQUEST, seniority: '\t' }],
  ])('rejects a blank %s before calling the service', async (field, request) => {
    const { provider, generator } = makeGenerator([JSON.stringify(makePayloadData())]);

    const err = await failure(generator.generate(request));

    expect(provider.calls).toHaveLength(0);
    expect(err.code).toBe('invalid_request');
    expect(err.field).toBe(field);
    expect(err.message).toBe(`${field} must not be empty`);
  });

  it('normalizeResumeRequest trims every field', () => {
    expect(normalizeResumeRequest({ jobTitle: ' a ', industry: 'b ', seniority: ' c' })).toEqual({
      jobTitle: 'a',
      industry: 'b',
      seniority: 'c',
    });
  });
});

describe('decodeContentPayload', () => {
  it('raises a parse error for malformed JSON', () => {
    expect(() => decodeContentPayload('{"name":')).toThrow(ResumeError);
    try {
      decodeContentPayload('{"name":');
    } catch (err) {
      expect(err instanceof ResumeError && err.code).toBe('parse');
    }
  });

  it('raises a validation error for well-formed JSON of the wrong shape', () => {
    try {
      decodeContentPayload('[]');
      expect.unreachable();
    } catch (err) {
      expect(err instanceof ResumeError && err.code).toBe('validation');
    }
  });
});
