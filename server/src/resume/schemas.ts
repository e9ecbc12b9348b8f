/**
 * Shape of the content payload returned by the generation service.
 *
 * Two views of the same contract live here:
 *   - buildPayloadJsonSchema(): JSON schema embedded in the prompt
 *   - ContentPayloadSchema:     zod schema the parsed response must satisfy
 *
 * Both are generated from SECTION_IDS so the prompt and the validator always
 * agree on field names and bullet counts.
 */

import { z } from 'zod';
import { ResumeError } from '../lib/errors.js';
import { BULLETS_PER_SECTION, SECTION_IDS, mapSections, type SectionId } from './sections.js';

// ─── Request schema (sent to the model) ───────────────────────────────

export interface JsonSchemaArray {
  type: 'array';
  items: { type: 'string' };
  minItems: number;
  maxItems: number;
}

export interface PayloadJsonSchema {
  type: 'object';
  properties: { name: { type: 'string' } } & Record<SectionId, JsonSchemaArray>;
  required: string[];
  additionalProperties: false;
}

export function buildPayloadJsonSchema(): PayloadJsonSchema {
  const sectionProperties = mapSections((): JsonSchemaArray => ({
    type: 'array',
    items: { type: 'string' },
    minItems: BULLETS_PER_SECTION,
    maxItems: BULLETS_PER_SECTION,
  }));

  return {
    type: 'object',
    properties: { name: { type: 'string' }, ...sectionProperties },
    required: ['name', ...SECTION_IDS],
    additionalProperties: false,
  };
}

// ─── Response schema (validated after parse) ──────────────────────────

const nonBlank = z.string().refine((s) => s.trim().length > 0);

const bulletList = z.array(nonBlank).length(BULLETS_PER_SECTION);

const sectionShape = mapSections(() => bulletList);

export const ContentPayloadSchema = z.object({
  name: nonBlank,
  ...sectionShape,
});

export type ContentPayload = Readonly<
  { name: string } & { readonly [K in SectionId]: readonly string[] }
>;

/**
 * Validate a parsed service response. Unknown keys are dropped; the returned
 * payload is frozen.
 *
 * Throws a `validation` ResumeError naming the first offending field, checked
 * in schema order (`name`, then each section in SECTION_IDS order).
 */
export function validateContentPayload(value: unknown): ContentPayload {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ResumeError('Payload must be a JSON object', 'validation', { field: 'payload' });
  }

  const result = ContentPayloadSchema.safeParse(value);
  if (!result.success) {
    const field = firstFailingField(result.error.issues);
    const reason = field === 'name'
      ? "Invalid 'name' field"
      : `'${field}' needs ${BULLETS_PER_SECTION} non-empty strings`;
    throw new ResumeError(reason, 'validation', { field });
  }

  const data = result.data;
  return Object.freeze({
    name: data.name,
    ...mapSections((id) => Object.freeze([...data[id]])),
  });
}

function firstFailingField(issues: z.ZodIssue[]): string {
  const order: readonly string[] = ['name', ...SECTION_IDS];
  let best: string | undefined;
  for (const issue of issues) {
    const head = issue.path[0];
    if (typeof head !== 'string') continue;
    if (best === undefined || order.indexOf(head) < order.indexOf(best)) {
      best = head;
    }
  }
  return best ?? 'payload';
}
