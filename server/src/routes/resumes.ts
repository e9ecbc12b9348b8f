import { Hono } from 'hono';
import { z } from 'zod';
import { isResumeError, type ResumeErrorCode } from '../lib/errors.js';
import { validateBody } from '../lib/validate.js';
import { DOCX_MIME_TYPE } from '../resume/output.js';
import type { ResumePipeline } from '../resume/pipeline.js';

const generateResumeSchema = z.object({
  job_title: z.string().trim().min(1).max(200),
  industry: z.string().trim().max(200).optional(),
  seniority: z.string().trim().max(100).optional(),
});

const STATUS_BY_CODE = {
  invalid_request: 400,
  configuration: 500,
  connectivity: 503,
  service: 502,
  parse: 502,
  validation: 502,
  generation_failed: 502,
} as const satisfies Record<ResumeErrorCode, number>;

function toArrayBuffer(buf: Buffer): ArrayBuffer {
  const out = new ArrayBuffer(buf.byteLength);
  new Uint8Array(out).set(buf);
  return out;
}

export function createResumeRoutes(pipeline: ResumePipeline): Hono {
  const resumes = new Hono();

  // POST /resumes: generate a one-page resume and return it as DOCX
  resumes.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON', code: 'invalid_request' }, 400);
    }

    const parsed = validateBody(generateResumeSchema, body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request body', code: 'invalid_request', issues: parsed.issues }, 400);
    }

    const request = pipeline.withDefaults({
      jobTitle: parsed.data.job_title,
      industry: parsed.data.industry,
      seniority: parsed.data.seniority,
    });

    try {
      const result = await pipeline.generateResume(request, {
        logger: c.get('logger'),
        signal: c.req.raw.signal,
      });
      return c.body(toArrayBuffer(result.document), 200, {
        'Content-Type': DOCX_MIME_TYPE,
        'Content-Disposition': `attachment; filename="${result.filename}"`,
        'X-Resume-Run-ID': result.runId,
      });
    } catch (err) {
      if (!isResumeError(err)) throw err;
      return c.json({
        error: err.message,
        code: err.code,
        ...(err.field ? { field: err.field } : {}),
      }, STATUS_BY_CODE[err.code]);
    }
  });

  return resumes;
}
