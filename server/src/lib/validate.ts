import { z } from 'zod';

export interface BodyIssue {
  path: string;
  message: string;
}

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data on success, or flattened issues suitable for an
 * API error response.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: BodyIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(body)',
        message: issue.message,
      })),
    };
  }
  return { success: true, data: result.data };
}
