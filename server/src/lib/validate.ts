import { z } from 'zod';

export interface FieldIssue {
  /** Dotted path into the body; empty for the root */
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: FieldIssue[] };

/**
 * Validates a request body against a Zod schema, flattening failures into
 * path/message pairs for the 400 response.
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T, body: unknown): ValidationResult<z.output<T>> {
  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    };
  }
  return { success: true, data: result.data };
}
