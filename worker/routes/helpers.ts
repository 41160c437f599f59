import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ZodError } from 'zod';

export const jsonOk = <T>(c: Context, data: T, status: ContentfulStatusCode = 200) =>
  c.json({ success: true as const, data }, status);

export const jsonError = (c: Context, code: string, message: string, status: ContentfulStatusCode = 400) =>
  c.json({ success: false as const, error: { code, message } }, status);

const describeIssues = (error: ZodError) =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

/** zValidator hook that answers failures with the error envelope. */
export const onInvalid = (result: { success: boolean; error?: ZodError }, c: Context) => {
  if (!result.success && result.error) {
    return jsonError(c, 'VALIDATION_ERROR', describeIssues(result.error), 400);
  }
};
