import { z } from 'zod';
import type { RequestContext } from '@/types/core';

/**
 * Request validation. The parsed value is the immutable RequestContext for one
 * pipeline run.
 */
export const requestContextSchema = z.object({
  query: z.string().trim().min(1, 'Query is required and cannot be empty').max(2000, 'Query is too long'),
  userId: z.string().trim().min(1, 'userId is required'),
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  maxResults: z.coerce.number().int().min(1).max(100).optional().default(10),
  signal: z.instanceof(AbortSignal).optional(),
});

export type RequestContextInput = z.input<typeof requestContextSchema>;

/**
 * Validates a request context
 * @returns Validation result with typed data or detailed errors
 */
export function validateRequestContext(data: unknown):
  | {
      success: true;
      data: RequestContext;
    }
  | {
      success: false;
      error: Array<{ path: string; message: string }>;
    } {
  const result = requestContextSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  const { signal, ...rest } = result.data;
  return {
    success: true,
    data: Object.freeze({ ...rest, ...(signal ? { signal } : {}) }),
  };
}
