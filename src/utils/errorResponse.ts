/**
 * Standardized response envelopes for callers of the engine. Thrown values are
 * rendered without stack traces.
 */
import { ConfigValidationError } from '@/config/app.config';
import { EngineError, RequestValidationError, SynthesisError } from './errors';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
  code?: string;
  /** Raw per-step results, present when synthesis failed after work was done. */
  results?: SynthesisError['results'];
}

/** Omits `errors` when there are none and `code` when it is blank. */
export function createErrorResponse(
  message: string,
  errors?: Array<{ path: string; message: string }>,
  code?: string,
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 ? { errors } : {}),
    ...(code ? { code } : {}),
  };
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof RequestValidationError || err instanceof ConfigValidationError) {
    return createErrorResponse(err.message, err.issues, err.code);
  }
  if (err instanceof SynthesisError) {
    return { ...createErrorResponse(err.message, undefined, err.code), results: err.results };
  }
  if (err instanceof EngineError) {
    return createErrorResponse(err.message, undefined, err.code);
  }
  return createErrorResponse('Internal error', undefined, 'INTERNAL_ERROR');
}
