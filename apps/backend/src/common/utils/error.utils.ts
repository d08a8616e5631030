import { z, ZodError, ZodTypeAny } from 'zod';

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorStack = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined;

/**
 * Validate an untrusted payload, turning a schema mismatch into the error
 * chosen by the caller.
 */
export function parsePayload<S extends ZodTypeAny>(
  schema: S,
  payload: unknown,
  onInvalid: (error: ZodError) => Error,
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw onInvalid(result.error);
  }
  return result.data;
}
