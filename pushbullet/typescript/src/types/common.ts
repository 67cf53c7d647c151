/**
 * Common types shared across the PushBullet client.
 */

import { z } from 'zod';
import { PushbulletError } from '../errors';

/**
 * PushBullet identifier of a user, device, push or client.
 */
export type Iden = string;

/**
 * Unix time in seconds, with a fractional part.
 */
export type UnixTimestamp = number;

/**
 * Validates a decoded response body against a schema.
 *
 * @param what - Name of the expected entity, for the error message.
 */
export function decodeResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string
): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw PushbulletError.invalidResponse(
      `Invalid ${what} response${where}: ${issue?.message ?? 'unexpected shape'}`,
      JSON.stringify(data),
      result.error
    );
  }
  return result.data;
}
