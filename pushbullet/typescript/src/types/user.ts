/**
 * User types.
 */

import { z } from 'zod';
import type { Iden, UnixTimestamp } from './common';

/**
 * The account the access token belongs to.
 */
export interface User {
  iden: Iden;
  created: UnixTimestamp;
  modified: UnixTimestamp;
  /** Account email, usable as a push target. */
  email: string;
  email_normalized: string;
  name: string;
  image_url?: string;
  /** Largest file, in bytes, the account may upload. */
  max_upload_size: number;
}

export const UserSchema = z.object({
  iden: z.string(),
  created: z.number(),
  modified: z.number(),
  email: z.string(),
  email_normalized: z.string(),
  name: z.string(),
  image_url: z.string().optional(),
  max_upload_size: z.number(),
});
