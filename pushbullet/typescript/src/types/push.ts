/**
 * Push types: targets, content, and the created push.
 */

import { z } from 'zod';
import type { Iden, UnixTimestamp } from './common';
import type { UploadedFile } from './upload';

// ============================================================================
// Targets
// ============================================================================

/**
 * Recipient of a push.
 */
export type PushTarget =
  /** The user's own stream, delivered to all of their devices. */
  | { type: 'self' }
  /** A specific device - see `Device.iden`. */
  | { type: 'device'; device_iden: Iden }
  /** A user by email; non-users receive the push by email. */
  | { type: 'email'; email: string }
  /** All subscribers of a channel, by tag. */
  | { type: 'channel'; channel_tag: string }
  /** All users who granted access to an OAuth client. */
  | { type: 'client'; client_iden: Iden };

export type PushTargetType = PushTarget['type'];

// ============================================================================
// Content
// ============================================================================

/**
 * Content of a push.
 */
export type PushData =
  | { type: 'note'; title: string; body: string }
  | { type: 'link'; title: string; body: string; url: string }
  | {
      type: 'file';
      /** Message to go with the file. */
      body: string;
      file_name: string;
      file_type: string;
      /** Where the uploaded file lives - see `UploadedFile.file_url`. */
      file_url: string;
    };

export type PushType = PushData['type'];

// ============================================================================
// Created push
// ============================================================================

/**
 * A push as returned by the API.
 */
export interface Push {
  iden: Iden;
  type: PushType;
  active: boolean;
  dismissed: boolean;
  created: UnixTimestamp;
  modified: UnixTimestamp;
  direction?: 'self' | 'outgoing' | 'incoming';
  sender_iden?: Iden;
  sender_email?: string;
  sender_email_normalized?: string;
  sender_name?: string;
  receiver_iden?: Iden;
  receiver_email?: string;
  receiver_email_normalized?: string;
  target_device_iden?: Iden;
  source_device_iden?: Iden;
  client_iden?: Iden;
  channel_iden?: Iden;
  title?: string;
  body?: string;
  url?: string;
  file_name?: string;
  file_type?: string;
  file_url?: string;
  image_url?: string;
  image_width?: number;
  image_height?: number;
}

export const PushSchema = z.object({
  iden: z.string(),
  type: z.enum(['note', 'link', 'file']),
  active: z.boolean(),
  dismissed: z.boolean(),
  created: z.number(),
  modified: z.number(),
  direction: z.enum(['self', 'outgoing', 'incoming']).optional(),
  sender_iden: z.string().optional(),
  sender_email: z.string().optional(),
  sender_email_normalized: z.string().optional(),
  sender_name: z.string().optional(),
  receiver_iden: z.string().optional(),
  receiver_email: z.string().optional(),
  receiver_email_normalized: z.string().optional(),
  target_device_iden: z.string().optional(),
  source_device_iden: z.string().optional(),
  client_iden: z.string().optional(),
  channel_iden: z.string().optional(),
  title: z.string().optional(),
  body: z.string().optional(),
  url: z.string().optional(),
  file_name: z.string().optional(),
  file_type: z.string().optional(),
  file_url: z.string().optional(),
  image_url: z.string().optional(),
  image_width: z.number().optional(),
  image_height: z.number().optional(),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Targets the user's own stream.
 */
export function toSelf(): PushTarget {
  return { type: 'self' };
}

/**
 * Targets a single device.
 */
export function toDevice(deviceIden: Iden): PushTarget {
  return { type: 'device', device_iden: deviceIden };
}

/**
 * Targets a user by email address.
 */
export function toEmail(email: string): PushTarget {
  return { type: 'email', email };
}

/**
 * Targets the subscribers of a channel.
 */
export function toChannel(channelTag: string): PushTarget {
  return { type: 'channel', channel_tag: channelTag };
}

/**
 * Targets the users of an OAuth client.
 */
export function toClient(clientIden: Iden): PushTarget {
  return { type: 'client', client_iden: clientIden };
}

/**
 * Creates a note.
 */
export function note(title: string, body: string): PushData {
  return { type: 'note', title, body };
}

/**
 * Creates a link.
 */
export function link(title: string, body: string, url: string): PushData {
  return { type: 'link', title, body, url };
}

/**
 * Creates a file push for an uploaded file.
 */
export function fileFromUpload(file: UploadedFile, body = ''): PushData {
  return {
    type: 'file',
    body,
    file_name: file.file_name,
    file_type: file.file_type,
    file_url: file.file_url,
  };
}
