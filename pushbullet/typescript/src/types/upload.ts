/**
 * Upload types for the two-step file upload.
 */

import { basename } from 'path';
import { Readable } from 'stream';
import { z } from 'zod';

/**
 * File to upload.
 *
 * `fileType` is the MIME type; when omitted it is inferred from the file
 * name's extension. A stream sent without `knownLength` goes out chunked.
 */
export type UploadInput =
  | { type: 'path'; path: string; fileType?: string }
  | { type: 'buffer'; buffer: Buffer; fileName: string; fileType?: string }
  | {
      type: 'stream';
      stream: Readable;
      fileName: string;
      fileType?: string;
      /** Byte length of the stream, sent as the part's length. */
      knownLength?: number;
    };

/**
 * Body of the upload-request call.
 */
export interface UploadRequest {
  file_name: string;
  file_type: string;
}

/**
 * Response to the upload-request call.
 */
export interface UploadSlot {
  file_name: string;
  file_type: string;
  /** Where the file will be available once uploaded. */
  file_url: string;
  /** Where to send the file bytes. */
  upload_url: string;
}

export const UploadSlotSchema = z.object({
  file_name: z.string(),
  file_type: z.string(),
  file_url: z.string(),
  upload_url: z.string().url(),
});

/**
 * A file that has been uploaded and can be pushed.
 *
 * The server may truncate the file name or change the type; these are the
 * values to push.
 */
export interface UploadedFile {
  file_name: string;
  file_type: string;
  file_url: string;
}

const CONTENT_TYPES: Record<string, string> = {
  txt: 'text/plain',
  md: 'text/markdown',
  csv: 'text/csv',
  html: 'text/html',
  json: 'application/json',
  pdf: 'application/pdf',
  zip: 'application/zip',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  ogg: 'audio/ogg',
  mp4: 'video/mp4',
  webm: 'video/webm',
};

/**
 * Infers a MIME type from a file name.
 */
export function contentTypeFor(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) {
    return 'application/octet-stream';
  }
  return CONTENT_TYPES[fileName.slice(dot + 1).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Returns the file name an input will be uploaded under.
 */
export function uploadFileName(input: UploadInput): string {
  return input.type === 'path' ? basename(input.path) : input.fileName;
}

/**
 * Returns the MIME type an input will be uploaded as.
 */
export function uploadFileType(input: UploadInput): string {
  return input.fileType ?? contentTypeFor(uploadFileName(input));
}

/**
 * Creates an upload input from a file path.
 */
export function uploadFromPath(path: string, fileType?: string): UploadInput {
  return { type: 'path', path, fileType };
}

/**
 * Creates an upload input from a buffer or string.
 */
export function uploadFromBuffer(
  data: Buffer | string,
  fileName: string,
  fileType?: string
): UploadInput {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  return { type: 'buffer', buffer, fileName, fileType };
}

/**
 * Creates an upload input from a stream.
 */
export function uploadFromStream(
  stream: Readable,
  fileName: string,
  fileType?: string,
  knownLength?: number
): UploadInput {
  return { type: 'stream', stream, fileName, fileType, knownLength };
}
