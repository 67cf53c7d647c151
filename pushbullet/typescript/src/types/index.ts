/**
 * Type exports for the PushBullet client.
 */

// Common types
export type { Iden, UnixTimestamp } from './common';
export { decodeResponse } from './common';

// Push types
export type { PushTarget, PushTargetType, PushData, PushType, Push } from './push';
export {
  PushSchema,
  toSelf,
  toDevice,
  toEmail,
  toChannel,
  toClient,
  note,
  link,
  fileFromUpload,
} from './push';

// Device types
export type { Device, DeviceList } from './device';
export { DeviceSchema, DeviceListSchema, pushableDevices } from './device';

// User types
export type { User } from './user';
export { UserSchema } from './user';

// Upload types
export type {
  UploadInput,
  UploadRequest,
  UploadSlot,
  UploadedFile,
} from './upload';
export {
  UploadSlotSchema,
  contentTypeFor,
  uploadFileName,
  uploadFileType,
  uploadFromPath,
  uploadFromBuffer,
  uploadFromStream,
} from './upload';
