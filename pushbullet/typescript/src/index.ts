/**
 * PushBullet Client Library
 *
 * An asynchronous TypeScript client for the PushBullet v2 API: push notes,
 * links and files to your devices, list devices, and read account details.
 *
 * @example
 * ```typescript
 * import { PushbulletClient, toSelf, note } from 'pushbullet-client';
 *
 * const client = PushbulletClient.builder()
 *   .tokenFromEnv()
 *   .build();
 *
 * await client.push(toSelf(), note('User Greetings', 'Hello, user!'));
 *
 * const devices = await client.listDevices();
 * console.log(devices.map((device) => device.nickname));
 * ```
 */

// Client
export { PushbulletClient, PushbulletClientBuilder } from './client';
export type { PushbulletClientOptions, UploadPushOptions } from './client';

// Config
export {
  PushbulletConfig,
  PushbulletConfigBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  TOKEN_ENV_VAR,
} from './config';
export type { PushbulletConfigOptions } from './config';

// Errors
export {
  PushbulletError,
  PushbulletErrorCode,
  isPushbulletError,
  isAuthenticationError,
  fromApiError,
} from './errors';
export type { PushbulletErrorDetails, ApiErrorResponse } from './errors';

// Types
export type {
  Iden,
  UnixTimestamp,
  PushTarget,
  PushTargetType,
  PushData,
  PushType,
  Push,
  Device,
  User,
  UploadInput,
  UploadSlot,
  UploadedFile,
} from './types';
export {
  toSelf,
  toDevice,
  toEmail,
  toChannel,
  toClient,
  note,
  link,
  fileFromUpload,
  pushableDevices,
  contentTypeFor,
  uploadFromPath,
  uploadFromBuffer,
  uploadFromStream,
} from './types';

// Services
export type { PushesService, DevicesService, UsersService, UploadsService } from './services';
export { buildPushBody } from './services';

// Transport
export type { HttpTransport, HttpRequest, HttpResponse, AxiosTransportOptions } from './transport';
export { AxiosTransport, createTransport } from './transport';

// Auth
export type { AuthProvider } from './auth';
export { AccessTokenAuthProvider, createAccessTokenAuth, TOKEN_HEADER } from './auth';

// Observability
export type { Logger, LogConfig, LogSink } from './observability';
export { LogLevel, ConsoleLogger, NoopLogger, createLogger } from './observability';

// Mocks
export {
  MockTransport,
  createMockTransport,
  jsonResponse,
  errorResponse,
  invalidTokenResponse,
  mockUser,
  mockDevice,
  mockDeviceList,
  mockPush,
  mockUploadSlot,
} from './mocks';
export type { MockResponse, RecordedRequest } from './mocks';
