/**
 * Service exports.
 */

export type { PushesService } from './pushes';
export { DefaultPushesService, buildPushBody, createPushesService } from './pushes';

export type { DevicesService } from './devices';
export { DefaultDevicesService, createDevicesService } from './devices';

export type { UsersService } from './users';
export { DefaultUsersService, createUsersService } from './users';

export type { UploadsService } from './uploads';
export { DefaultUploadsService, createUploadsService } from './uploads';
