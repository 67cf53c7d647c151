/**
 * Users service.
 */

import { HttpTransport } from '../transport';
import { decodeResponse } from '../types/common';
import { User, UserSchema } from '../types/user';

/**
 * Users service interface.
 */
export interface UsersService {
  /**
   * Gets the user the access token belongs to.
   */
  me(): Promise<User>;
}

/**
 * Default users service implementation.
 */
export class DefaultUsersService implements UsersService {
  private readonly transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  async me(): Promise<User> {
    const response = await this.transport.request({
      method: 'GET',
      path: 'users/me',
    });

    return decodeResponse(UserSchema, response.data, 'user');
  }
}

/**
 * Creates a users service.
 */
export function createUsersService(transport: HttpTransport): UsersService {
  return new DefaultUsersService(transport);
}
