/**
 * Authentication providers for the PushBullet client.
 */

import { PushbulletError } from '../errors';
import { tokenHint } from '../config';

/** Header carrying the access token. */
export const TOKEN_HEADER = 'Access-Token';

// Visible ASCII, space and tab: what an HTTP header value may carry.
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e]+$/;

/**
 * Authentication provider interface.
 */
export interface AuthProvider {
  /**
   * Returns the headers that authenticate a request.
   */
  getAuthHeaders(): Record<string, string>;

  /**
   * Returns a hint of the token for debugging (last 4 chars).
   */
  getTokenHint(): string;
}

/**
 * Access token authentication provider.
 */
export class AccessTokenAuthProvider implements AuthProvider {
  private readonly token: string;

  constructor(token: string) {
    if (!token || token.length === 0) {
      throw PushbulletError.invalidToken('Access token cannot be empty');
    }
    if (!HEADER_VALUE_PATTERN.test(token)) {
      throw PushbulletError.invalidToken(
        'Access token contains characters that cannot be sent in a header',
        tokenHint(token)
      );
    }
    this.token = token;
  }

  getAuthHeaders(): Record<string, string> {
    return { [TOKEN_HEADER]: this.token };
  }

  getTokenHint(): string {
    return tokenHint(this.token);
  }
}

/**
 * Creates an access token auth provider.
 */
export function createAccessTokenAuth(token: string): AuthProvider {
  return new AccessTokenAuthProvider(token);
}
