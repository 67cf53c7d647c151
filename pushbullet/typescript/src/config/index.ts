/**
 * Configuration module for the PushBullet client.
 */

import { z } from 'zod';
import { PushbulletError } from '../errors';

/** Default base URL for the PushBullet v2 API. */
export const DEFAULT_BASE_URL = 'https://api.pushbullet.com/v2';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Environment variable holding the access token. */
export const TOKEN_ENV_VAR = 'PUSHBULLET_TOKEN';

const baseUrlSchema = z
  .string()
  .url()
  .refine((url) => url.startsWith('https://'), { message: 'Base URL must use HTTPS' });

const timeoutSchema = z.number().int().positive();

/**
 * Configuration options for the PushBullet client.
 */
export interface PushbulletConfigOptions {
  /** Access token from the account settings page. */
  token: string;
  /** Base URL for API requests. */
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Custom headers to include in requests. */
  customHeaders?: Record<string, string>;
}

/**
 * Configuration for the PushBullet client.
 */
export class PushbulletConfig {
  /** Access token. */
  readonly token: string;
  /** Base URL for API requests. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds. */
  readonly timeout: number;
  /** Custom headers. */
  readonly customHeaders: Record<string, string>;

  private constructor(options: PushbulletConfigOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.customHeaders = options.customHeaders ?? {};
  }

  /**
   * Creates a new configuration builder.
   */
  static builder(): PushbulletConfigBuilder {
    return new PushbulletConfigBuilder();
  }

  /**
   * Creates a configuration from environment variables.
   */
  static fromEnv(): PushbulletConfig {
    const builder = new PushbulletConfigBuilder().tokenFromEnv();

    const baseUrl = process.env['PUSHBULLET_BASE_URL'];
    if (baseUrl) {
      builder.baseUrl(baseUrl);
    }

    const timeout = process.env['PUSHBULLET_TIMEOUT'];
    if (timeout) {
      const ms = parseInt(timeout, 10);
      if (!isNaN(ms)) {
        builder.timeout(ms);
      }
    }

    return builder.build();
  }

  /**
   * Creates configuration from options without validation.
   */
  static fromOptions(options: PushbulletConfigOptions): PushbulletConfig {
    return new PushbulletConfig(options);
  }

  /**
   * Returns a hint of the token for debugging.
   */
  getTokenHint(): string {
    return tokenHint(this.token);
  }
}

/**
 * Builder for PushbulletConfig.
 */
export class PushbulletConfigBuilder {
  private _token?: string;
  private _baseUrl?: string;
  private _timeout?: number;
  private _customHeaders: Record<string, string> = {};

  /**
   * Sets the access token.
   */
  token(token: string): this {
    this._token = token;
    return this;
  }

  /**
   * Sets the access token from an environment variable.
   */
  tokenFromEnv(varName: string = TOKEN_ENV_VAR): this {
    const token = process.env[varName];
    if (!token) {
      throw PushbulletError.invalidToken(`Environment variable ${varName} not set`);
    }
    this._token = token;
    return this;
  }

  /**
   * Sets the base URL.
   */
  baseUrl(url: string): this {
    this._baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this._timeout = ms;
    return this;
  }

  /**
   * Sets the timeout in seconds.
   */
  timeoutSecs(secs: number): this {
    this._timeout = secs * 1000;
    return this;
  }

  /**
   * Adds a custom header.
   */
  header(name: string, value: string): this {
    this._customHeaders[name] = value;
    return this;
  }

  /**
   * Builds the configuration.
   */
  build(): PushbulletConfig {
    if (this._token === undefined || this._token.length === 0) {
      throw PushbulletError.invalidToken('Access token is required');
    }

    if (this._baseUrl !== undefined) {
      const result = baseUrlSchema.safeParse(this._baseUrl);
      if (!result.success) {
        throw PushbulletError.configuration(
          `Invalid base URL: ${result.error.issues[0]?.message ?? this._baseUrl}`
        );
      }
    }

    if (this._timeout !== undefined && !timeoutSchema.safeParse(this._timeout).success) {
      throw PushbulletError.configuration('Timeout must be a positive integer');
    }

    return PushbulletConfig.fromOptions({
      token: this._token,
      baseUrl: this._baseUrl,
      timeout: this._timeout,
      customHeaders:
        Object.keys(this._customHeaders).length > 0 ? this._customHeaders : undefined,
    });
  }
}

/**
 * Returns the last four characters of a token, for logs and error details.
 */
export function tokenHint(token: string): string {
  if (token.length > 4) {
    return `...${token.slice(-4)}`;
  }
  return '****';
}
