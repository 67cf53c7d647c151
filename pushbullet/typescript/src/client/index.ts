/**
 * Main PushBullet client implementation.
 */

import { PushbulletConfig, TOKEN_ENV_VAR } from '../config';
import { PushbulletError } from '../errors';
import { AuthProvider, AccessTokenAuthProvider } from '../auth';
import { HttpTransport, AxiosTransport } from '../transport';
import { PushesService, DefaultPushesService } from '../services/pushes';
import { DevicesService, DefaultDevicesService } from '../services/devices';
import { UsersService, DefaultUsersService } from '../services/users';
import { UploadsService, DefaultUploadsService } from '../services/uploads';
import { Logger, LogLevel, ConsoleLogger, NoopLogger } from '../observability/logging';
import { Push, PushData, PushTarget, fileFromUpload, toSelf } from '../types/push';
import { Device } from '../types/device';
import { User } from '../types/user';
import { UploadInput, UploadedFile } from '../types/upload';

/**
 * Options for creating a PushBullet client.
 */
export interface PushbulletClientOptions {
  /** Access token. Falls back to `PUSHBULLET_TOKEN`. */
  token?: string;
  /** Base URL for API requests. */
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Custom headers. */
  customHeaders?: Record<string, string>;
  /** Logger instance. */
  logger?: Logger;
  /** Custom transport, e.g. one sharing an existing HTTP client. */
  transport?: HttpTransport;
  /** Custom auth provider. */
  authProvider?: AuthProvider;
}

/**
 * Options for uploading and pushing a file.
 */
export interface UploadPushOptions {
  /** Recipient of the push. Defaults to the user's own stream. */
  target?: PushTarget;
  /** Message to go with the file. */
  body?: string;
}

/**
 * Main PushBullet client.
 *
 * @example
 * ```typescript
 * const client = new PushbulletClient({ token: process.env.PUSHBULLET_TOKEN });
 * await client.push(toSelf(), note('User Greetings', 'Hello, user!'));
 * ```
 */
export class PushbulletClient {
  /** Pushes service. */
  readonly pushes: PushesService;
  /** Devices service. */
  readonly devices: DevicesService;
  /** Users service. */
  readonly users: UsersService;
  /** Uploads service. */
  readonly uploads: UploadsService;

  private readonly config: PushbulletConfig;
  private readonly transport: HttpTransport;
  private readonly auth: AuthProvider;
  private readonly logger: Logger;

  constructor(options: PushbulletClientOptions = {}) {
    const configBuilder = PushbulletConfig.builder();

    if (options.token !== undefined) {
      configBuilder.token(options.token);
    } else {
      configBuilder.tokenFromEnv();
    }

    if (options.baseUrl) {
      configBuilder.baseUrl(options.baseUrl);
    }
    if (options.timeout !== undefined) {
      configBuilder.timeout(options.timeout);
    }
    if (options.customHeaders) {
      for (const [name, value] of Object.entries(options.customHeaders)) {
        configBuilder.header(name, value);
      }
    }

    this.config = configBuilder.build();
    this.logger = (options.logger ?? new NoopLogger()).child({ client: 'pushbullet' });
    this.auth = options.authProvider ?? new AccessTokenAuthProvider(this.config.token);
    this.transport =
      options.transport ??
      new AxiosTransport(this.config, this.auth, { logger: this.logger });

    this.pushes = new DefaultPushesService(this.transport, this.logger);
    this.devices = new DefaultDevicesService(this.transport);
    this.users = new DefaultUsersService(this.transport);
    this.uploads = new DefaultUploadsService(this.transport, this.logger);
  }

  /**
   * Pushes data to a target.
   */
  push(target: PushTarget, data: PushData): Promise<Push> {
    return this.pushes.create(target, data);
  }

  /**
   * Lists the account's devices.
   */
  listDevices(): Promise<Device[]> {
    return this.devices.list();
  }

  /**
   * Gets the logged-in user.
   */
  getUser(): Promise<User> {
    return this.users.me();
  }

  /**
   * Uploads a file so that it can be pushed with {@link PushbulletClient.push}.
   */
  uploadRequest(file: UploadInput): Promise<UploadedFile> {
    return this.uploads.upload(file);
  }

  /**
   * Uploads a file and pushes it.
   */
  async upload(file: UploadInput, options: UploadPushOptions = {}): Promise<Push> {
    const uploaded = await this.uploads.upload(file);
    return this.pushes.create(options.target ?? toSelf(), fileFromUpload(uploaded, options.body));
  }

  /**
   * Gets the configuration.
   */
  getConfig(): PushbulletConfig {
    return this.config;
  }

  /**
   * Gets the logger.
   */
  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Returns a hint of the token in use, for diagnostics.
   */
  getTokenHint(): string {
    return this.auth.getTokenHint();
  }

  /**
   * Creates a new client builder.
   */
  static builder(): PushbulletClientBuilder {
    return new PushbulletClientBuilder();
  }

  /**
   * Creates a client from environment variables.
   */
  static fromEnv(): PushbulletClient {
    const config = PushbulletConfig.fromEnv();
    return new PushbulletClient({
      token: config.token,
      baseUrl: config.baseUrl,
      timeout: config.timeout,
    });
  }
}

/**
 * Builder for creating PushbulletClient instances.
 */
export class PushbulletClientBuilder {
  private options: PushbulletClientOptions = {};

  /**
   * Sets the access token.
   */
  token(token: string): this {
    this.options.token = token;
    return this;
  }

  /**
   * Sets the access token from an environment variable.
   */
  tokenFromEnv(varName = TOKEN_ENV_VAR): this {
    const token = process.env[varName];
    if (!token) {
      throw PushbulletError.invalidToken(`Environment variable ${varName} not set`);
    }
    this.options.token = token;
    return this;
  }

  /**
   * Sets the base URL.
   */
  baseUrl(url: string): this {
    this.options.baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  /**
   * Adds a custom header.
   */
  header(name: string, value: string): this {
    this.options.customHeaders = this.options.customHeaders ?? {};
    this.options.customHeaders[name] = value;
    return this;
  }

  /**
   * Sets the logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Enables console logging at the specified level.
   */
  withConsoleLogging(level: LogLevel = LogLevel.Info): this {
    this.options.logger = new ConsoleLogger({ level });
    return this;
  }

  /**
   * Sets a custom transport.
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  /**
   * Sets a custom auth provider.
   */
  authProvider(provider: AuthProvider): this {
    this.options.authProvider = provider;
    return this;
  }

  /**
   * Builds the client.
   */
  build(): PushbulletClient {
    return new PushbulletClient(this.options);
  }
}
