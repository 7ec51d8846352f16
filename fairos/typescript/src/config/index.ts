/**
 * Configuration module for the FairOS-dfs client.
 */

import { z } from 'zod';
import { FairOSError } from '../errors';

/** Default base URL of a local FairOS-dfs server. */
export const DEFAULT_BASE_URL = 'http://localhost:9090/v1';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 60000;

/** Name of the session cookie set by the server. */
export const DEFAULT_SESSION_COOKIE_NAME = 'fairOS-dfs';

/** Maximum idle keep-alive sockets kept per host. */
export const DEFAULT_MAX_IDLE_SOCKETS = 20;

/** Idle keep-alive socket timeout in milliseconds (100 minutes). */
export const DEFAULT_IDLE_TIMEOUT_MS = 6000 * 1000;

/**
 * Configuration options for the FairOS client.
 */
export interface FairOSConfigOptions {
  /** Base URL for API requests, including the version prefix. */
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Session cookie name. */
  sessionCookieName?: string;
  /** Maximum idle keep-alive sockets per host. */
  maxIdleSockets?: number;
  /** Idle socket timeout in milliseconds. */
  idleTimeout?: number;
  /** Custom headers to include in requests. */
  customHeaders?: Record<string, string>;
}

const positiveInt = z.number().int().positive();

const ConfigOptionsSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//.test(url), 'Base URL must use http or https'),
  timeout: positiveInt,
  sessionCookieName: z.string().min(1, 'Session cookie name cannot be empty'),
  maxIdleSockets: positiveInt,
  idleTimeout: positiveInt,
  customHeaders: z.record(z.string()),
});

/**
 * Configuration for the FairOS client.
 */
export class FairOSConfig {
  /** Base URL for API requests, without a trailing slash. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds. */
  readonly timeout: number;
  /** Session cookie name. */
  readonly sessionCookieName: string;
  /** Maximum idle keep-alive sockets per host. */
  readonly maxIdleSockets: number;
  /** Idle socket timeout in milliseconds. */
  readonly idleTimeout: number;
  /** Custom headers. */
  readonly customHeaders: Record<string, string>;

  private constructor(options: z.infer<typeof ConfigOptionsSchema>) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeout = options.timeout;
    this.sessionCookieName = options.sessionCookieName;
    this.maxIdleSockets = options.maxIdleSockets;
    this.idleTimeout = options.idleTimeout;
    this.customHeaders = options.customHeaders;
  }

  /**
   * Creates a new configuration builder.
   */
  static builder(): FairOSConfigBuilder {
    return new FairOSConfigBuilder();
  }

  /**
   * Creates a configuration from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): FairOSConfig {
    const builder = new FairOSConfigBuilder();

    const baseUrl = env['FAIROS_BASE_URL'];
    if (baseUrl) {
      builder.baseUrl(baseUrl);
    }

    const timeout = env['FAIROS_TIMEOUT'];
    if (timeout) {
      const ms = parseInt(timeout, 10);
      if (isNaN(ms)) {
        throw FairOSError.configuration(`FAIROS_TIMEOUT is not a number: ${timeout}`);
      }
      builder.timeout(ms);
    }

    const cookieName = env['FAIROS_COOKIE_NAME'];
    if (cookieName) {
      builder.sessionCookieName(cookieName);
    }

    return builder.build();
  }

  /**
   * Creates configuration from options, applying defaults and validating.
   */
  static fromOptions(options: FairOSConfigOptions = {}): FairOSConfig {
    const result = ConfigOptionsSchema.safeParse({
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      sessionCookieName: options.sessionCookieName ?? DEFAULT_SESSION_COOKIE_NAME,
      maxIdleSockets: options.maxIdleSockets ?? DEFAULT_MAX_IDLE_SOCKETS,
      idleTimeout: options.idleTimeout ?? DEFAULT_IDLE_TIMEOUT_MS,
      customHeaders: options.customHeaders ?? {},
    });

    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.') ?? 'config';
      throw FairOSError.configuration(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
    }

    return new FairOSConfig(result.data);
  }

  /**
   * Builds the full URL for an endpoint path and a pre-built query string.
   */
  getEndpointUrl(path: string, query = ''): string {
    const normalized = path.startsWith('/') ? path : `/${path}`;
    return query ? `${this.baseUrl}${normalized}?${query}` : `${this.baseUrl}${normalized}`;
  }
}

/**
 * Builder for FairOSConfig.
 */
export class FairOSConfigBuilder {
  private _baseUrl?: string;
  private _timeout?: number;
  private _sessionCookieName?: string;
  private _maxIdleSockets?: number;
  private _idleTimeout?: number;
  private _customHeaders: Record<string, string> = {};

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
   * Sets the session cookie name.
   */
  sessionCookieName(name: string): this {
    this._sessionCookieName = name;
    return this;
  }

  /**
   * Sets the maximum number of idle keep-alive sockets per host.
   */
  maxIdleSockets(count: number): this {
    this._maxIdleSockets = count;
    return this;
  }

  /**
   * Sets the idle socket timeout in milliseconds.
   */
  idleTimeout(ms: number): this {
    this._idleTimeout = ms;
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
  build(): FairOSConfig {
    return FairOSConfig.fromOptions({
      baseUrl: this._baseUrl,
      timeout: this._timeout,
      sessionCookieName: this._sessionCookieName,
      maxIdleSockets: this._maxIdleSockets,
      idleTimeout: this._idleTimeout,
      customHeaders: { ...this._customHeaders },
    });
  }
}
