/**
 * Main FairOS-dfs client implementation.
 */

import { FairOSConfig, FairOSConfigOptions } from '../config';
import { HttpTransport, AxiosTransport, RequestExecutor } from '../transport';
import { SessionStore, InMemorySessionStore } from '../session';
import { ServiceContext } from '../services/base';
import { UserService, DefaultUserService } from '../services/user';
import { PodService, DefaultPodService } from '../services/pod';
import { FileSystemService, DefaultFileSystemService } from '../services/filesystem';
import { KeyValueService, DefaultKeyValueService } from '../services/kv';
import { DocumentService, DefaultDocumentService } from '../services/document';
import { Logger, LogLevel, ConsoleLogger, NoopLogger } from '../observability/logging';

/**
 * Options for creating a FairOS-dfs client.
 */
export interface FairOSClientOptions extends FairOSConfigOptions {
  /** Logger instance. */
  logger?: Logger;
  /** Session store; each client gets its own in-memory store by default. */
  sessions?: SessionStore;
  /** Custom transport (for testing). */
  transport?: HttpTransport;
}

/**
 * Main FairOS-dfs client.
 *
 * @example
 * ```typescript
 * const client = FairOSClient.builder().baseUrl('http://localhost:9090/v1').build();
 * await client.user.login('alice', 'test-secret');
 * const { pods } = await client.pod.list('alice');
 * ```
 */
export class FairOSClient {
  /** User accounts and sessions. */
  readonly user: UserService;
  /** Pods. */
  readonly pod: PodService;
  /** Directories and files. */
  readonly fs: FileSystemService;
  /** Key-value stores. */
  readonly kv: KeyValueService;
  /** Document databases. */
  readonly doc: DocumentService;

  private readonly config: FairOSConfig;
  private readonly transport: HttpTransport;
  private readonly executor: RequestExecutor;
  private readonly sessions: SessionStore;
  private readonly logger: Logger;

  constructor(options: FairOSClientOptions = {}) {
    const { logger, sessions, transport, ...configOptions } = options;
    this.config = FairOSConfig.fromOptions(configOptions);

    this.logger = logger ?? new NoopLogger();
    this.sessions = sessions ?? new InMemorySessionStore();
    this.transport = transport ?? new AxiosTransport(this.config);
    this.executor = new RequestExecutor(this.config, this.transport, this.logger);

    const context: ServiceContext = {
      executor: this.executor,
      sessions: this.sessions,
      logger: this.logger,
    };
    this.user = new DefaultUserService(context);
    this.pod = new DefaultPodService(context);
    this.fs = new DefaultFileSystemService(context);
    this.kv = new DefaultKeyValueService(context);
    this.doc = new DefaultDocumentService(context);
  }

  /**
   * Gets the configuration.
   */
  getConfig(): FairOSConfig {
    return this.config;
  }

  /**
   * Gets the logger.
   */
  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Gets the session store.
   */
  getSessions(): SessionStore {
    return this.sessions;
  }

  /**
   * Gets the request executor, for endpoints the services do not cover.
   */
  getExecutor(): RequestExecutor {
    return this.executor;
  }

  /**
   * Releases pooled connections.
   */
  async close(): Promise<void> {
    await this.transport.close?.();
  }

  /**
   * Creates a new client builder.
   */
  static builder(): FairOSClientBuilder {
    return new FairOSClientBuilder();
  }

  /**
   * Creates a client from `FAIROS_*` environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): FairOSClient {
    const config = FairOSConfig.fromEnv(env);
    return new FairOSClient({
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      sessionCookieName: config.sessionCookieName,
    });
  }
}

/**
 * Builder for creating FairOSClient instances.
 */
export class FairOSClientBuilder {
  private options: FairOSClientOptions = {};

  /**
   * Sets the base URL, e.g. `http://localhost:9090/v1`.
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
   * Sets the timeout in seconds.
   */
  timeoutSecs(secs: number): this {
    this.options.timeout = secs * 1000;
    return this;
  }

  /**
   * Sets the session cookie name.
   */
  sessionCookieName(name: string): this {
    this.options.sessionCookieName = name;
    return this;
  }

  /**
   * Sets the idle connection pool bounds.
   */
  pool(maxIdleSockets: number, idleTimeout?: number): this {
    this.options.maxIdleSockets = maxIdleSockets;
    if (idleTimeout !== undefined) {
      this.options.idleTimeout = idleTimeout;
    }
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
   * Sets the session store.
   */
  sessions(store: SessionStore): this {
    this.options.sessions = store;
    return this;
  }

  /**
   * Sets a custom transport (for testing).
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  /**
   * Builds the client.
   */
  build(): FairOSClient {
    return new FairOSClient(this.options);
  }
}
