/**
 * FairOS-dfs Client Library
 *
 * A TypeScript client for the FairOS-dfs decentralised file system API:
 * user accounts, pods, files, key-value stores and document databases, with
 * cookie-based sessions kept per username.
 *
 * @example
 * ```typescript
 * import { FairOSClient, Expr, Value } from 'fairos-dfs-client';
 *
 * const client = FairOSClient.builder().baseUrl('http://localhost:9090/v1').build();
 *
 * await client.user.login('alice', 'test-secret');
 * await client.pod.open('alice', 'notes', 'test-secret');
 *
 * const adults = await client.doc.find('alice', 'notes', 'people', Expr.gte('age', Value.number(18)));
 * ```
 */

// Client
export { FairOSClient, FairOSClientBuilder } from './client';
export type { FairOSClientOptions } from './client';

// Config
export {
  FairOSConfig,
  FairOSConfigBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_SESSION_COOKIE_NAME,
} from './config';
export type { FairOSConfigOptions } from './config';

// Errors
export {
  FairOSError,
  FairOSErrorCode,
  isFairOSError,
  isRetryableError,
  mapRemoteError,
  REMOTE_MESSAGE_TABLE,
} from './errors';
export type { FairOSErrorDetails, ErrorDomain, DomainErrorKind } from './errors';

// Types
export { BlockSize } from './types';
export type {
  BlockSizeUnit,
  SignupResult,
  UserExport,
  UserInfo,
  PodList,
  PodInfo,
  SharedPodInfo,
  Compression,
  DirEntry,
  FileEntry,
  DirListing,
  DirInfo,
  FileBlock,
  FileInfo,
  SharedFileInfo,
  UploadOptions,
  IndexType,
  KeyValueStore,
  SeekOptions,
  SizeHint,
  FieldType,
  FieldDefinition,
  DocumentDatabase,
} from './types';

// Query
export { Expr, Value, compileExpression } from './query';
export type { ExprValue, ComparisonOp } from './query';

// Services
export type {
  UserService,
  PodService,
  FileSystemService,
  UploadFile,
  KeyValueService,
  DocumentService,
  Document,
} from './services';
export { KeyValueSeek, SEEK_END_MESSAGE, COMPRESSION_HEADER } from './services';

// Session
export type { SessionStore } from './session';
export { InMemorySessionStore, createSessionStore } from './session';

// Transport
export type {
  HttpTransport,
  HttpRequest,
  HttpResponse,
  ApiRequest,
  RequestOutcome,
  CallOptions,
  QueryParams,
  EncodedMultipart,
} from './transport';
export { AxiosTransport, RequestExecutor, MessageResponseSchema } from './transport';

// Multipart
export type { ByteSource, StreamPart, EncodeOptions } from './multipart';
export { MultipartBuilder, encodeMultipart, guessContentType } from './multipart';

// Observability
export type { LogConfig, Logger, LogSink } from './observability';
export { LogLevel, ConsoleLogger, NoopLogger, createLogger } from './observability';

// Mocks
export {
  MockTransport,
  jsonResponse,
  errorResponse,
  binaryResponse,
  unreachableResponse,
  sessionResponse,
} from './mocks';
export type { MockResponse, RecordedRequest } from './mocks';

// Simulation
export { FairOSSimulator } from './simulation';
