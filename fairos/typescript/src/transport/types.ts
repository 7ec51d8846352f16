/**
 * Transport types shared by the HTTP transport and the request executor.
 */

import type { FairOSError } from '../errors';

/** HTTP methods used by the FairOS-dfs API. */
export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Raw HTTP request handed to a transport. The URL is final: transports must not
 * re-encode it.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
  signal?: AbortSignal;
}

/**
 * Raw HTTP response. Header names are lower-case; `set-cookie` keeps every
 * value.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string | string[]>;
  body: Buffer;
}

/**
 * HTTP transport interface.
 *
 * Implementations resolve with any status code the server answers with and
 * reject only when no response was received: `TransportUnreachable` for
 * connection failures and timeouts, `Aborted` when the signal fired.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  close?(): Promise<void>;
}

/** Query parameters, in the order they are written to the URL. */
export type QueryParams = ReadonlyArray<readonly [string, string]> | Readonly<Record<string, string>>;

/** Pre-encoded multipart body. */
export interface EncodedMultipart {
  boundary: string;
  body: Buffer;
}

export type RequestBody =
  | { type: 'json'; value: unknown }
  | { type: 'multipart'; multipart: EncodedMultipart };

/**
 * A request as the executor sees it.
 */
export interface ApiRequest {
  method: HttpMethod;
  /** Path below the base URL, e.g. `/kv/seek/next`. */
  path: string;
  /** Values are written verbatim; callers pre-encode where the endpoint needs it. */
  query?: QueryParams;
  body?: RequestBody;
  /** Session token sent as the session cookie. */
  token?: string;
  /** Extra headers, e.g. the upload compression header. */
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Classified result of executing a request.
 */
export type RequestOutcome =
  | {
      kind: 'success';
      status: number;
      body: Buffer;
      /** Refreshed session token; only ever present for POST. */
      sessionToken?: string;
    }
  | { kind: 'unreachable'; error: FairOSError }
  | { kind: 'rejected'; status: number; message: string; code: number };

/**
 * Common per-call options.
 */
export interface CallOptions {
  token?: string;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * Returns true for 2xx statuses.
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
