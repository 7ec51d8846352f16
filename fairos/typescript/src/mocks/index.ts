/**
 * Mock infrastructure for testing.
 */

import { FairOSError } from '../errors';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport';

/**
 * Recorded request for verification.
 */
export interface RecordedRequest {
  /** The request that was made. */
  request: HttpRequest;
  /** Path of the request URL, without the query string. */
  path: string;
  /** Query parameters as sent, undecoded. */
  query: string;
  /** Timestamp of the request. */
  timestamp: Date;
}

/**
 * Mock response configuration.
 */
export interface MockResponse {
  /** HTTP status code. */
  status: number;
  /** Response headers. */
  headers?: Record<string, string | string[]>;
  /** Raw response body. */
  body?: Buffer;
  /** Optional delay in milliseconds. */
  delay?: number;
  /** Optional error to throw instead of answering. */
  error?: Error;
}

/**
 * Mock transport for testing.
 *
 * Responses are queued per path suffix; the last queued response for a path
 * keeps answering once the others are used up.
 */
export class MockTransport implements HttpTransport {
  private readonly responses: Map<string, MockResponse[]> = new Map();
  private readonly defaultResponse: MockResponse;
  private readonly recordedRequests: RecordedRequest[] = [];
  closed = false;

  constructor(defaultResponse?: MockResponse) {
    this.defaultResponse = defaultResponse ?? jsonResponse({ message: 'ok', code: 200 });
  }

  /**
   * Configures a response for requests whose path ends with `path`.
   */
  onPath(path: string, response: MockResponse): this {
    const existing = this.responses.get(path) ?? [];
    existing.push(response);
    this.responses.set(path, existing);
    return this;
  }

  /**
   * Clears all configured responses.
   */
  clearResponses(): this {
    this.responses.clear();
    return this;
  }

  /**
   * Gets recorded requests.
   */
  getRecordedRequests(): RecordedRequest[] {
    return [...this.recordedRequests];
  }

  /**
   * Gets the most recent request, throwing when there is none.
   */
  lastRequest(): RecordedRequest {
    const last = this.recordedRequests[this.recordedRequests.length - 1];
    if (!last) {
      throw new Error('No requests recorded');
    }
    return last;
  }

  /**
   * Clears recorded requests.
   */
  clearRecordedRequests(): this {
    this.recordedRequests.length = 0;
    return this;
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const [path = '', query = ''] = req.url.split('?', 2);
    this.recordedRequests.push({ request: req, path, query, timestamp: new Date() });

    const response = this.getNextResponse(path);

    if (response.delay) {
      await this.sleep(response.delay);
    }

    if (req.signal?.aborted) {
      throw FairOSError.aborted();
    }

    if (response.error) {
      throw response.error;
    }

    return {
      status: response.status,
      headers: response.headers ?? {},
      body: response.body ?? Buffer.alloc(0),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private getNextResponse(path: string): MockResponse {
    let responses: MockResponse[] | undefined;
    let matched = -1;
    for (const [key, queued] of this.responses) {
      if (path.endsWith(key) && key.length > matched) {
        responses = queued;
        matched = key.length;
      }
    }
    if (!responses || responses.length === 0) {
      return this.defaultResponse;
    }

    if (responses.length > 1) {
      return responses.shift() ?? this.defaultResponse;
    }
    return responses[0] ?? this.defaultResponse;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Creates a JSON response.
 */
export function jsonResponse(
  data: unknown,
  status = 200,
  headers: Record<string, string | string[]> = {}
): MockResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: Buffer.from(JSON.stringify(data), 'utf-8'),
  };
}

/**
 * Creates an error envelope response.
 */
export function errorResponse(status: number, message: string, code = status): MockResponse {
  return jsonResponse({ message, code }, status);
}

/**
 * Creates a raw binary response.
 */
export function binaryResponse(body: Buffer, status = 200): MockResponse {
  return { status, headers: { 'content-type': 'application/octet-stream' }, body };
}

/**
 * Creates a response that fails as if the server could not be reached.
 */
export function unreachableResponse(message = 'Could not connect: connect ECONNREFUSED'): MockResponse {
  return { status: 0, error: FairOSError.unreachable(message) };
}

/**
 * Creates a successful response that sets the session cookie.
 */
export function sessionResponse(
  data: unknown,
  token: string,
  cookieName = 'fairOS-dfs'
): MockResponse {
  return jsonResponse(data, 200, { 'set-cookie': [`${cookieName}=${token}; Path=/; HttpOnly`] });
}
