/**
 * Request executor: turns API requests into HTTP calls and classifies the
 * answers.
 */

import { z } from 'zod';
import { FairOSConfig } from '../config';
import { FairOSError, FairOSErrorCode } from '../errors';
import { Logger, NoopLogger } from '../observability';
import { extractSessionToken, formatSessionCookie } from './cookies';
import {
  ApiRequest,
  CallOptions,
  EncodedMultipart,
  HttpResponse,
  HttpTransport,
  QueryParams,
  RequestOutcome,
  isSuccessStatus,
} from './types';

/**
 * Error envelope the server sends with every non-2xx status.
 */
export const MessageResponseSchema = z.object({
  message: z.string(),
  code: z.number(),
});

export type MessageResponse = z.infer<typeof MessageResponseSchema>;

/** Schema of a success body, with any input shape. */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Joins query pairs as `k=v&k=v` without encoding anything.
 */
export function buildQueryString(query: QueryParams | undefined): string {
  if (query === undefined) {
    return '';
  }
  const pairs: ReadonlyArray<readonly [string, string]> = isPairList(query)
    ? query
    : Object.entries(query);
  return pairs.map(([key, value]) => `${key}=${value}`).join('&');
}

function isPairList(query: QueryParams): query is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(query);
}

/**
 * Executes requests against the FairOS-dfs API.
 */
export class RequestExecutor {
  private readonly config: FairOSConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: FairOSConfig, transport: HttpTransport, logger: Logger = new NoopLogger()) {
    this.config = config;
    this.transport = transport;
    this.logger = logger.child({ component: 'executor' });
  }

  /**
   * Sends the request and classifies the response.
   *
   * Resolves with `unreachable` when no response arrived and `rejected` for
   * non-2xx statuses. Rejects with `Aborted` when the signal fires and with
   * `DecodeFailed` when a non-2xx body is not an error envelope.
   */
  async execute(request: ApiRequest): Promise<RequestOutcome> {
    const url = this.config.getEndpointUrl(request.path, buildQueryString(request.query));
    const headers: Record<string, string> = { ...request.headers };
    let body: Buffer | undefined;

    if (request.body?.type === 'json') {
      headers['Content-Type'] = 'application/json';
      body = Buffer.from(JSON.stringify(request.body.value), 'utf-8');
    } else if (request.body?.type === 'multipart') {
      headers['Content-Type'] = `multipart/form-data; boundary=${request.body.multipart.boundary}`;
      body = request.body.multipart.body;
    }

    if (request.token !== undefined) {
      headers['Cookie'] = formatSessionCookie(this.config.sessionCookieName, request.token);
    }

    const started = Date.now();
    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: request.method,
        url,
        headers,
        body,
        signal: request.signal,
      });
    } catch (error) {
      if (error instanceof FairOSError && error.code === FairOSErrorCode.TransportUnreachable) {
        this.logger.warn('Server unreachable', {
          method: request.method,
          path: request.path,
          reason: error.message,
        });
        return { kind: 'unreachable', error };
      }
      throw error;
    }

    this.logger.debug('Request completed', {
      method: request.method,
      path: request.path,
      status: response.status,
      durationMs: Date.now() - started,
    });

    if (!isSuccessStatus(response.status)) {
      const envelope = decodeJson(response.body, MessageResponseSchema, request.path);
      return {
        kind: 'rejected',
        status: response.status,
        message: envelope.message,
        code: envelope.code,
      };
    }

    const sessionToken =
      request.method === 'POST'
        ? extractSessionToken(response.headers['set-cookie'], this.config.sessionCookieName)
        : undefined;

    return { kind: 'success', status: response.status, body: response.body, sessionToken };
  }

  /**
   * GET with query parameters, decoding the JSON success body.
   */
  async get<T>(
    path: string,
    query: QueryParams,
    schema: ResponseSchema<T>,
    options: CallOptions = {}
  ): Promise<T> {
    const outcome = await this.execute({ method: 'GET', path, query, ...options });
    return decodeJson(unwrap(outcome).body, schema, path);
  }

  /**
   * POST with a JSON body. Resolves the decoded body and, when the server set
   * one, the refreshed session token.
   */
  async post<T>(
    path: string,
    body: unknown,
    schema: ResponseSchema<T>,
    options: CallOptions = {}
  ): Promise<{ data: T; sessionToken?: string }> {
    const outcome = await this.execute({
      method: 'POST',
      path,
      body: body === undefined ? undefined : { type: 'json', value: body },
      ...options,
    });
    const success = unwrap(outcome);
    return { data: decodeJson(success.body, schema, path), sessionToken: success.sessionToken };
  }

  /**
   * DELETE with a JSON body.
   */
  async delete<T>(
    path: string,
    body: unknown,
    schema: ResponseSchema<T>,
    options: CallOptions = {}
  ): Promise<T> {
    const outcome = await this.execute({
      method: 'DELETE',
      path,
      body: { type: 'json', value: body },
      ...options,
    });
    return decodeJson(unwrap(outcome).body, schema, path);
  }

  /**
   * POST a multipart body, decoding the JSON success body.
   */
  async postMultipart<T>(
    path: string,
    multipart: EncodedMultipart,
    schema: ResponseSchema<T>,
    options: CallOptions = {}
  ): Promise<T> {
    const outcome = await this.execute({
      method: 'POST',
      path,
      body: { type: 'multipart', multipart },
      ...options,
    });
    return decodeJson(unwrap(outcome).body, schema, path);
  }

  /**
   * POST a multipart body and return the raw response bytes. The success body
   * is never JSON-decoded.
   */
  async download(
    path: string,
    multipart: EncodedMultipart,
    options: CallOptions = {}
  ): Promise<Buffer> {
    const outcome = await this.execute({
      method: 'POST',
      path,
      body: { type: 'multipart', multipart },
      ...options,
    });
    return unwrap(outcome).body;
  }
}

/**
 * Returns the success branch or throws the matching error.
 */
export function unwrap(
  outcome: RequestOutcome
): Extract<RequestOutcome, { kind: 'success' }> {
  switch (outcome.kind) {
    case 'success':
      return outcome;
    case 'unreachable':
      throw outcome.error;
    case 'rejected':
      throw FairOSError.rejected(outcome.message, outcome.code, outcome.status);
  }
}

/**
 * Parses a JSON body and validates it against the schema.
 */
export function decodeJson<T>(body: Buffer, schema: ResponseSchema<T>, path: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf-8'));
  } catch (error) {
    throw FairOSError.decode(
      `Response from ${path} is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw FairOSError.decode(
      `Response from ${path} has an unexpected shape${where}: ${issue?.message ?? 'invalid'}`,
      result.error
    );
  }
  return result.data;
}
