/**
 * HTTP transport backed by axios with keep-alive connection pooling.
 */

import http from 'http';
import https from 'https';
import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { FairOSConfig } from '../config';
import { FairOSError } from '../errors';
import type { HttpRequest, HttpResponse, HttpTransport } from './types';

/**
 * Options for the axios transport.
 */
export interface AxiosTransportOptions {
  /** Replaces the network adapter, e.g. with an in-process handler in tests. */
  adapter?: AxiosAdapter;
}

/**
 * Default HTTP transport using axios.
 *
 * Status codes are not interpreted here; every response the server sends is
 * returned, and classification is left to the executor.
 */
export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly config: FairOSConfig;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(config: FairOSConfig, options: AxiosTransportOptions = {}) {
    this.config = config;

    const agentOptions = {
      keepAlive: true,
      maxFreeSockets: config.maxIdleSockets,
      timeout: config.idleTimeout,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.client = axios.create({
      timeout: config.timeout,
      headers: { ...config.customHeaders },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: 'arraybuffer',
      // Keep response bytes untouched; JSON decoding happens in the executor.
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      maxRedirects: 0,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    try {
      const response: AxiosResponse<unknown> = await this.client.request({
        method: req.method,
        url: req.url,
        headers: req.headers,
        data: req.body,
        signal: req.signal,
      });

      return {
        status: response.status,
        headers: this.normalizeHeaders(response.headers),
        body: toBuffer(response.data),
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private handleError(error: unknown): FairOSError {
    if (error instanceof FairOSError) {
      return error;
    }
    if (axios.isCancel(error)) {
      return FairOSError.aborted();
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return FairOSError.unreachable(
          `Request timed out after ${this.config.timeout}ms`,
          error
        );
      }
      return FairOSError.unreachable(`Could not connect: ${error.message}`, error);
    }
    return FairOSError.unreachable(
      error instanceof Error ? error.message : 'Unknown network error',
      error instanceof Error ? error : undefined
    );
  }

  private normalizeHeaders(headers: object): Record<string, string | string[]> {
    const result: Record<string, string | string[]> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        result[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        result[key.toLowerCase()] = value.map(String);
      } else if (typeof value === 'number') {
        result[key.toLowerCase()] = String(value);
      }
    }
    return result;
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  if (data === undefined || data === null) {
    return Buffer.alloc(0);
  }
  throw FairOSError.decode(`Unexpected response body type: ${typeof data}`);
}

/**
 * Creates an HTTP transport.
 */
export function createTransport(
  config: FairOSConfig,
  options?: AxiosTransportOptions
): HttpTransport {
  return new AxiosTransport(config, options);
}
