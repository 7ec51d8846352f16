/**
 * Tests for the axios transport, driven through an in-process adapter.
 */

import { AxiosError } from 'axios';
import type { AxiosAdapter, InternalAxiosRequestConfig, RawAxiosResponseHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import { FairOSConfig } from '../config';
import { FairOSErrorCode } from '../errors';
import { AxiosTransport } from '../transport';
import { rejectionOf } from './helpers';

const config = FairOSConfig.builder()
  .baseUrl('http://dfs.test/v1')
  .header('X-Client', 'fairos-tests')
  .build();

function respondingWith(
  status: number,
  body: string,
  headers: RawAxiosResponseHeaders = {}
): { adapter: AxiosAdapter; seen: InternalAxiosRequestConfig[] } {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (request) => {
    seen.push(request);
    return {
      data: Buffer.from(body, 'utf-8'),
      status,
      statusText: String(status),
      headers,
      config: request,
    };
  };
  return { adapter, seen };
}

describe('AxiosTransport', () => {
  it('passes the request through untouched', async () => {
    const { adapter, seen } = respondingWith(200, '{"message":"ok","code":200}');
    const transport = new AxiosTransport(config, { adapter });

    await transport.send({
      method: 'POST',
      url: 'http://dfs.test/v1/doc/count?expr=age%3e30',
      headers: { 'Content-Type': 'application/json' },
      body: Buffer.from('{}'),
    });

    const [request] = seen;
    expect(request?.url).toBe('http://dfs.test/v1/doc/count?expr=age%3e30');
    expect(request?.method).toBe('post');
    expect(request?.headers.get('X-Client')).toBe('fairos-tests');
    await transport.close();
  });

  it('resolves with error statuses and raw bytes', async () => {
    const { adapter } = respondingWith(400, '{"message":"pod not open","code":400}', {
      'Content-Type': 'application/json',
    });
    const transport = new AxiosTransport(config, { adapter });

    const response = await transport.send({
      method: 'GET',
      url: 'http://dfs.test/v1/pod/stat',
      headers: {},
    });

    expect(response.status).toBe(400);
    expect(response.body.toString('utf-8')).toBe('{"message":"pod not open","code":400}');
    expect(response.headers['content-type']).toBe('application/json');
    await transport.close();
  });

  it('keeps every set-cookie value', async () => {
    const { adapter } = respondingWith(200, '{}', {
      'set-cookie': ['other=1; Path=/', 'fairOS-dfs=tok-1; Path=/; HttpOnly'],
    });
    const transport = new AxiosTransport(config, { adapter });

    const response = await transport.send({
      method: 'POST',
      url: 'http://dfs.test/v1/user/login',
      headers: {},
    });

    expect(response.headers['set-cookie']).toEqual([
      'other=1; Path=/',
      'fairOS-dfs=tok-1; Path=/; HttpOnly',
    ]);
    await transport.close();
  });

  it('reports connection failures as unreachable', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:9090', 'ECONNREFUSED');
    };
    const transport = new AxiosTransport(config, { adapter });

    const error = await rejectionOf(
      transport.send({ method: 'GET', url: 'http://dfs.test/v1/pod/ls', headers: {} })
    );

    expect(error.code).toBe(FairOSErrorCode.TransportUnreachable);
    expect(error.message).toBe('Could not connect: connect ECONNREFUSED 127.0.0.1:9090');
    await transport.close();
  });

  it('reports timeouts as unreachable', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED');
    };
    const transport = new AxiosTransport(config, { adapter });

    const error = await rejectionOf(
      transport.send({ method: 'GET', url: 'http://dfs.test/v1/pod/ls', headers: {} })
    );

    expect(error.code).toBe(FairOSErrorCode.TransportUnreachable);
    expect(error.message).toBe('Request timed out after 60000ms');
    await transport.close();
  });
});
