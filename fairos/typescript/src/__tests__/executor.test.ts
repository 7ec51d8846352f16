/**
 * Tests for the request executor.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FairOSConfig } from '../config';
import { FairOSErrorCode } from '../errors';
import {
  MockTransport,
  binaryResponse,
  errorResponse,
  jsonResponse,
  sessionResponse,
  unreachableResponse,
} from '../mocks';
import { MessageResponseSchema, RequestExecutor, buildQueryString } from '../transport';
import { RecordingLogger, rejectionOf } from './helpers';

const PresentSchema = z.object({ present: z.boolean() });

describe('buildQueryString', () => {
  it('joins pairs in order without encoding', () => {
    expect(
      buildQueryString([
        ['pod_name', 'my pod'],
        ['expr', 'age%3e30'],
      ])
    ).toBe('pod_name=my pod&expr=age%3e30');
  });

  it('accepts records', () => {
    expect(buildQueryString({ user_name: 'alice' })).toBe('user_name=alice');
    expect(buildQueryString({})).toBe('');
    expect(buildQueryString(undefined)).toBe('');
  });
});

describe('RequestExecutor', () => {
  let transport: MockTransport;
  let executor: RequestExecutor;
  let logger: RecordingLogger;

  beforeEach(() => {
    transport = new MockTransport();
    logger = new RecordingLogger();
    executor = new RequestExecutor(
      FairOSConfig.fromOptions({ baseUrl: 'http://dfs.test/v1' }),
      transport,
      logger
    );
  });

  describe('execute', () => {
    it('classifies 2xx answers as success', async () => {
      transport.onPath('/pod/ls', jsonResponse({ pod_name: [] }, 200));

      const outcome = await executor.execute({ method: 'GET', path: '/pod/ls' });

      expect(outcome.kind).toBe('success');
      if (outcome.kind === 'success') {
        expect(outcome.status).toBe(200);
        expect(outcome.body.toString('utf-8')).toBe('{"pod_name":[]}');
      }
    });

    it('classifies non-2xx answers as rejected with the envelope', async () => {
      transport.onPath('/pod/open', errorResponse(400, 'pod open: invalid password'));

      const outcome = await executor.execute({ method: 'POST', path: '/pod/open' });

      expect(outcome).toEqual({
        kind: 'rejected',
        status: 400,
        message: 'pod open: invalid password',
        code: 400,
      });
    });

    it('classifies transport failures as unreachable and logs them', async () => {
      transport.onPath('/user/stat', unreachableResponse());

      const outcome = await executor.execute({ method: 'GET', path: '/user/stat' });

      expect(outcome.kind).toBe('unreachable');
      if (outcome.kind === 'unreachable') {
        expect(outcome.error.code).toBe(FairOSErrorCode.TransportUnreachable);
      }
      expect(logger.entries.map((entry) => entry.message)).toContain('Server unreachable');
    });

    it('fails to decode a rejection without an envelope', async () => {
      transport.onPath('/kv/ls', { status: 502, body: Buffer.from('Bad Gateway') });

      const error = await rejectionOf(executor.execute({ method: 'GET', path: '/kv/ls' }));

      expect(error.code).toBe(FairOSErrorCode.DecodeFailed);
      expect(error.message).toBe('Response from /kv/ls is not valid JSON');
    });

    it('writes the query verbatim', async () => {
      await executor.execute({
        method: 'GET',
        path: '/doc/find',
        query: [
          ['pod_name', 'my pod'],
          ['expr', 'age%3e30'],
        ],
      });

      expect(transport.lastRequest().request.url).toBe(
        'http://dfs.test/v1/doc/find?pod_name=my pod&expr=age%3e30'
      );
    });

    it('sends the session cookie', async () => {
      await executor.execute({ method: 'GET', path: '/user/stat', token: 'tok-1' });

      expect(transport.lastRequest().request.headers['Cookie']).toBe('fairOS-dfs=tok-1');
    });

    it('encodes JSON bodies', async () => {
      await executor.execute({
        method: 'POST',
        path: '/pod/new',
        body: { type: 'json', value: { pod_name: 'photos' } },
      });

      const { request } = transport.lastRequest();
      expect(request.headers['Content-Type']).toBe('application/json');
      expect(request.body?.toString('utf-8')).toBe('{"pod_name":"photos"}');
    });

    it('sets the multipart content type from the boundary', async () => {
      await executor.execute({
        method: 'POST',
        path: '/file/upload',
        body: { type: 'multipart', multipart: { boundary: 'XYZ', body: Buffer.from('--XYZ--\r\n') } },
      });

      expect(transport.lastRequest().request.headers['Content-Type']).toBe(
        'multipart/form-data; boundary=XYZ'
      );
    });

    it('extracts the session cookie from POST answers only', async () => {
      transport.onPath('/user/login', sessionResponse({ message: 'ok', code: 200 }, 'tok-2'));
      transport.onPath('/user/stat', sessionResponse({ user_name: 'a', address: '0x' }, 'tok-3'));

      const post = await executor.execute({ method: 'POST', path: '/user/login' });
      const get = await executor.execute({ method: 'GET', path: '/user/stat' });

      expect(post.kind === 'success' && post.sessionToken).toBe('tok-2');
      expect(get.kind === 'success' && get.sessionToken).toBeUndefined();
    });

    it('rejects with Aborted when the signal has fired', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await rejectionOf(
        executor.execute({ method: 'GET', path: '/pod/ls', signal: controller.signal })
      );

      expect(error.code).toBe(FairOSErrorCode.Aborted);
    });
  });

  describe('typed helpers', () => {
    it('decodes GET bodies against the schema', async () => {
      transport.onPath('/user/present', jsonResponse({ present: true }));

      await expect(executor.get('/user/present', { user_name: 'alice' }, PresentSchema)).resolves.toEqual({
        present: true,
      });
    });

    it('reports where a body has the wrong shape', async () => {
      transport.onPath('/user/present', jsonResponse({ present: 'yes' }));

      const error = await rejectionOf(executor.get('/user/present', {}, PresentSchema));

      expect(error.code).toBe(FairOSErrorCode.DecodeFailed);
      expect(error.message.startsWith('Response from /user/present has an unexpected shape at present')).toBe(
        true
      );
    });

    it('throws RemoteRejected for rejections', async () => {
      transport.onPath('/pod/new', errorResponse(400, 'pod new: pod already exists'));

      const error = await rejectionOf(
        executor.post('/pod/new', { pod_name: 'photos' }, MessageResponseSchema)
      );

      expect(error.code).toBe(FairOSErrorCode.RemoteRejected);
      expect(error.details.remoteMessage).toBe('pod new: pod already exists');
      expect(error.details.statusCode).toBe(400);
    });

    it('throws TransportUnreachable when the server is down', async () => {
      transport.onPath('/pod/ls', unreachableResponse());

      const error = await rejectionOf(executor.get('/pod/ls', {}, MessageResponseSchema));

      expect(error.code).toBe(FairOSErrorCode.TransportUnreachable);
    });

    it('returns download bodies without decoding', async () => {
      const bytes = Buffer.from([0x00, 0xff, 0x7b]);
      transport.onPath('/file/download', binaryResponse(bytes));

      const body = await executor.download('/file/download', { boundary: 'B', body: Buffer.from('--B--\r\n') });

      expect(body.equals(bytes)).toBe(true);
    });

    it('sends DELETE with a JSON body', async () => {
      await executor.delete('/pod/delete', { pod_name: 'photos' }, MessageResponseSchema);

      const { request } = transport.lastRequest();
      expect(request.method).toBe('DELETE');
      expect(request.body?.toString('utf-8')).toBe('{"pod_name":"photos"}');
    });

    it('sends POST without a body when none is given', async () => {
      await executor.post('/user/logout', undefined, MessageResponseSchema, { token: 't' });

      const { request } = transport.lastRequest();
      expect(request.body).toBeUndefined();
      expect(request.headers['Content-Type']).toBeUndefined();
    });
  });
});
