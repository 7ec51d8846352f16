import { describe, expect, it } from 'vitest';
import { FairOSClient } from '../client';
import { FairOSErrorCode } from '../errors';
import { MockTransport } from '../mocks';
import { ConsoleLogger, NoopLogger } from '../observability';
import { InMemorySessionStore } from '../session';
import { errorOf } from './helpers';

describe('FairOSClient', () => {
  it('applies builder options to the configuration', () => {
    const client = FairOSClient.builder()
      .baseUrl('http://dfs.internal:9090/v1')
      .timeoutSecs(5)
      .sessionCookieName('dfs-session')
      .pool(4, 1000)
      .header('X-Client', 'tests')
      .transport(new MockTransport())
      .build();

    const config = client.getConfig();
    expect(config.baseUrl).toBe('http://dfs.internal:9090/v1');
    expect(config.timeout).toBe(5000);
    expect(config.sessionCookieName).toBe('dfs-session');
    expect(config.maxIdleSockets).toBe(4);
    expect(config.idleTimeout).toBe(1000);
    expect(config.customHeaders).toEqual({ 'X-Client': 'tests' });
  });

  it('sends requests under the configured base URL and cookie name', async () => {
    const transport = new MockTransport();
    const client = FairOSClient.builder()
      .baseUrl('http://dfs.internal:9090/v1')
      .sessionCookieName('dfs-session')
      .transport(transport)
      .build();
    client.getSessions().set('alice', 'tok');

    await client.pod.sync('alice', 'photos');

    const { request } = transport.lastRequest();
    expect(request.url).toBe('http://dfs.internal:9090/v1/pod/sync');
    expect(request.headers['Cookie']).toBe('dfs-session=tok');
  });

  it('rejects an invalid configuration when building', () => {
    const error = errorOf(() => FairOSClient.builder().timeout(-1).build());

    expect(error.code).toBe(FairOSErrorCode.Configuration);
  });

  it('uses a silent logger and a private session store by default', () => {
    const first = FairOSClient.builder().transport(new MockTransport()).build();
    const second = FairOSClient.builder().transport(new MockTransport()).build();

    first.getSessions().set('alice', 'tok');

    expect(first.getLogger()).toBeInstanceOf(NoopLogger);
    expect(second.getSessions().get('alice')).toBeUndefined();
  });

  it('shares a session store passed in', () => {
    const sessions = new InMemorySessionStore();
    const client = FairOSClient.builder()
      .sessions(sessions)
      .transport(new MockTransport())
      .build();

    sessions.set('alice', 'tok');

    expect(client.getSessions().get('alice')).toBe('tok');
  });

  it('enables console logging', () => {
    const client = FairOSClient.builder()
      .withConsoleLogging()
      .transport(new MockTransport())
      .build();

    expect(client.getLogger()).toBeInstanceOf(ConsoleLogger);
  });

  it('closes its transport', async () => {
    const transport = new MockTransport();
    const client = FairOSClient.builder().transport(transport).build();

    await client.close();

    expect(transport.closed).toBe(true);
  });

  it('reads its settings from the environment', async () => {
    const client = FairOSClient.fromEnv({
      FAIROS_BASE_URL: 'https://dfs.example.com/v1',
      FAIROS_TIMEOUT: '1500',
      FAIROS_COOKIE_NAME: 'dfs-session',
    });

    const config = client.getConfig();
    expect(config.baseUrl).toBe('https://dfs.example.com/v1');
    expect(config.timeout).toBe(1500);
    expect(config.sessionCookieName).toBe('dfs-session');
    await client.close();
  });
});
