/**
 * Tests for FairOS configuration.
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_BASE_URL,
  DEFAULT_SESSION_COOKIE_NAME,
  DEFAULT_TIMEOUT_MS,
  FairOSConfig,
} from '../config';
import { FairOSErrorCode } from '../errors';
import { errorOf } from './helpers';

describe('FairOSConfig', () => {
  describe('fromOptions', () => {
    it('applies defaults', () => {
      const config = FairOSConfig.fromOptions();

      expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
      expect(config.timeout).toBe(DEFAULT_TIMEOUT_MS);
      expect(config.sessionCookieName).toBe(DEFAULT_SESSION_COOKIE_NAME);
      expect(config.sessionCookieName).toBe('fairOS-dfs');
      expect(config.customHeaders).toEqual({});
    });

    it('strips a trailing slash from the base URL', () => {
      const config = FairOSConfig.fromOptions({ baseUrl: 'http://dfs.test:9090/v1/' });
      expect(config.baseUrl).toBe('http://dfs.test:9090/v1');
    });

    it('rejects non-http base URLs', () => {
      const error = errorOf(() => FairOSConfig.fromOptions({ baseUrl: 'ftp://dfs.test/v1' }));
      expect(error.code).toBe(FairOSErrorCode.Configuration);
      expect(error.message).toBe('Invalid baseUrl: Base URL must use http or https');
    });

    it('rejects non-positive timeouts', () => {
      const error = errorOf(() => FairOSConfig.fromOptions({ timeout: 0 }));
      expect(error.code).toBe(FairOSErrorCode.Configuration);
      expect(error.message.startsWith('Invalid timeout:')).toBe(true);
    });

    it('rejects an empty cookie name', () => {
      const error = errorOf(() => FairOSConfig.fromOptions({ sessionCookieName: '' }));
      expect(error.message).toBe('Invalid sessionCookieName: Session cookie name cannot be empty');
    });
  });

  describe('getEndpointUrl', () => {
    const config = FairOSConfig.fromOptions({ baseUrl: 'http://dfs.test/v1' });

    it('joins paths and raw query strings', () => {
      expect(config.getEndpointUrl('/kv/ls', 'pod_name=a b')).toBe(
        'http://dfs.test/v1/kv/ls?pod_name=a b'
      );
    });

    it('omits an empty query', () => {
      expect(config.getEndpointUrl('pod/ls')).toBe('http://dfs.test/v1/pod/ls');
    });
  });

  describe('fromEnv', () => {
    it('reads FAIROS_* variables', () => {
      const config = FairOSConfig.fromEnv({
        FAIROS_BASE_URL: 'http://dfs.test:1234/v1',
        FAIROS_TIMEOUT: '5000',
        FAIROS_COOKIE_NAME: 'sid',
      });

      expect(config.baseUrl).toBe('http://dfs.test:1234/v1');
      expect(config.timeout).toBe(5000);
      expect(config.sessionCookieName).toBe('sid');
    });

    it('falls back to defaults for missing variables', () => {
      expect(FairOSConfig.fromEnv({}).baseUrl).toBe(DEFAULT_BASE_URL);
    });

    it('rejects a non-numeric timeout', () => {
      const error = errorOf(() => FairOSConfig.fromEnv({ FAIROS_TIMEOUT: 'soon' }));
      expect(error.code).toBe(FairOSErrorCode.Configuration);
      expect(error.message).toBe('FAIROS_TIMEOUT is not a number: soon');
    });
  });

  describe('builder', () => {
    it('builds a configuration', () => {
      const config = FairOSConfig.builder()
        .baseUrl('https://dfs.test/v1')
        .timeoutSecs(2)
        .maxIdleSockets(4)
        .idleTimeout(1000)
        .header('X-Trace', 'on')
        .build();

      expect(config.baseUrl).toBe('https://dfs.test/v1');
      expect(config.timeout).toBe(2000);
      expect(config.maxIdleSockets).toBe(4);
      expect(config.idleTimeout).toBe(1000);
      expect(config.customHeaders).toEqual({ 'X-Trace': 'on' });
    });
  });
});
