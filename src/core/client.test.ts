import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../error/configError.js';
import { ApiKeysResource } from '../resources/apiKeys.js';
import { CredentialsResource } from '../resources/credentials.js';
import { TeamResource } from '../resources/team.js';
import { TemplatesResource } from '../resources/templates.js';
import { DocWalClient } from './client.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from './config.js';

describe('DocWalClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('configuration', () => {
    it('applies defaults', () => {
      const client = new DocWalClient({ apiKey: 'test-secret' });

      expect(client.baseUrl).toBe(DEFAULT_BASE_URL);
      expect(client.baseUrl).toBe('https://docwal.com/api');
      expect(client.timeout).toBe(DEFAULT_TIMEOUT);
      expect(client.timeout).toBe(30);
    });

    it('strips trailing slashes from the base URL', () => {
      const client = new DocWalClient({ apiKey: 'test-secret', baseUrl: 'http://localhost:8000/api//' });

      expect(client.baseUrl).toBe('http://localhost:8000/api');
    });

    it('accepts a custom timeout', () => {
      const client = new DocWalClient({ apiKey: 'test-secret', timeout: 2.5 });

      expect(client.timeout).toBe(2.5);
    });

    it('rejects an empty API key', () => {
      expect(() => new DocWalClient({ apiKey: '' })).toThrow(ConfigError);
      expect(() => new DocWalClient({ apiKey: '' })).toThrow('invalid client options; apiKey: must not be empty');
    });

    it('rejects an API key that cannot be sent as a header', () => {
      for (const apiKey of ['test\nsecret', 'test\r\nX-Injected: 1', 'test\u0000secret', 'test-秘密']) {
        expect(() => new DocWalClient({ apiKey })).toThrow(ConfigError);
        expect(() => new DocWalClient({ apiKey })).toThrow('invalid client options; apiKey: must be a valid header value');
      }
    });

    it('accepts Latin-1 characters in the API key', () => {
      expect(() => new DocWalClient({ apiKey: 'test-clé' })).not.toThrow();
    });

    it('rejects a base URL that is not http(s)', () => {
      expect(() => new DocWalClient({ apiKey: 'test-secret', baseUrl: 'docwal.com/api' })).toThrow(ConfigError);
      expect(() => new DocWalClient({ apiKey: 'test-secret', baseUrl: 'ftp://docwal.com/api' })).toThrow(ConfigError);
    });

    it('rejects a non-positive timeout', () => {
      expect(() => new DocWalClient({ apiKey: 'test-secret', timeout: 0 })).toThrow(ConfigError);
      expect(() => new DocWalClient({ apiKey: 'test-secret', timeout: -5 })).toThrow(ConfigError);
    });

    it('makes no request while constructing', () => {
      new DocWalClient({ apiKey: 'test-secret' });

      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('resources', () => {
    it('exposes one instance of each resource', () => {
      const client = new DocWalClient({ apiKey: 'test-secret' });

      expect(client.credentials).toBeInstanceOf(CredentialsResource);
      expect(client.templates).toBeInstanceOf(TemplatesResource);
      expect(client.apiKeys).toBeInstanceOf(ApiKeysResource);
      expect(client.team).toBeInstanceOf(TeamResource);
    });

    it('routes resource calls through the configured base URL and key', async () => {
      fetchMock.mockResolvedValueOnce(new Response('[]'));
      const client = new DocWalClient({
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:8000/api/',
        headers: { 'X-Request-Source': 'tests' },
      });

      await expect(client.templates.list()).resolves.toEqual([]);

      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8000/api/templates/');
      const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
      expect(headers.get('x-api-key')).toBe('test-secret');
      expect(headers.get('x-request-source')).toBe('tests');
    });
  });
});
