import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Transport } from '../core/transport.js';
import { PermissionError } from '../error/permissionError.js';
import { ApiKeysResource } from './apiKeys.js';

describe('ApiKeysResource', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let apiKeys: ApiKeysResource;

  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockImplementation(() => Promise.resolve(new Response('{}')));
    global.fetch = fetchMock;
    apiKeys = new ApiKeysResource(
      new Transport({ apiKey: 'test-secret', baseUrl: 'https://docwal.test/api', timeout: 30 }),
    );
  });

  function sent(call = 0) {
    const args = fetchMock.mock.calls[call];
    return { url: args?.[0], method: args?.[1]?.method, body: args?.[1]?.body };
  }

  it('generate', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"api_key":"test-generated-key"}'));

    await expect(apiKeys.generate()).resolves.toEqual({ api_key: 'test-generated-key' });
    expect(sent()).toEqual({
      url: 'https://docwal.test/api/institutions/api-keys/generate/',
      method: 'POST',
      body: undefined,
    });
  });

  it('info', async () => {
    await apiKeys.info();

    expect(sent().url).toBe('https://docwal.test/api/institutions/api-keys/info/');
    expect(sent().method).toBe('GET');
  });

  it('regenerate', async () => {
    await apiKeys.regenerate();

    expect(sent().url).toBe('https://docwal.test/api/institutions/api-keys/regenerate/');
    expect(sent().method).toBe('POST');
  });

  it('revoke', async () => {
    await apiKeys.revoke();

    expect(sent().url).toBe('https://docwal.test/api/institutions/api-keys/revoke/');
    expect(sent().method).toBe('POST');
  });

  it('surfaces the server message on 403', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"Only owners and admins can manage API keys"}', { status: 403 }));

    const err = await apiKeys.generate().catch((error: unknown) => error);

    expect(err).toBeInstanceOf(PermissionError);
    expect(err).toHaveProperty('message', 'Only owners and admins can manage API keys');
  });
});
