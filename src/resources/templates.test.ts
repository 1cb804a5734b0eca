import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Transport } from '../core/transport.js';
import { TemplatesResource } from './templates.js';

describe('TemplatesResource', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let templates: TemplatesResource;

  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockImplementation(() => Promise.resolve(new Response('{}')));
    global.fetch = fetchMock;
    templates = new TemplatesResource(
      new Transport({ apiKey: 'test-secret', baseUrl: 'https://docwal.test/api', timeout: 30 }),
    );
  });

  function sent(call = 0) {
    const args = fetchMock.mock.calls[call];
    return { url: args?.[0], method: args?.[1]?.method, body: args?.[1]?.body };
  }

  it('list', async () => {
    fetchMock.mockResolvedValueOnce(new Response('[{"id":"t1","name":"Diploma"}]'));

    await expect(templates.list()).resolves.toEqual([{ id: 't1', name: 'Diploma' }]);
    expect(sent()).toEqual({ url: 'https://docwal.test/api/templates/', method: 'GET', body: undefined });
  });

  it('get', async () => {
    await templates.get('t1');

    expect(sent()).toEqual({ url: 'https://docwal.test/api/templates/t1/', method: 'GET', body: undefined });
  });

  it('create defaults the version to 1.0', async () => {
    await templates.create({
      name: 'Diploma',
      description: 'Bachelor diploma',
      credentialType: 'diploma',
      schema: { student_name: { type: 'string', required: true } },
    });

    expect(sent().url).toBe('https://docwal.test/api/templates/');
    expect(sent().method).toBe('POST');
    expect(sent().body).toBe(
      JSON.stringify({
        name: 'Diploma',
        description: 'Bachelor diploma',
        credential_type: 'diploma',
        schema: { student_name: { type: 'string', required: true } },
        version: '1.0',
      }),
    );
  });

  it('create passes an explicit version', async () => {
    await templates.create({ name: 'T', description: 'D', credentialType: 'certificate', schema: {}, version: '2.1' });

    expect(sent().body).toBe('{"name":"T","description":"D","credential_type":"certificate","schema":{},"version":"2.1"}');
  });

  it('update sends the fields as-is with PATCH', async () => {
    await templates.update('t1', { description: 'Updated', is_active: false });

    expect(sent()).toEqual({
      url: 'https://docwal.test/api/templates/t1/',
      method: 'PATCH',
      body: '{"description":"Updated","is_active":false}',
    });
  });

  it('delete', async () => {
    await templates.delete('t1');

    expect(sent()).toEqual({ url: 'https://docwal.test/api/templates/t1/', method: 'DELETE', body: undefined });
  });
});
