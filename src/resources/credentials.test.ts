import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Transport } from '../core/transport.js';
import { NotFoundError } from '../error/notFoundError.js';
import { CredentialsResource } from './credentials.js';

describe('CredentialsResource', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let credentials: CredentialsResource;

  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockImplementation(() => Promise.resolve(new Response('{}')));
    global.fetch = fetchMock;
    credentials = new CredentialsResource(
      new Transport({ apiKey: 'test-secret', baseUrl: 'https://docwal.test/api', timeout: 30 }),
    );
  });

  function sent(call = 0) {
    const args = fetchMock.mock.calls[call];
    return { url: args?.[0], method: args?.[1]?.method, body: args?.[1]?.body };
  }

  function sentJson(call = 0): unknown {
    const { body } = sent(call);
    if (typeof body !== 'string') {
      throw new Error('expected a JSON body');
    }
    return JSON.parse(body);
  }

  function sentForm(call = 0): FormData {
    const { body } = sent(call);
    if (!(body instanceof FormData)) {
      throw new Error('expected a multipart body');
    }
    return body;
  }

  describe('issue', () => {
    it('sends JSON with the default claim token lifetime', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{"doc_id":"d1","document_hash":"h1","status":"issued","claim_token":"tok1"}'),
      );

      const result = await credentials.issue({
        templateId: 't1',
        individualEmail: 'a@b.com',
        credentialData: { name: 'Ada' },
      });

      expect(result).toEqual({ doc_id: 'd1', document_hash: 'h1', status: 'issued', claim_token: 'tok1' });
      expect(sent().url).toBe('https://docwal.test/api/credentials/issue/');
      expect(sent().method).toBe('POST');
      expect(sentJson()).toEqual({
        template_id: 't1',
        individual_email: 'a@b.com',
        credential_data: { name: 'Ada' },
        claim_token_expires_hours: 720,
      });
    });

    it('includes the expiry date and custom lifetime', async () => {
      await credentials.issue({
        templateId: 't1',
        individualEmail: 'a@b.com',
        credentialData: {},
        expiresAt: '2030-01-01',
        claimTokenExpiresHours: 48,
      });

      expect(sentJson()).toEqual({
        template_id: 't1',
        individual_email: 'a@b.com',
        credential_data: {},
        claim_token_expires_hours: 48,
        expires_at: '2030-01-01',
      });
    });

    it('switches to multipart when a document is attached', async () => {
      await credentials.issue({
        templateId: 't1',
        individualEmail: 'a@b.com',
        credentialData: { name: 'Ada', gpa: 3.9 },
        documentFile: { content: new Uint8Array([37, 80, 68, 70]), filename: 'diploma.pdf' },
      });

      const form = sentForm();
      expect(form.get('template_id')).toBe('t1');
      expect(form.get('individual_email')).toBe('a@b.com');
      expect(form.get('credential_data')).toBe('{"name":"Ada","gpa":3.9}');
      expect(form.get('claim_token_expires_hours')).toBe('720');
      expect(form.has('expires_at')).toBe(false);

      const file = form.get('document_file');
      expect(file).toBeInstanceOf(File);
      expect(file instanceof File && file.name).toBe('diploma.pdf');
    });
  });

  describe('batchIssue', () => {
    it('maps every credential to wire keys', async () => {
      await credentials.batchIssue({
        templateId: 't1',
        credentials: [
          { individualEmail: 'a@b.com', credentialData: { name: 'Ada' } },
          { individualEmail: 'c@d.com', credentialData: { name: 'Cy' }, expiresAt: '2031-06-30' },
        ],
      });

      expect(sent().url).toBe('https://docwal.test/api/credentials/batch/');
      expect(sentJson()).toEqual({
        template_id: 't1',
        credentials: [
          { individual_email: 'a@b.com', credential_data: { name: 'Ada' } },
          { individual_email: 'c@d.com', credential_data: { name: 'Cy' }, expires_at: '2031-06-30' },
        ],
        send_notifications: true,
      });
    });

    it('passes sendNotifications through', async () => {
      await credentials.batchIssue({ templateId: 't1', credentials: [], sendNotifications: false });

      expect(sentJson()).toEqual({ template_id: 't1', credentials: [], send_notifications: false });
    });
  });

  describe('batchUpload', () => {
    it('sends the archive as multipart with stringified flags', async () => {
      await credentials.batchUpload({ templateId: 't1', file: new Blob(['zip']), sendNotifications: false });

      expect(sent().url).toBe('https://docwal.test/api/credentials/batch-upload/');
      const form = sentForm();
      expect(form.get('template_id')).toBe('t1');
      expect(form.get('send_notifications')).toBe('false');
      const file = form.get('file');
      expect(file instanceof File && file.name).toBe('file');
    });

    it('defaults sendNotifications to true', async () => {
      await credentials.batchUpload({ templateId: 't1', file: new Blob(['zip']) });

      expect(sentForm().get('send_notifications')).toBe('true');
    });
  });

  describe('list', () => {
    it('uses default pagination', async () => {
      fetchMock.mockResolvedValueOnce(new Response('[]'));

      await expect(credentials.list()).resolves.toEqual([]);
      expect(sent().url).toBe('https://docwal.test/api/credentials/?limit=100&offset=0');
      expect(sent().method).toBe('GET');
    });

    it('passes pagination and returns the array unmodified', async () => {
      const payload = [{ doc_id: 'd1', status: 'issued' }, { doc_id: 'd2', status: 'revoked' }];
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(payload)));

      await expect(credentials.list({ limit: 10, offset: 20 })).resolves.toEqual(payload);
      expect(sent().url).toBe('https://docwal.test/api/credentials/?limit=10&offset=20');
    });
  });

  it('get fetches by encoded document ID', async () => {
    await credentials.get('doc/1');

    expect(sent().url).toBe('https://docwal.test/api/credentials/doc%2F1/');
    expect(sent().method).toBe('GET');
  });

  it('revoke posts the reason', async () => {
    await credentials.revoke('d1', 'Issued in error');

    expect(sent().url).toBe('https://docwal.test/api/credentials/d1/revoke/');
    expect(sentJson()).toEqual({ reason: 'Issued in error' });
  });

  it('revoke of an unknown credential rejects with NotFoundError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"Credential not found"}', { status: 404 }));

    await expect(credentials.revoke('missing', 'x')).rejects.toThrow(NotFoundError);
  });

  describe('resendClaimLink', () => {
    it('defaults the lifetime to 720 hours', async () => {
      await credentials.resendClaimLink('d1');

      expect(sent().url).toBe('https://docwal.test/api/credentials/d1/resend-claim/');
      expect(sentJson()).toEqual({ claim_token_expires_hours: 720 });
    });

    it('passes a custom lifetime', async () => {
      await credentials.resendClaimLink('d1', { claimTokenExpiresHours: 24 });

      expect(sentJson()).toEqual({ claim_token_expires_hours: 24 });
    });
  });

  describe('download', () => {
    it('returns the raw bytes', async () => {
      const pdf = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d, 0x31]);
      fetchMock.mockResolvedValueOnce(new Response(pdf, { headers: { 'Content-Type': 'application/pdf' } }));

      await expect(credentials.download('d1')).resolves.toEqual(pdf);
      expect(sent().url).toBe('https://docwal.test/api/credentials/d1/download/');
    });

    it('classifies error statuses', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 404 }));

      await expect(credentials.download('missing')).rejects.toThrow('Resource not found');
    });
  });
});
