import { type Context, Hono } from 'hono';
import { z } from 'zod';
import { safeWrapAsync } from '../src/utils/wrap.js';

export const E2E_API_KEY = 'test-secret';
export const E2E_BASE_URL = 'https://docwal.test/api';

/** A request as the mock API received it. */
export type RecordedRequest = {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  contentType: string | null;
};

type StoredCredential = {
  doc_id: string;
  document_hash: string;
  template_id: string;
  individual_email: string;
  credential_data: unknown;
  status: 'issued' | 'revoked';
  revocation_reason?: string;
  claim_token: string;
  has_document: boolean;
};

type StoredMember = {
  id: string;
  email: string;
  role: 'owner' | 'admin' | 'issuer';
  is_active: boolean;
};

export type E2EServer = {
  /** Drop-in replacement for the global fetch, answering from memory. */
  fetch: typeof fetch;
  requests: RecordedRequest[];
  /** Answer every request with 429 while set. */
  setRateLimited: (limited: boolean) => void;
  /** Answer every request with the given status and body while set. */
  setFailure: (failure: { status: 500 | 502 | 503; body: string } | null) => void;
  reset: () => void;
};

const issueSchema = z.object({
  template_id: z.string().min(1),
  individual_email: z.email(),
  credential_data: z.record(z.string(), z.unknown()),
  claim_token_expires_hours: z.coerce.number().int().positive(),
  expires_at: z.string().optional(),
});

const batchSchema = z.object({
  template_id: z.string().min(1),
  credentials: z.array(
    z.object({
      individual_email: z.email(),
      credential_data: z.record(z.string(), z.unknown()),
      expires_at: z.string().optional(),
    }),
  ),
  send_notifications: z.boolean(),
});

const templateSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  credential_type: z.string().min(1),
  schema: z.record(z.string(), z.unknown()),
  version: z.string(),
});

const roleSchema = z.object({ role: z.enum(['owner', 'admin', 'issuer']) });

/** Bytes served by the download endpoint: a PDF header with a NUL and a high byte. */
export const E2E_PDF_BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x37, 0x0a, 0x00, 0xff]);

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid request';
}

/** Reads a JSON body, or the fields of a multipart body with JSON-encoded objects decoded. */
async function readBody(c: Context): Promise<{ fields: Record<string, unknown>; files: Record<string, File> } | null> {
  const contentType = c.req.header('content-type') ?? '';
  if (contentType.startsWith('multipart/form-data')) {
    const [errForm, form] = await safeWrapAsync(() => c.req.parseBody());
    if (errForm) {
      return null;
    }

    const fields: Record<string, unknown> = {};
    const files: Record<string, File> = {};
    for (const [key, value] of Object.entries(form)) {
      if (value instanceof File) {
        files[key] = value;
      } else if (typeof value === 'string') {
        fields[key] = value.startsWith('{') || value.startsWith('[') ? JSON.parse(value) : value;
      }
    }
    return { fields, files };
  }

  if (contentType.startsWith('application/json')) {
    const [errJson, json] = await safeWrapAsync<Error, unknown>(() => c.req.json());
    if (errJson || typeof json !== 'object' || json === null || Array.isArray(json)) {
      return null;
    }
    return { fields: Object.fromEntries(Object.entries(json)), files: {} };
  }

  return { fields: {}, files: {} };
}

/**
 * In-memory DocWal API, served through a stubbed `fetch` so tests open no sockets.
 *
 * Seeded with one template `t1` and one owner. Identifiers are sequential
 * (`d1`, `h1`, `tok1`, ...) and restart on {@link E2EServer.reset}.
 */
export function createE2EServer(): E2EServer {
  const requests: RecordedRequest[] = [];
  const credentials = new Map<string, StoredCredential>();
  const templates = new Map<string, Record<string, unknown>>();
  const members = new Map<string, StoredMember>();
  let counter = 0;
  let keyCounter = 0;
  let rateLimited = false;
  let failure: { status: 500 | 502 | 503; body: string } | null = null;

  function seed() {
    requests.length = 0;
    credentials.clear();
    templates.clear();
    members.clear();
    counter = 0;
    keyCounter = 0;
    rateLimited = false;
    failure = null;
    templates.set('t1', {
      id: 't1',
      name: 'Diploma',
      description: 'Bachelor diploma',
      credential_type: 'diploma',
      schema: { name: { type: 'string', required: true } },
      version: '1.0',
      is_active: true,
    });
    members.set('m1', { id: 'm1', email: 'owner@uni.test', role: 'owner', is_active: true });
  }

  function issueOne(fields: z.infer<typeof issueSchema>, hasDocument: boolean): StoredCredential {
    counter++;
    const credential: StoredCredential = {
      doc_id: `d${counter}`,
      document_hash: `h${counter}`,
      template_id: fields.template_id,
      individual_email: fields.individual_email,
      credential_data: fields.credential_data,
      status: 'issued',
      claim_token: `tok${counter}`,
      has_document: hasDocument,
    };
    credentials.set(credential.doc_id, credential);
    return credential;
  }

  const app = new Hono().basePath('/api');

  app.use('*', async (c, next) => {
    requests.push({
      method: c.req.method,
      path: c.req.path,
      query: c.req.query(),
      headers: c.req.header(),
      contentType: c.req.header('content-type') ?? null,
    });

    if (c.req.header('x-api-key') !== E2E_API_KEY) {
      return c.json({ detail: 'Authentication credentials were not provided.' }, 401);
    }

    if (rateLimited) {
      return c.json({ detail: 'Request was throttled.' }, 429);
    }

    if (failure) {
      return c.body(failure.body, failure.status);
    }

    await next();
  });

  app.post('/credentials/issue/', async (c) => {
    const body = await readBody(c);
    if (!body) {
      return c.json({ error: 'Malformed request body' }, 400);
    }

    const parsed = issueSchema.safeParse(body.fields);
    if (!parsed.success) {
      return c.json({ error: firstIssue(parsed.error) }, 400);
    }

    if (!templates.has(parsed.data.template_id)) {
      return c.json({ error: 'Template not found' }, 400);
    }

    const { doc_id, document_hash, status, claim_token } = issueOne(parsed.data, 'document_file' in body.files);
    return c.json({ doc_id, document_hash, status, claim_token }, 201);
  });

  app.post('/credentials/batch/', async (c) => {
    const body = await readBody(c);
    const parsed = batchSchema.safeParse(body?.fields);
    if (!parsed.success) {
      return c.json({ error: firstIssue(parsed.error) }, 400);
    }

    const { template_id, credentials: rows } = parsed.data;
    const results = rows.map((row, index) => {
      if (!templates.has(template_id)) {
        return { row: index + 1, status: 'failed', error: 'Template not found' };
      }

      const issued = issueOne({ ...row, template_id, claim_token_expires_hours: 720 }, false);
      return { row: index + 1, status: 'success', doc_id: issued.doc_id };
    });
    const successCount = results.filter((result) => result.status === 'success').length;

    return c.json({
      total_rows: rows.length,
      success_count: successCount,
      failure_count: rows.length - successCount,
      results,
    });
  });

  app.post('/credentials/batch-upload/', async (c) => {
    const body = await readBody(c);
    const file = body?.files.file;
    if (!body || !file) {
      return c.json({ error: 'file is required' }, 400);
    }

    if (body.fields.send_notifications !== 'true' && body.fields.send_notifications !== 'false') {
      return c.json({ error: 'send_notifications must be true or false' }, 400);
    }

    const rows = (await file.text()).split('\n').filter((line) => line.trim() !== '').length - 1;
    return c.json({
      total_rows: rows,
      success_count: rows,
      failure_count: 0,
      results: [],
      filename: file.name,
      send_notifications: body.fields.send_notifications === 'true',
    });
  });

  app.get('/credentials/', (c) => {
    const limit = Number(c.req.query('limit') ?? '100');
    const offset = Number(c.req.query('offset') ?? '0');
    const all = [...credentials.values()].map(({ doc_id, individual_email, status }) => ({
      doc_id,
      individual_email,
      status,
    }));
    return c.json(all.slice(offset, offset + limit));
  });

  function findCredential(c: Context): StoredCredential | undefined {
    return credentials.get(c.req.param('docId') ?? '');
  }

  app.get('/credentials/:docId/', (c) => {
    const credential = findCredential(c);
    if (!credential) {
      return c.json({ error: 'Credential not found' }, 404);
    }
    return c.json(credential);
  });

  app.post('/credentials/:docId/revoke/', async (c) => {
    const credential = findCredential(c);
    if (!credential) {
      return c.json({ error: 'Credential not found' }, 404);
    }

    const body = await readBody(c);
    const reason = body?.fields.reason;
    if (typeof reason !== 'string' || !reason) {
      return c.json({ error: 'reason is required' }, 400);
    }

    if (credential.status === 'revoked') {
      return c.json({ error: 'Credential already revoked' }, 409);
    }

    credential.status = 'revoked';
    credential.revocation_reason = reason;
    return c.json({ message: 'Credential revoked', doc_id: credential.doc_id });
  });

  app.post('/credentials/:docId/resend-claim/', async (c) => {
    const credential = findCredential(c);
    if (!credential) {
      return c.json({ error: 'Credential not found' }, 404);
    }

    const body = await readBody(c);
    const hours = Number(body?.fields.claim_token_expires_hours);
    counter++;
    credential.claim_token = `tok${counter}`;
    return c.json({
      message: 'Claim link sent',
      claim_token: credential.claim_token,
      claim_token_expires: `+${hours}h`,
      recipient_email: credential.individual_email,
    });
  });

  app.get('/credentials/:docId/download/', (c) => {
    const credential = findCredential(c);
    if (!credential) {
      return c.json({ error: 'Credential not found' }, 404);
    }

    return new Response(E2E_PDF_BYTES.slice(), { status: 200, headers: { 'Content-Type': 'application/pdf' } });
  });

  app.get('/templates/', (c) => c.json([...templates.values()].filter((template) => template.is_active)));

  app.post('/templates/', async (c) => {
    const body = await readBody(c);
    const parsed = templateSchema.safeParse(body?.fields);
    if (!parsed.success) {
      return c.json({ error: firstIssue(parsed.error) }, 400);
    }

    const id = `t${templates.size + 1}`;
    const template = { id, ...parsed.data, is_active: true };
    templates.set(id, template);
    return c.json(template, 201);
  });

  app.get('/templates/:templateId/', (c) => {
    const template = templates.get(c.req.param('templateId') ?? '');
    return template ? c.json(template) : c.json({ error: 'Template not found' }, 404);
  });

  app.patch('/templates/:templateId/', async (c) => {
    const id = c.req.param('templateId') ?? '';
    const template = templates.get(id);
    if (!template) {
      return c.json({ error: 'Template not found' }, 404);
    }

    const body = await readBody(c);
    const updated = { ...template, ...body?.fields };
    templates.set(id, updated);
    return c.json(updated);
  });

  app.delete('/templates/:templateId/', (c) => {
    const id = c.req.param('templateId') ?? '';
    const template = templates.get(id);
    if (!template) {
      return c.json({ error: 'Template not found' }, 404);
    }

    templates.set(id, { ...template, is_active: false });
    return c.body(null, 204);
  });

  app.post('/institutions/api-keys/generate/', (c) => {
    keyCounter++;
    return c.json({ api_key: `test-generated-${keyCounter}`, message: 'API key generated' }, 201);
  });

  app.get('/institutions/api-keys/info/', (c) =>
    c.json({ has_api_key: keyCounter > 0, masked_key: keyCounter > 0 ? `test-gen...${keyCounter}` : null }),
  );

  app.post('/institutions/api-keys/regenerate/', (c) => {
    keyCounter++;
    return c.json({ api_key: `test-generated-${keyCounter}`, message: 'API key regenerated' });
  });

  app.post('/institutions/api-keys/revoke/', (c) => c.json({ message: 'API key revoked' }));

  app.get('/institutions/team/', (c) => {
    const all = [...members.values()];
    return c.json({
      members: all,
      pending_invitations: [],
      stats: { total_members: all.length, active_members: all.filter((member) => member.is_active).length },
    });
  });

  app.post('/institutions/team/check-email/', async (c) => {
    const body = await readBody(c);
    const email = String(body?.fields.email ?? '');
    const exists = [...members.values()].some((member) => member.email === email);
    return c.json({ email, exists, recommendation: exists ? 'already_member' : 'send_invitation' });
  });

  app.post('/institutions/team/invite/', async (c) => {
    const body = await readBody(c);
    const email = String(body?.fields.email ?? '');
    const parsedRole = roleSchema.safeParse(body?.fields);
    if (!parsedRole.success) {
      return c.json({ error: firstIssue(parsedRole.error) }, 400);
    }

    if (body?.fields.add_directly === true) {
      const id = `m${members.size + 1}`;
      members.set(id, { id, email, role: parsedRole.data.role, is_active: true });
      return c.json({ message: 'Member added', member_id: id }, 201);
    }

    return c.json({ message: 'Invitation sent', email, email_sent: body?.fields.send_email === true }, 201);
  });

  function findMember(c: Context): StoredMember | undefined {
    return members.get(c.req.param('memberId') ?? '');
  }

  app.patch('/institutions/team/members/:memberId/role/', async (c) => {
    const member = findMember(c);
    if (!member) {
      return c.json({ error: 'Member not found' }, 404);
    }

    const body = await readBody(c);
    const parsed = roleSchema.safeParse(body?.fields);
    if (!parsed.success) {
      return c.json({ error: firstIssue(parsed.error) }, 400);
    }

    if (parsed.data.role === 'owner') {
      return c.json({ error: 'Ownership can only be transferred by the owner' }, 403);
    }

    member.role = parsed.data.role;
    return c.json({ message: 'Role updated', member });
  });

  app.post('/institutions/team/members/:memberId/deactivate/', async (c) => {
    const member = findMember(c);
    if (!member) {
      return c.json({ error: 'Member not found' }, 404);
    }

    const body = await readBody(c);
    member.is_active = false;
    return c.json({ message: 'Member deactivated', reason: body?.fields.reason ?? null });
  });

  app.post('/institutions/team/members/:memberId/reactivate/', (c) => {
    const member = findMember(c);
    if (!member) {
      return c.json({ error: 'Member not found' }, 404);
    }

    member.is_active = true;
    return c.json({ message: 'Member reactivated' });
  });

  app.delete('/institutions/team/members/:memberId/remove/', (c) => {
    const member = findMember(c);
    if (!member) {
      return c.json({ error: 'Member not found' }, 404);
    }

    members.delete(member.id);
    return c.json({ message: 'Member removed' });
  });

  seed();

  return {
    fetch: async (input: string | URL | Request, init?: RequestInit) => app.request(input, init),
    requests,
    setRateLimited: (limited) => {
      rateLimited = limited;
    },
    setFailure: (next) => {
      failure = next;
    },
    reset: seed,
  };
}
