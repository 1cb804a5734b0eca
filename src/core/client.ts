import { ApiKeysResource } from '../resources/apiKeys.js';
import { CredentialsResource } from '../resources/credentials.js';
import { TeamResource } from '../resources/team.js';
import { TemplatesResource } from '../resources/templates.js';
import type { FetchClientProvider } from '../types/request.js';
import { parseClientConfig } from './config.js';
import { Transport } from './transport.js';
import type { ConnectionOptions } from './types.js';

/** Configuration for constructing a {@link DocWalClient}. */
export interface DocWalClientProps extends ConnectionOptions {
  /** API key from the institution settings, sent as `X-API-Key`. */
  apiKey: string;
  /**
   * Base URL of the API; trailing slashes are stripped.
   * @default 'https://docwal.com/api'
   */
  baseUrl?: string;
  /**
   * Timeout in seconds for a whole call.
   * @default 30
   */
  timeout?: number;
  /**
   * HTTP client implementation used for requests.
   * Defaults to a `fetch` based provider.
   */
  fetchProvider?: FetchClientProvider;
}

/**
 * Client for the DocWal credentialing API.
 *
 * Owns one instance of each resource, all sharing a single immutable transport.
 *
 * @example
 * const client = new DocWalClient({ apiKey: process.env.DOCWAL_API_KEY ?? '' });
 * const issued = await client.credentials.issue({
 *   templateId: 'template-123',
 *   individualEmail: 'student@example.com',
 *   credentialData: { student_name: 'Jane Doe', degree: 'BSc' },
 * });
 */
export class DocWalClient {
  /** Issue, list, revoke and download credentials. */
  readonly credentials: CredentialsResource;
  /** Manage credential templates. */
  readonly templates: TemplatesResource;
  /** Manage the institution's API key. */
  readonly apiKeys: ApiKeysResource;
  /** Manage team members and invitations. */
  readonly team: TeamResource;
  /** Transport shared by every resource. */
  #transport: Transport;

  /**
   * Creates a client.
   *
   * @param props - API key plus optional base URL, timeout (seconds), headers, logger and fetch provider.
   * @throws ConfigError When the API key is empty, the base URL is not an http(s) URL
   *   or the timeout is not a positive number.
   */
  constructor({ apiKey, baseUrl, timeout, headers, logger, fetchProvider }: DocWalClientProps) {
    const config = parseClientConfig({ apiKey, baseUrl, timeout });

    this.#transport = new Transport({ ...config, headers, logger, fetchProvider });
    this.credentials = new CredentialsResource(this.#transport);
    this.templates = new TemplatesResource(this.#transport);
    this.apiKeys = new ApiKeysResource(this.#transport);
    this.team = new TeamResource(this.#transport);
  }

  /** Normalized base URL, without trailing slash. */
  get baseUrl(): string {
    return this.#transport.baseUrl;
  }

  /** Timeout in seconds. */
  get timeout(): number {
    return this.#transport.timeout;
  }
}
