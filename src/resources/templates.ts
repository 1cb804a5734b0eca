import type { Transport } from '../core/transport.js';
import type { JsonObject } from '../core/types.js';
import type { CreateTemplateParams } from './types.js';

/** Credential template management. */
export class TemplatesResource {
  #transport: Transport;

  constructor(transport: Transport) {
    this.#transport = transport;
  }

  /** Lists active templates. */
  list(): Promise<JsonObject[]> {
    return this.#transport.execute({ method: 'GET', path: '/templates/' });
  }

  get(templateId: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'GET',
      path: '/templates/{template_id}/',
      params: { template_id: templateId },
    });
  }

  create({ name, description, credentialType, schema, version = '1.0' }: CreateTemplateParams): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'POST',
      path: '/templates/',
      json: {
        name,
        description,
        credential_type: credentialType,
        schema,
        version,
      },
    });
  }

  /**
   * Updates a template with the given fields, sent as-is.
   * The server creates a new version when the schema changes.
   */
  update(templateId: string, fields: JsonObject): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'PATCH',
      path: '/templates/{template_id}/',
      params: { template_id: templateId },
      json: fields,
    });
  }

  /** Deactivates a template (soft delete). */
  delete(templateId: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'DELETE',
      path: '/templates/{template_id}/',
      params: { template_id: templateId },
    });
  }
}
