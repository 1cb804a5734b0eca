import type { Transport } from '../core/transport.js';
import type { JsonObject } from '../core/types.js';
import type { GeneratedApiKey } from './types.js';

/**
 * Institution API key management. Generating and regenerating is limited to owners and admins.
 */
export class ApiKeysResource {
  #transport: Transport;

  constructor(transport: Transport) {
    this.#transport = transport;
  }

  /** Generates a new API key. The full key is only returned here. */
  generate(): Promise<GeneratedApiKey> {
    return this.#transport.execute({ method: 'POST', path: '/institutions/api-keys/generate/' });
  }

  /** Returns details of the current key, masked. */
  info(): Promise<JsonObject> {
    return this.#transport.execute({ method: 'GET', path: '/institutions/api-keys/info/' });
  }

  /** Revokes the current key and returns its replacement. */
  regenerate(): Promise<GeneratedApiKey> {
    return this.#transport.execute({ method: 'POST', path: '/institutions/api-keys/regenerate/' });
  }

  /** Revokes the current key; this client stops working afterwards. */
  revoke(): Promise<JsonObject> {
    return this.#transport.execute({ method: 'POST', path: '/institutions/api-keys/revoke/' });
  }
}
