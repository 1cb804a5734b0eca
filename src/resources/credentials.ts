import type { Transport } from '../core/transport.js';
import type { JsonObject } from '../core/types.js';
import { getResponseBytes } from '../utils/getResponseData.js';
import type {
  BatchIssueParams,
  BatchResult,
  BatchUploadParams,
  IssueCredentialParams,
  IssueCredentialResult,
  ListCredentialsParams,
  ResendClaimLinkParams,
  ResendClaimLinkResult,
} from './types.js';

/** Claim link lifetime used when none is given: 30 days. */
export const DEFAULT_CLAIM_TOKEN_EXPIRES_HOURS = 720;

/**
 * Credential operations: issuing (single, batch, ZIP upload), lookup, revocation,
 * claim link resends and document downloads.
 */
export class CredentialsResource {
  #transport: Transport;

  constructor(transport: Transport) {
    this.#transport = transport;
  }

  /**
   * Issues a single credential.
   *
   * Sent as JSON, or as multipart form data when `documentFile` is given.
   */
  issue({
    templateId,
    individualEmail,
    credentialData,
    documentFile,
    expiresAt,
    claimTokenExpiresHours = DEFAULT_CLAIM_TOKEN_EXPIRES_HOURS,
  }: IssueCredentialParams): Promise<IssueCredentialResult> {
    const json: JsonObject = {
      template_id: templateId,
      individual_email: individualEmail,
      credential_data: credentialData,
      claim_token_expires_hours: claimTokenExpiresHours,
      ...(expiresAt ? { expires_at: expiresAt } : {}),
    };

    return this.#transport.execute({
      method: 'POST',
      path: '/credentials/issue/',
      json,
      ...(documentFile && { files: { document_file: documentFile } }),
    });
  }

  /**
   * Issues several credentials from the same template in one call.
   */
  batchIssue({ templateId, credentials, sendNotifications = true }: BatchIssueParams): Promise<BatchResult> {
    return this.#transport.execute({
      method: 'POST',
      path: '/credentials/batch/',
      json: {
        template_id: templateId,
        credentials: credentials.map(({ individualEmail, credentialData, expiresAt }) => ({
          individual_email: individualEmail,
          credential_data: credentialData,
          ...(expiresAt ? { expires_at: expiresAt } : {}),
        })),
        send_notifications: sendNotifications,
      },
    });
  }

  /**
   * Issues credentials from a ZIP archive holding a CSV/JSON manifest and the PDFs.
   */
  batchUpload({ templateId, file, sendNotifications = true }: BatchUploadParams): Promise<BatchResult> {
    return this.#transport.execute({
      method: 'POST',
      path: '/credentials/batch-upload/',
      json: {
        template_id: templateId,
        send_notifications: sendNotifications,
      },
      files: { file },
    });
  }

  /**
   * Lists credentials issued by the institution, newest first.
   */
  list({ limit = 100, offset = 0 }: ListCredentialsParams = {}): Promise<JsonObject[]> {
    return this.#transport.execute({
      method: 'GET',
      path: '/credentials/',
      query: { limit, offset },
    });
  }

  /**
   * Fetches a credential by document ID.
   */
  get(docId: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'GET',
      path: '/credentials/{doc_id}/',
      params: { doc_id: docId },
    });
  }

  /**
   * Revokes a credential. Revocation is permanent.
   */
  revoke(docId: string, reason: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'POST',
      path: '/credentials/{doc_id}/revoke/',
      params: { doc_id: docId },
      json: { reason },
    });
  }

  /**
   * Emails the recipient a new claim link, invalidating the previous one.
   */
  resendClaimLink(
    docId: string,
    { claimTokenExpiresHours = DEFAULT_CLAIM_TOKEN_EXPIRES_HOURS }: ResendClaimLinkParams = {},
  ): Promise<ResendClaimLinkResult> {
    return this.#transport.execute({
      method: 'POST',
      path: '/credentials/{doc_id}/resend-claim/',
      params: { doc_id: docId },
      json: { claim_token_expires_hours: claimTokenExpiresHours },
    });
  }

  /**
   * Downloads the credential document (PDF) as raw bytes.
   */
  download(docId: string): Promise<Uint8Array> {
    return this.#transport.execute(
      {
        method: 'GET',
        path: '/credentials/{doc_id}/download/',
        params: { doc_id: docId },
      },
      getResponseBytes,
    );
  }
}
