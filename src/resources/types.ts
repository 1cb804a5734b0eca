import type { FilePart, JsonObject } from '../core/types.js';

/** Roles a team member can hold within an institution. */
export type TeamRole = 'owner' | 'admin' | 'issuer';

/** Arguments of {@link CredentialsResource.issue}. */
export interface IssueCredentialParams {
  templateId: string;
  /** Recipient's email address. */
  individualEmail: string;
  /** Field values, keyed as declared by the template schema. */
  credentialData: JsonObject;
  /** Optional PDF attached to the credential; switches the request to multipart. */
  documentFile?: FilePart;
  /** Expiration date of the credential, ISO 8601. */
  expiresAt?: string;
  /**
   * Lifetime of the claim link in hours.
   * @default 720
   */
  claimTokenExpiresHours?: number;
}

/** One recipient of a batch issue. */
export interface BatchCredential {
  individualEmail: string;
  credentialData: JsonObject;
  /** Expiration date of the credential, ISO 8601. */
  expiresAt?: string;
}

/** Arguments of {@link CredentialsResource.batchIssue}. */
export interface BatchIssueParams {
  templateId: string;
  credentials: BatchCredential[];
  /**
   * Send claim emails to recipients.
   * @default true
   */
  sendNotifications?: boolean;
}

/** Arguments of {@link CredentialsResource.batchUpload}. */
export interface BatchUploadParams {
  templateId: string;
  /** ZIP archive with `credentials.csv` (or JSON) and a `documents/` folder. */
  file: FilePart;
  /**
   * Send claim emails to recipients.
   * @default true
   */
  sendNotifications?: boolean;
}

/** Pagination of {@link CredentialsResource.list}. */
export interface ListCredentialsParams {
  /** @default 100 */
  limit?: number;
  /** @default 0 */
  offset?: number;
}

/** Arguments of {@link CredentialsResource.resendClaimLink}. */
export interface ResendClaimLinkParams {
  /**
   * Lifetime of the new claim link in hours.
   * @default 720
   */
  claimTokenExpiresHours?: number;
}

/** Arguments of {@link TemplatesResource.create}. */
export interface CreateTemplateParams {
  name: string;
  description: string;
  /** Kind of document, e.g. `certificate`, `diploma` or `transcript`. */
  credentialType: string;
  /** Field definitions. */
  schema: JsonObject;
  /** @default '1.0' */
  version?: string;
}

/** Arguments of {@link TeamResource.invite}. */
export interface InviteMemberParams {
  /** Address on the institution's domain. */
  email: string;
  /** @default 'issuer' */
  role?: TeamRole;
  /**
   * Send the invitation email.
   * @default true
   */
  sendEmail?: boolean;
  /**
   * Add an existing user straight away, skipping the invitation.
   * @default false
   */
  addDirectly?: boolean;
}

/** Result of issuing a credential. */
export interface IssueCredentialResult extends JsonObject {
  doc_id: string;
  document_hash: string;
  status: string;
  claim_token: string;
}

/** Summary of a batch issue or upload. */
export interface BatchResult extends JsonObject {
  total_rows: number;
  success_count: number;
  failure_count: number;
  /** Per-row outcome, `doc_id` on success, `error` on failure. */
  results: JsonObject[];
}

/** Result of resending a claim link. */
export interface ResendClaimLinkResult extends JsonObject {
  message: string;
  claim_token: string;
  claim_token_expires: string;
  recipient_email: string;
}

/** A freshly generated or regenerated API key, shown once. */
export interface GeneratedApiKey extends JsonObject {
  api_key: string;
}

/** Team members, pending invitations and counters. */
export interface TeamOverview extends JsonObject {
  members: JsonObject[];
  pending_invitations: JsonObject[];
  stats: JsonObject;
}
