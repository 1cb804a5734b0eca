/**
 * Resource entrypoint: the per-area method sets exposed on the client, and their argument and result types.
 * @module
 */
export { ApiKeysResource } from './apiKeys.js';
export { CredentialsResource, DEFAULT_CLAIM_TOKEN_EXPIRES_HOURS } from './credentials.js';
export { TeamResource } from './team.js';
export { TemplatesResource } from './templates.js';
export type {
  BatchCredential,
  BatchIssueParams,
  BatchResult,
  BatchUploadParams,
  CreateTemplateParams,
  GeneratedApiKey,
  InviteMemberParams,
  IssueCredentialParams,
  IssueCredentialResult,
  ListCredentialsParams,
  ResendClaimLinkParams,
  ResendClaimLinkResult,
  TeamOverview,
  TeamRole,
} from './types.js';
