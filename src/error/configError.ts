import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';

function formatIssue(issue: StandardSchemaV1.Issue): string {
  const path = issue.path?.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Error thrown by the client constructor when its options fail validation.
 * No request is made with an invalid configuration.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  static name = 'ConfigError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new ConfigError with accompanying issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message}; ${issues.map(formatIssue).join('; ')}` : message, opts);
    this.name = ConfigError.name;
    this.issues = issues;
  }
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}
