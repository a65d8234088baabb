/**
 * Error classes for tf-tag-guard
 *
 * Tag violations are never errors: they are collected as data by the engine.
 * These classes cover the tool's own failures (bad plan, bad policy, Terraform
 * not cooperating) so the CLI can tell "policy failed" apart from "tool failed".
 */

/**
 * Error codes for programmatic handling
 */
export type TagGuardErrorCode =
  | 'SNAPSHOT_PARSE_ERROR'
  | 'POLICY_PARSE_ERROR'
  | 'POLICY_LOAD_UNAVAILABLE'
  | 'LOCATION_LOOKUP_FAILURE'
  | 'TERRAFORM_ERROR';

/**
 * Base error class for all tf-tag-guard failures
 */
export class TagGuardError extends Error {
  constructor(
    message: string,
    public readonly code: TagGuardErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TagGuardError';
  }
}

/**
 * The plan JSON is unreadable or not shaped like `terraform show -json` output
 */
export class SnapshotParseError extends TagGuardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SNAPSHOT_PARSE_ERROR', details);
    this.name = 'SnapshotParseError';
  }
}

/**
 * The policy document is malformed or contains a pattern that does not compile
 */
export class PolicyParseError extends TagGuardError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, 'POLICY_PARSE_ERROR', details);
    this.name = 'PolicyParseError';
  }

  /**
   * Format the problems for display, one per line
   */
  formatProblems(): string {
    if (this.problems.length === 0) {
      return this.message;
    }
    return `${this.message}\n  - ${this.problems.join('\n  - ')}`;
  }
}

/**
 * The policy document could not be read at all
 */
export class PolicyLoadUnavailable extends TagGuardError {
  constructor(policyPath: string, reason: string) {
    super(`Policy file unavailable: ${policyPath} (${reason})`, 'POLICY_LOAD_UNAVAILABLE', {
      path: policyPath,
      reason,
    });
    this.name = 'PolicyLoadUnavailable';
  }
}

/**
 * Source positions could not be looked up for a resource
 */
export class LocationLookupFailure extends TagGuardError {
  constructor(address: string, reason: string) {
    super(`Cannot locate ${address}: ${reason}`, 'LOCATION_LOOKUP_FAILURE', { address, reason });
    this.name = 'LocationLookupFailure';
  }
}

/**
 * A terraform subcommand exited unsuccessfully
 */
export class TerraformError extends TagGuardError {
  constructor(
    step: string,
    public readonly stderr?: string
  ) {
    const output = stderr ? `: ${stderr.trim()}` : '';
    super(`Terraform ${step} failed${output}`, 'TERRAFORM_ERROR', { step });
    this.name = 'TerraformError';
  }
}

/**
 * Type guard to check if an error is a TagGuardError
 */
export function isTagGuardError(error: unknown): error is TagGuardError {
  return error instanceof TagGuardError;
}

/**
 * Errors the run recovers from by falling back to the built-in policy
 */
export function isRecoverablePolicyError(
  error: unknown
): error is PolicyParseError | PolicyLoadUnavailable {
  return error instanceof PolicyParseError || error instanceof PolicyLoadUnavailable;
}

/**
 * Format any error into a one-line message
 */
export function formatError(error: unknown): string {
  if (error instanceof PolicyParseError) {
    return error.formatProblems();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
