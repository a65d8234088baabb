/**
 * Shared types and interfaces for the tf-tag-guard CLI
 */

import type { Logger } from './utils/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Colored output (--no-color turns it off) */
  color: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to all commands
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  logger: Logger;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Process exit codes. Automation relies on 1 and 2 being distinct.
 */
export const EXIT_OK = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_TOOL_FAILURE = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_VIOLATIONS | typeof EXIT_TOOL_FAILURE;

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  exitCode: ExitCode;
  data?: T;
  errors?: string[];
}
