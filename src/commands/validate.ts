/**
 * validate command - Check an existing plan JSON against the tagging policy
 */

import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_TOOL_FAILURE } from '../types.js';
import { resolveRunConfig } from '../config/index.js';
import { readPlanFile } from '../plan/parser.js';
import type { ResourceChange } from '../engine/types.js';
import { isTagGuardError } from '../errors.js';
import { error, header, info, verbose } from '../utils/output.js';
import { runValidation, type RunData } from './run.js';

export interface ValidateOptions {
  /** Comma- or newline-separated tag names */
  requiredTags?: string;
  /** Policy file */
  config?: string;
  /** Directory holding the *.tf sources (default: the plan's directory) */
  terraformDir?: string;
  /** Write pipeline outputs (default: true) */
  pipelineOutput?: boolean;
}

/**
 * Execute the validate command
 */
export function validateCommand(
  ctx: CommandContext,
  planPath: string,
  options: ValidateOptions = {}
): CommandResult<RunData> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing validate command`, globalOpts.verbose);
  verbose(`Plan: ${planPath}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Terraform Tag Validation');
    info(`Reading plan ${planPath}`);
  }

  const config = resolveRunConfig({
    requiredTags: options.requiredTags,
    configFile: options.config,
    terraformDir: options.terraformDir,
    planPath,
  });

  let changes: ResourceChange[];
  try {
    changes = readPlanFile(planPath);
  } catch (err) {
    if (isTagGuardError(err)) {
      if (outputFormat === 'human') {
        error(err.message);
      }
      return { success: false, exitCode: EXIT_TOOL_FAILURE, message: err.message };
    }
    throw err;
  }
  verbose(`Plan contains ${changes.length} resource change(s)`, globalOpts.verbose);

  return runValidation(ctx, changes, config, { pipelineOutput: options.pipelineOutput });
}
