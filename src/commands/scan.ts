/**
 * scan command - Plan a Terraform directory, then validate the plan
 */

import { resolve } from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_OK, EXIT_TOOL_FAILURE } from '../types.js';
import { resolveRunConfig } from '../config/index.js';
import { generatePlanJson, hasTerraformFiles } from '../plan/terraform.js';
import { parsePlan } from '../plan/parser.js';
import type { ResourceChange } from '../engine/types.js';
import { isTagGuardError } from '../errors.js';
import { error, header, info, verbose, warn } from '../utils/output.js';
import { runValidation, type RunData } from './run.js';

export interface ScanOptions {
  /** Comma- or newline-separated tag names */
  requiredTags?: string;
  /** Policy file */
  config?: string;
  /** Write pipeline outputs (default: true) */
  pipelineOutput?: boolean;
}

/**
 * Execute the scan command
 */
export function scanCommand(
  ctx: CommandContext,
  dir: string | undefined,
  options: ScanOptions = {}
): CommandResult<RunData> {
  const { options: globalOpts, outputFormat, logger } = ctx;

  const config = resolveRunConfig({
    requiredTags: options.requiredTags,
    configFile: options.config,
    terraformDir: dir,
  });
  const terraformDir = resolve(config.terraformDir);

  verbose(`Executing scan command in ${terraformDir}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Terraform Tag Validation');
    info(`Directory: ${terraformDir}`);
  }

  if (!hasTerraformFiles(terraformDir)) {
    if (outputFormat === 'human') {
      warn(`No Terraform files found in ${terraformDir}, skipping validation`);
    }
    return {
      success: true,
      exitCode: EXIT_OK,
      message: `No Terraform files found in ${terraformDir}`,
    };
  }

  let changes: ResourceChange[];
  try {
    changes = parsePlan(generatePlanJson(terraformDir, logger));
  } catch (err) {
    if (isTagGuardError(err)) {
      if (outputFormat === 'human') {
        error(err.message);
      }
      return { success: false, exitCode: EXIT_TOOL_FAILURE, message: err.message };
    }
    throw err;
  }

  return runValidation(ctx, changes, config, { pipelineOutput: options.pipelineOutput });
}
