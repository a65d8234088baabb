/**
 * Shared validation run used by the validate and scan commands
 */

import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_OK, EXIT_VIOLATIONS } from '../types.js';
import type { RunConfig } from '../config/index.js';
import type { ResourceChange } from '../engine/types.js';
import { validateChanges } from '../engine/validate.js';
import { resolvePolicy } from '../policy/loader.js';
import { applyRequiredTags } from '../policy/required-tags.js';
import { describeSource } from '../policy/types.js';
import { createTerraformLocator } from '../plan/locator.js';
import { render, type MachineSummary } from '../report/render.js';
import { writePipelineOutputs } from '../report/pipeline.js';
import { formatError } from '../errors.js';
import { error, printReport, verbose, warn } from '../utils/output.js';

export interface RunOptions {
  /** Write GitHub step outputs / summary when available (default: true) */
  pipelineOutput?: boolean;
}

/**
 * Data returned by a validation run
 */
export interface RunData {
  /** Where the enforced policy came from */
  policySource: string;
  /** Whether the built-in policy replaced a policy file that failed to load */
  policyFallback: boolean;
  /** Tags checked, in order */
  checkedTags: string[];
  summary: MachineSummary;
}

/**
 * Validate parsed changes under the resolved run configuration
 */
export function runValidation(
  ctx: CommandContext,
  changes: readonly ResourceChange[],
  config: RunConfig,
  options: RunOptions = {}
): CommandResult<RunData> {
  const { options: globalOpts, outputFormat, logger } = ctx;
  const errors: string[] = [];

  verbose(`Terraform directory: ${config.terraformDir} (${config.terraformDirSource})`, globalOpts.verbose);
  verbose(`Policy file: ${config.policyFile ?? '(built-in)'} (${config.policyFileSource})`, globalOpts.verbose);

  const resolution = resolvePolicy(config.policyFile, { logger });
  if (resolution.error) {
    errors.push(formatError(resolution.error));
    if (outputFormat === 'human') {
      warn(`Using built-in default policy: ${resolution.error.message}`);
    }
  }

  const policy = applyRequiredTags(resolution.policy, config.requiredTags);
  const checkedTags = [...policy.rules.keys()];
  verbose(`Checking for tags: ${checkedTags.join(', ')}`, globalOpts.verbose);
  if (outputFormat === 'human') {
    console.log(`\n📋 Checking for tags: ${checkedTags.join(', ')}\n`);
  }

  const result = validateChanges(changes, policy, {
    locate: createTerraformLocator(config.terraformDir),
    logger,
  });
  const report = render(result);

  if (outputFormat === 'human') {
    printReport(report.humanText);
    if (report.exitCode !== EXIT_OK) {
      console.log('');
      error('Tag validation failed. Add the missing tags to your Terraform resources.');
    }
  }

  if (options.pipelineOutput !== false) {
    writePipelineOutputs(result, { logger });
  }

  const passed = report.exitCode === EXIT_OK;
  return {
    success: passed,
    exitCode: passed ? EXIT_OK : EXIT_VIOLATIONS,
    message: passed
      ? `All ${result.resourcesChecked} checked resource(s) have required tags`
      : `Found ${result.violations.length} violation(s) in ${report.machineSummary.resources.length} resource(s)`,
    data: {
      policySource: describeSource(policy.source),
      policyFallback: resolution.fellBack,
      checkedTags,
      summary: report.machineSummary,
    },
    ...(errors.length > 0 ? { errors } : {}),
  };
}
