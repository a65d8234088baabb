/**
 * policy commands - Inspect and check tagging policies
 */

import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_OK, EXIT_TOOL_FAILURE } from '../types.js';
import { resolveRunConfig } from '../config/index.js';
import { loadPolicyFile, resolvePolicy } from '../policy/loader.js';
import { applyRequiredTags } from '../policy/required-tags.js';
import {
  allowedValuesOf,
  describeSource,
  patternOf,
  type Policy,
} from '../policy/types.js';
import { PolicyParseError, formatError, isRecoverablePolicyError } from '../errors.js';
import { header, printTable, success, error as printError } from '../utils/output.js';

/**
 * Serializable view of one rule
 */
export interface RuleView {
  name: string;
  allowedValues?: string[];
  pattern?: string;
  patternDescription?: string;
}

/**
 * Serializable view of a policy
 */
export interface PolicyView {
  source: string;
  tags: RuleView[];
  exclusions: string[];
}

/**
 * Describe a policy as plain data
 */
export function describePolicy(policy: Policy): PolicyView {
  const tags: RuleView[] = [];
  for (const rule of policy.rules.values()) {
    const view: RuleView = { name: rule.name };
    const allowedValues = allowedValuesOf(rule.constraint);
    if (allowedValues) {
      view.allowedValues = [...allowedValues];
    }
    const pattern = patternOf(rule.constraint);
    if (pattern) {
      view.pattern = pattern.regex.source;
      view.patternDescription = pattern.description;
    }
    tags.push(view);
  }
  return {
    source: describeSource(policy.source),
    tags,
    exclusions: [...policy.exclusions],
  };
}

function describeRule(rule: RuleView): string {
  const parts: string[] = [];
  if (rule.allowedValues) {
    parts.push(`one of: ${rule.allowedValues.join(', ')}`);
  }
  if (rule.patternDescription) {
    parts.push(`format: ${rule.patternDescription}`);
  }
  return parts.length > 0 ? parts.join('; ') : 'any non-empty value';
}

export interface PolicyShowOptions {
  requiredTags?: string;
  config?: string;
}

/**
 * Execute the policy show command
 */
export function policyShowCommand(
  ctx: CommandContext,
  options: PolicyShowOptions = {}
): CommandResult<PolicyView> {
  const config = resolveRunConfig({
    requiredTags: options.requiredTags,
    configFile: options.config,
  });
  const resolution = resolvePolicy(config.policyFile, { logger: ctx.logger });
  const view = describePolicy(applyRequiredTags(resolution.policy, config.requiredTags));

  if (ctx.outputFormat === 'human') {
    header('Tagging Policy');
    printTable(
      'Required tags',
      view.tags.map((rule): [string, string] => [rule.name, describeRule(rule)])
    );
    printTable('Policy', [
      ['Source', view.source],
      ['Excluded resources', view.exclusions.length > 0 ? view.exclusions.join(', ') : '(none)'],
    ]);
  }

  return {
    success: true,
    exitCode: EXIT_OK,
    message: `Policy from ${view.source} requires ${view.tags.length} tag(s)`,
    data: view,
    ...(resolution.error ? { errors: [formatError(resolution.error)] } : {}),
  };
}

/**
 * Execute the policy check command
 */
export function policyCheckCommand(
  ctx: CommandContext,
  policyPath: string
): CommandResult<PolicyView> {
  try {
    const view = describePolicy(loadPolicyFile(policyPath));
    if (ctx.outputFormat === 'human') {
      success(`${policyPath} is a valid policy (${view.tags.length} tag(s), ${view.exclusions.length} exclusion(s))`);
    }
    return {
      success: true,
      exitCode: EXIT_OK,
      message: `${policyPath} is a valid policy`,
      data: view,
    };
  } catch (err) {
    if (!isRecoverablePolicyError(err)) {
      throw err;
    }
    const problems = err instanceof PolicyParseError && err.problems.length > 0 ? err.problems : [err.message];
    if (ctx.outputFormat === 'human') {
      printError(`${policyPath} is not a valid policy`);
      for (const problem of problems) {
        console.log(`  • ${problem}`);
      }
    }
    return {
      success: false,
      exitCode: EXIT_TOOL_FAILURE,
      message: `${policyPath} is not a valid policy`,
      errors: problems,
    };
  }
}
