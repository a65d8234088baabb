/**
 * Terraform invocation for producing a plan JSON
 *
 * Runs init (without a backend), plan and show in a Terraform directory.
 * Provider credentials must already be available in the environment.
 */

import { execFileSync } from 'node:child_process';
import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { TerraformError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/** Plan file written into the Terraform directory */
export const PLAN_FILE = 'plan.tfplan';

function stderrOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('stderr' in error)) {
    return undefined;
  }
  const { stderr } = error;
  if (typeof stderr === 'string') {
    return stderr;
  }
  return Buffer.isBuffer(stderr) ? stderr.toString('utf-8') : undefined;
}

/**
 * Execute a terraform subcommand and return stdout
 * @throws TerraformError if the command fails or terraform is not installed
 */
function execTerraform(step: string, args: string[], cwd: string): string {
  try {
    return execFileSync('terraform', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 256 * 1024 * 1024,
    });
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new TerraformError(step, 'terraform is not installed or not in PATH');
    }
    throw new TerraformError(step, stderrOf(error));
  }
}

/**
 * Whether a directory contains any Terraform sources
 */
export function hasTerraformFiles(dir: string): boolean {
  try {
    return readdirSync(dir).some((name) => name.endsWith('.tf'));
  } catch {
    return false;
  }
}

/**
 * Produce plan JSON for a Terraform directory
 *
 * @returns The text printed by `terraform show -json`
 * @throws TerraformError naming the step that failed
 */
export function generatePlanJson(dir: string, log: Logger = defaultLogger): string {
  log.info('Initializing Terraform', { dir });
  execTerraform('init', ['init', '-backend=false', '-input=false'], dir);

  log.info('Generating Terraform plan', { dir });
  execTerraform('plan', ['plan', '-input=false', `-out=${PLAN_FILE}`], dir);

  log.info('Converting plan to JSON', { planFile: join(dir, PLAN_FILE) });
  return execTerraform('show', ['show', '-json', PLAN_FILE], dir);
}
