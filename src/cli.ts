/**
 * tf-tag-guard CLI - Enforce resource tagging policy on Terraform plans
 *
 * Commands:
 * - validate: Check an existing plan JSON
 * - scan: Run terraform plan in a directory, then check the result
 * - policy show: Print the effective policy
 * - policy check: Check a policy file for errors
 *
 * Exit codes: 0 compliant, 1 violations found, 2 the tool itself failed.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { EXIT_TOOL_FAILURE } from './types.js';
import {
  validateCommand,
  scanCommand,
  policyShowCommand,
  policyCheckCommand,
} from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './utils/logger.js';

const VERSION = '0.1.0';

interface ValidateCliOptions {
  requiredTags?: string;
  config?: string;
  terraformDir?: string;
  pipelineOutput: boolean;
}

interface ScanCliOptions {
  requiredTags?: string;
  config?: string;
  pipelineOutput: boolean;
}

interface PolicyShowCliOptions {
  requiredTags?: string;
  config?: string;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (!options.color) {
    chalk.level = 0;
  }
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    logger,
  };
}

/**
 * Run a command, print its result in JSON mode and set the exit code
 */
function execute<T>(label: string, run: (ctx: CommandContext) => CommandResult<T>): void {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    const result = run(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exitCode = result.exitCode;
  } catch (err) {
    error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = EXIT_TOOL_FAILURE;
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('tf-tag-guard')
  .description('Check that Terraform resources carry the required tags before they are deployed')
  .version(VERSION)
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  )
  .option('--no-color', 'Disable colored output');

/**
 * validate command - Check a plan JSON
 */
program
  .command('validate')
  .description('Validate tags in a Terraform plan JSON (terraform show -json)')
  .argument('<plan>', 'Path to the plan JSON file')
  .option('--required-tags <tags>', 'Comma- or newline-separated tags to enforce (default: all policy tags)')
  .option('--config <file>', 'Tagging policy file (YAML or JSON)')
  .option('--terraform-dir <dir>', 'Directory with the *.tf sources, for file:line locations')
  .option('--no-pipeline-output', 'Do not write GitHub step outputs or summary')
  .action((plan: string, cmdOpts: ValidateCliOptions) => {
    execute('Validate', (ctx) =>
      validateCommand(ctx, plan, {
        requiredTags: cmdOpts.requiredTags,
        config: cmdOpts.config,
        terraformDir: cmdOpts.terraformDir,
        pipelineOutput: cmdOpts.pipelineOutput,
      })
    );
  });

/**
 * scan command - Plan, then validate
 */
program
  .command('scan')
  .description('Run terraform init/plan in a directory and validate the resulting plan')
  .argument('[dir]', 'Terraform directory (default: INPUT_TERRAFORM_DIRECTORY or .)')
  .option('--required-tags <tags>', 'Comma- or newline-separated tags to enforce (default: all policy tags)')
  .option('--config <file>', 'Tagging policy file (YAML or JSON)')
  .option('--no-pipeline-output', 'Do not write GitHub step outputs or summary')
  .action((dir: string | undefined, cmdOpts: ScanCliOptions) => {
    execute('Scan', (ctx) =>
      scanCommand(ctx, dir, {
        requiredTags: cmdOpts.requiredTags,
        config: cmdOpts.config,
        pipelineOutput: cmdOpts.pipelineOutput,
      })
    );
  });

/**
 * policy commands - Inspect policies
 */
const policy = program
  .command('policy')
  .description('Inspect and check tagging policies');

policy
  .command('show')
  .description('Print the policy that validate would enforce')
  .option('--required-tags <tags>', 'Comma- or newline-separated tags to enforce')
  .option('--config <file>', 'Tagging policy file (YAML or JSON)')
  .action((cmdOpts: PolicyShowCliOptions) => {
    execute('Policy show', (ctx) =>
      policyShowCommand(ctx, { requiredTags: cmdOpts.requiredTags, config: cmdOpts.config })
    );
  });

policy
  .command('check')
  .description('Check a policy file for errors')
  .argument('<file>', 'Policy file (YAML or JSON)')
  .action((file: string) => {
    execute('Policy check', (ctx) => policyCheckCommand(ctx, file));
  });

// Parse and execute
program.parse();
