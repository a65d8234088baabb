/**
 * Run configuration resolution
 *
 * Each setting is resolved from (highest to lowest priority):
 * 1. CLI flag
 * 2. Environment variable (the INPUT_* variables a CI action receives)
 * 3. Local config file (policy only: .tag-policy.yaml next to the Terraform sources)
 * 4. Default
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parseRequiredTags } from '../policy/required-tags.js';

/** Environment variable names */
export const ENV_REQUIRED_TAGS = 'INPUT_REQUIRED_TAGS';
export const ENV_CONFIG_FILE = 'INPUT_CONFIG_FILE';
export const ENV_TERRAFORM_DIRECTORY = 'INPUT_TERRAFORM_DIRECTORY';

/** Policy files picked up from the Terraform directory, in order */
export const LOCAL_POLICY_FILES = ['.tag-policy.yaml', '.tag-policy.yml'];

/**
 * Where a setting came from
 */
export type SettingSource = 'cli' | 'env' | 'local_config' | 'default';

export interface RunConfigOptions {
  /** --required-tags */
  requiredTags?: string;
  /** --config */
  configFile?: string;
  /** --terraform-dir, or the `scan` directory argument */
  terraformDir?: string;
  /** Plan file being validated; its directory is the default Terraform directory */
  planPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunConfig {
  /** Tag names to enforce; empty means "every tag in the policy" */
  requiredTags: string[];
  requiredTagsSource: SettingSource;
  /** Policy file to load; undefined means the built-in default */
  policyFile?: string;
  policyFileSource: SettingSource;
  /** Absolute directory holding the *.tf sources */
  terraformDir: string;
  terraformDirSource: SettingSource;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

function findLocalPolicy(dir: string): string | undefined {
  return LOCAL_POLICY_FILES.map((name) => join(dir, name)).find((path) => existsSync(path));
}

/**
 * Resolve the settings for one run
 */
export function resolveRunConfig(options: RunConfigOptions = {}): RunConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  // Terraform directory
  let terraformDir: string;
  let terraformDirSource: SettingSource;
  const cliDir = nonEmpty(options.terraformDir);
  const envDir = nonEmpty(env[ENV_TERRAFORM_DIRECTORY]);
  if (cliDir) {
    terraformDir = resolve(cwd, cliDir);
    terraformDirSource = 'cli';
  } else if (envDir) {
    terraformDir = resolve(cwd, envDir);
    terraformDirSource = 'env';
  } else {
    terraformDir = options.planPath ? dirname(resolve(cwd, options.planPath)) : cwd;
    terraformDirSource = 'default';
  }

  // Required tags
  let requiredTags: string[] = [];
  let requiredTagsSource: SettingSource = 'default';
  const cliTags = nonEmpty(options.requiredTags);
  const envTags = nonEmpty(env[ENV_REQUIRED_TAGS]);
  if (cliTags) {
    requiredTags = parseRequiredTags(cliTags);
    requiredTagsSource = 'cli';
  } else if (envTags) {
    requiredTags = parseRequiredTags(envTags);
    requiredTagsSource = 'env';
  }

  // Policy file
  let policyFile: string | undefined;
  let policyFileSource: SettingSource = 'default';
  const cliConfig = nonEmpty(options.configFile);
  const envConfig = nonEmpty(env[ENV_CONFIG_FILE]);
  if (cliConfig) {
    policyFile = resolve(cwd, cliConfig);
    policyFileSource = 'cli';
  } else if (envConfig) {
    policyFile = resolve(cwd, envConfig);
    policyFileSource = 'env';
  } else {
    policyFile = findLocalPolicy(terraformDir);
    if (policyFile) {
      policyFileSource = 'local_config';
    }
  }

  return {
    requiredTags,
    requiredTagsSource,
    policyFile,
    policyFileSource,
    terraformDir,
    terraformDirSource,
  };
}
