/**
 * Unit Tests: Run configuration resolution
 *
 * Covers the priority chain: CLI flag > environment > local policy file > default
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ENV_CONFIG_FILE,
  ENV_REQUIRED_TAGS,
  ENV_TERRAFORM_DIRECTORY,
  resolveRunConfig,
} from '../../src/config/index.js';

describe('resolveRunConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `tf-tag-guard-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(join(tempDir, 'infra'), { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults with nothing configured', () => {
    expect(resolveRunConfig({ cwd: tempDir, env: {} })).toEqual({
      requiredTags: [],
      requiredTagsSource: 'default',
      policyFile: undefined,
      policyFileSource: 'default',
      terraformDir: tempDir,
      terraformDirSource: 'default',
    });
  });

  it('should default the Terraform directory to the plan directory', () => {
    const config = resolveRunConfig({ cwd: tempDir, env: {}, planPath: 'infra/plan.json' });

    expect(config.terraformDir).toBe(join(tempDir, 'infra'));
    expect(config.terraformDirSource).toBe('default');
  });

  it('should read settings from the environment', () => {
    const config = resolveRunConfig({
      cwd: tempDir,
      env: {
        [ENV_REQUIRED_TAGS]: 'owner\napplication',
        [ENV_CONFIG_FILE]: 'policy.yaml',
        [ENV_TERRAFORM_DIRECTORY]: 'infra',
      },
    });

    expect(config.requiredTags).toEqual(['owner', 'application']);
    expect(config.requiredTagsSource).toBe('env');
    expect(config.policyFile).toBe(join(tempDir, 'policy.yaml'));
    expect(config.policyFileSource).toBe('env');
    expect(config.terraformDir).toBe(join(tempDir, 'infra'));
    expect(config.terraformDirSource).toBe('env');
  });

  it('should prefer CLI flags over the environment', () => {
    const config = resolveRunConfig({
      cwd: tempDir,
      env: {
        [ENV_REQUIRED_TAGS]: 'owner',
        [ENV_CONFIG_FILE]: 'env-policy.yaml',
        [ENV_TERRAFORM_DIRECTORY]: 'elsewhere',
      },
      requiredTags: 'application,business-unit',
      configFile: 'cli-policy.yaml',
      terraformDir: 'infra',
    });

    expect(config.requiredTags).toEqual(['application', 'business-unit']);
    expect(config.requiredTagsSource).toBe('cli');
    expect(config.policyFile).toBe(join(tempDir, 'cli-policy.yaml'));
    expect(config.policyFileSource).toBe('cli');
    expect(config.terraformDir).toBe(join(tempDir, 'infra'));
    expect(config.terraformDirSource).toBe('cli');
  });

  it('should ignore blank values', () => {
    const config = resolveRunConfig({
      cwd: tempDir,
      env: { [ENV_REQUIRED_TAGS]: '  ', [ENV_CONFIG_FILE]: '' },
      requiredTags: ' ',
    });

    expect(config.requiredTagsSource).toBe('default');
    expect(config.policyFileSource).toBe('default');
  });

  it('should pick up a local policy file in the Terraform directory', () => {
    writeFileSync(join(tempDir, 'infra', '.tag-policy.yml'), 'required_tags:\n  team:\n');

    const config = resolveRunConfig({ cwd: tempDir, env: {}, terraformDir: 'infra' });

    expect(config.policyFile).toBe(join(tempDir, 'infra', '.tag-policy.yml'));
    expect(config.policyFileSource).toBe('local_config');
  });

  it('should prefer .tag-policy.yaml over .tag-policy.yml', () => {
    writeFileSync(join(tempDir, '.tag-policy.yaml'), 'required_tags:\n  team:\n');
    writeFileSync(join(tempDir, '.tag-policy.yml'), 'required_tags:\n  team:\n');

    expect(resolveRunConfig({ cwd: tempDir, env: {} }).policyFile).toBe(join(tempDir, '.tag-policy.yaml'));
  });

  it('should prefer an explicit policy file over a local one', () => {
    writeFileSync(join(tempDir, '.tag-policy.yaml'), 'required_tags:\n  team:\n');

    const config = resolveRunConfig({ cwd: tempDir, env: { [ENV_CONFIG_FILE]: 'other.yaml' } });

    expect(config.policyFile).toBe(join(tempDir, 'other.yaml'));
    expect(config.policyFileSource).toBe('env');
  });
});
