/**
 * Unit Tests: validate and policy commands
 *
 * Runs the commands against plan and policy files in a temp directory.
 * Pipeline outputs are disabled and console output is captured.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { validateCommand } from '../../src/commands/validate.js';
import { policyCheckCommand, policyShowCommand } from '../../src/commands/policy.js';
import type { CommandContext, OutputFormat } from '../../src/types.js';
import { createLogger } from '../../src/utils/logger.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const COMPLIANT_TAGS = {
  'business-unit': 'HMPPS',
  application: 'payments',
  owner: 'Platform Team: platform@example.com',
  'is-production': 'false',
  'service-area': 'Hosting',
  'environment-name': 'development',
};

function planJson(tags: Record<string, string>): string {
  return JSON.stringify({
    resource_changes: [
      {
        address: 'aws_s3_bucket.logs',
        type: 'aws_s3_bucket',
        change: { actions: ['create'], after: { tags, tags_all: tags } },
      },
      {
        address: 'aws_iam_policy_document.read',
        type: 'aws_iam_policy_document',
        change: { actions: ['read'], after: { json: '{}' } },
      },
    ],
  });
}

function createContext(outputFormat: OutputFormat): CommandContext {
  return {
    options: { json: outputFormat === 'json', verbose: false, color: false },
    outputFormat,
    logger: createLogger({ level: 'error', write: vi.fn() }),
  };
}

function printed(spy: MockInstance): string[] {
  return spy.mock.calls.map((args: unknown[]) => args.map(String).join(' '));
}

// =============================================================================
// Tests
// =============================================================================

describe('commands', () => {
  let tempDir: string;
  let logSpy: MockInstance;

  beforeEach(() => {
    tempDir = join(tmpdir(), `tf-tag-guard-cmd-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    vi.stubEnv('INPUT_REQUIRED_TAGS', '');
    vi.stubEnv('INPUT_CONFIG_FILE', '');
    vi.stubEnv('INPUT_TERRAFORM_DIRECTORY', '');
    chalk.level = 0;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    vi.unstubAllEnvs();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('validateCommand', () => {
    it('should pass a compliant plan with exit code 0', () => {
      const planPath = join(tempDir, 'plan.json');
      writeFileSync(planPath, planJson(COMPLIANT_TAGS));

      const result = validateCommand(createContext('json'), planPath, { pipelineOutput: false });

      expect(result.success).toBe(true);
      expect(result.exitCode).toBe(0);
      expect(result.message).toBe('All 1 checked resource(s) have required tags');
      expect(result.data?.policySource).toBe('built-in default');
      expect(result.data?.policyFallback).toBe(false);
      expect(result.data?.summary).toEqual({
        passed: true,
        resourcesChecked: 1,
        violationCount: 0,
        resources: [],
      });
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should fail with exit code 1 and locate the violating resource', () => {
      const { owner: _owner, ...withoutOwner } = COMPLIANT_TAGS;
      const planPath = join(tempDir, 'plan.json');
      writeFileSync(planPath, planJson(withoutOwner));
      writeFileSync(join(tempDir, 'main.tf'), 'resource "aws_s3_bucket" "logs" {\n}\n');

      const result = validateCommand(createContext('json'), planPath, { pipelineOutput: false });

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(1);
      expect(result.message).toBe('Found 1 violation(s) in 1 resource(s)');
      expect(result.data?.summary.resources).toEqual([
        {
          address: 'aws_s3_bucket.logs',
          location: { file: 'main.tf', line: 1 },
          violations: [{ kind: 'MissingTag', tag: 'owner', reason: 'absent' }],
        },
      ]);
    });

    it('should check only the required tags when given', () => {
      const planPath = join(tempDir, 'plan.json');
      writeFileSync(planPath, planJson({ owner: 'Platform Team: platform@example.com' }));

      const result = validateCommand(createContext('json'), planPath, {
        requiredTags: 'owner',
        pipelineOutput: false,
      });

      expect(result.exitCode).toBe(0);
      expect(result.data?.checkedTags).toEqual(['owner']);
    });

    it('should use a policy file and honour its exclusions', () => {
      const planPath = join(tempDir, 'plan.json');
      const policyPath = join(tempDir, 'policy.yaml');
      writeFileSync(planPath, planJson({}));
      writeFileSync(policyPath, 'required_tags:\n  team:\nexclude_resources:\n  - aws_s3_bucket.*\n');

      const result = validateCommand(createContext('json'), planPath, {
        config: policyPath,
        pipelineOutput: false,
      });

      expect(result.exitCode).toBe(0);
      expect(result.data?.policySource).toBe(policyPath);
      expect(result.data?.summary.resourcesChecked).toBe(0);
    });

    it('should fall back to the built-in policy when the policy file is invalid', () => {
      const planPath = join(tempDir, 'plan.json');
      const policyPath = join(tempDir, 'policy.yaml');
      writeFileSync(planPath, planJson(COMPLIANT_TAGS));
      writeFileSync(policyPath, 'required_tags: []\n');

      const result = validateCommand(createContext('json'), planPath, {
        config: policyPath,
        pipelineOutput: false,
      });

      expect(result.exitCode).toBe(0);
      expect(result.data?.policyFallback).toBe(true);
      expect(result.data?.policySource).toBe('built-in default');
      expect(result.errors).toEqual([
        `Invalid ${policyPath}\n  - required_tags: missing or not a mapping`,
      ]);
    });

    it('should return exit code 2 for an unreadable plan', () => {
      const planPath = join(tempDir, 'plan.json');
      writeFileSync(planPath, '{ not json');

      const result = validateCommand(createContext('json'), planPath, { pipelineOutput: false });

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(2);
      expect(result.message).toContain('Plan is not valid JSON');
    });

    it('should print the report in human mode', () => {
      const { owner: _owner, ...withoutOwner } = COMPLIANT_TAGS;
      const planPath = join(tempDir, 'plan.json');
      writeFileSync(planPath, planJson(withoutOwner));

      validateCommand(createContext('human'), planPath, { pipelineOutput: false });

      const lines = printed(logSpy);
      expect(lines).toContain('❌ Found 1 violation(s):');
      expect(lines).toContain('  ❌ aws_s3_bucket.logs');
      expect(lines).toContain('     Missing tags: owner');
    });
  });

  describe('policyCheckCommand', () => {
    it('should accept a valid policy', () => {
      const policyPath = join(tempDir, 'policy.yaml');
      writeFileSync(
        policyPath,
        'required_tags:\n  team:\n  tier:\n    allowed_values: [gold, silver]\nexclude_resources:\n  - aws_iam_role.*\n'
      );

      const result = policyCheckCommand(createContext('json'), policyPath);

      expect(result.exitCode).toBe(0);
      expect(result.data).toEqual({
        source: policyPath,
        tags: [{ name: 'team' }, { name: 'tier', allowedValues: ['gold', 'silver'] }],
        exclusions: ['aws_iam_role.*'],
      });
    });

    it('should list the problems of an invalid policy', () => {
      const policyPath = join(tempDir, 'policy.yaml');
      writeFileSync(policyPath, "required_tags:\n  owner:\n    pattern: '(['\n  tier:\n    allowed_values: []\n");

      const result = policyCheckCommand(createContext('json'), policyPath);

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(2);
      expect(result.errors).toHaveLength(2);
      expect(result.errors?.[0]).toMatch(/^required_tags\.owner\.pattern: invalid regular expression/);
      expect(result.errors?.[1]).toBe('required_tags.tier.allowed_values: must not be empty');
    });

    it('should report a missing policy file', () => {
      const policyPath = join(tempDir, 'missing.yaml');

      const result = policyCheckCommand(createContext('json'), policyPath);

      expect(result.exitCode).toBe(2);
      expect(result.errors).toEqual([`Policy file unavailable: ${policyPath} (file not found)`]);
    });
  });

  describe('policyShowCommand', () => {
    it('should describe the built-in policy', () => {
      const result = policyShowCommand(createContext('json'));

      expect(result.data?.source).toBe('built-in default');
      expect(result.data?.tags.map((t) => t.name)).toEqual([
        'business-unit',
        'application',
        'owner',
        'is-production',
        'service-area',
        'environment-name',
      ]);
      expect(result.data?.tags[3]).toEqual({ name: 'is-production', allowedValues: ['true', 'false'] });
    });

    it('should narrow to the required tags', () => {
      const result = policyShowCommand(createContext('json'), { requiredTags: 'owner,cost-centre' });

      expect(result.data?.tags.map((t) => t.name)).toEqual(['owner', 'cost-centre']);
      expect(result.message).toBe('Policy from built-in default requires 2 tag(s)');
    });
  });
});
