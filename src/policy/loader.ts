/**
 * Policy document loading
 *
 * Reads a YAML (or JSON) policy file and turns it into a {@link Policy}.
 * Structural problems are collected and reported together rather than one at
 * a time, so a user fixing a policy file sees everything that is wrong.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Policy, PolicySource, TagPattern, TagRule } from './types.js';
import { createPolicy, makeConstraint } from './types.js';
import { loadDefault } from './defaults.js';
import {
  PolicyLoadUnavailable,
  PolicyParseError,
  formatError,
  isRecoverablePolicyError,
} from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * Result of resolving the policy for a run
 */
export interface PolicyResolution {
  /** Policy to validate against (the built-in default after a failure) */
  policy: Policy;
  /** Whether the built-in default is in use because the document failed to load */
  fellBack: boolean;
  /** The load failure, when there was one */
  error?: PolicyParseError | PolicyLoadUnavailable;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Parse the `allowed_values` list of one tag.
 * YAML reads unquoted `true`/`false` as booleans, so scalars are stringified.
 */
function parseAllowedValues(
  tagName: string,
  raw: unknown,
  problems: string[]
): string[] | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!Array.isArray(raw)) {
    problems.push(`required_tags.${tagName}.allowed_values: must be a list`);
    return undefined;
  }
  if (raw.length === 0) {
    problems.push(`required_tags.${tagName}.allowed_values: must not be empty`);
    return undefined;
  }

  const values: string[] = [];
  raw.forEach((item: unknown, index) => {
    if (isScalar(item)) {
      values.push(String(item));
    } else {
      problems.push(`required_tags.${tagName}.allowed_values[${index}]: must be a string`);
    }
  });
  return values;
}

function parsePattern(
  tagName: string,
  entry: Record<string, unknown>,
  problems: string[]
): TagPattern | undefined {
  const rawPattern = entry.pattern;
  const rawDescription = entry.pattern_description;

  if (rawDescription !== undefined && typeof rawDescription !== 'string') {
    problems.push(`required_tags.${tagName}.pattern_description: must be a string`);
  }
  if (rawPattern === undefined || rawPattern === null) {
    return undefined;
  }
  if (typeof rawPattern !== 'string') {
    problems.push(`required_tags.${tagName}.pattern: must be a string`);
    return undefined;
  }

  let regex: RegExp;
  try {
    regex = new RegExp(rawPattern);
  } catch (err) {
    problems.push(`required_tags.${tagName}.pattern: invalid regular expression (${formatError(err)})`);
    return undefined;
  }

  return {
    regex,
    description: typeof rawDescription === 'string' && rawDescription.trim() ? rawDescription : rawPattern,
  };
}

function parseRule(tagName: string, entry: unknown, problems: string[]): TagRule | undefined {
  // `application:` or `application: any` both mean "any non-empty value"
  if (entry === null || entry === undefined || isScalar(entry)) {
    return { name: tagName, constraint: makeConstraint() };
  }
  if (!isRecord(entry)) {
    problems.push(`required_tags.${tagName}: must be a mapping or a scalar`);
    return undefined;
  }

  const allowedValues = parseAllowedValues(tagName, entry.allowed_values, problems);
  const pattern = parsePattern(tagName, entry, problems);
  return { name: tagName, constraint: makeConstraint(allowedValues, pattern) };
}

function parseExclusions(raw: unknown, problems: string[]): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    problems.push('exclude_resources: must be a list of glob patterns');
    return [];
  }

  const globs: string[] = [];
  raw.forEach((item: unknown, index) => {
    if (typeof item === 'string' && item.trim()) {
      globs.push(item.trim());
    } else {
      problems.push(`exclude_resources[${index}]: must be a non-empty string`);
    }
  });
  return globs;
}

/**
 * Build a policy from an already-parsed document
 *
 * @param doc - Parsed YAML/JSON value
 * @param source - Recorded on the policy for reporting
 * @throws PolicyParseError listing every structural problem found
 */
export function loadFromDocument(doc: unknown, source: PolicySource = 'document'): Policy {
  const where = typeof source === 'string' ? 'policy document' : source.path;

  if (!isRecord(doc)) {
    throw new PolicyParseError(`Invalid ${where}: expected a mapping at the top level`);
  }

  const problems: string[] = [];
  const rules: TagRule[] = [];

  if (!isRecord(doc.required_tags)) {
    problems.push('required_tags: missing or not a mapping');
  } else if (Object.keys(doc.required_tags).length === 0) {
    problems.push('required_tags: must define at least one tag');
  } else {
    for (const [tagName, entry] of Object.entries(doc.required_tags)) {
      const rule = parseRule(tagName, entry, problems);
      if (rule) {
        rules.push(rule);
      }
    }
  }

  const exclusions = parseExclusions(doc.exclude_resources, problems);

  if (problems.length > 0) {
    throw new PolicyParseError(`Invalid ${where}`, problems, { source: where });
  }

  return createPolicy(rules, exclusions, source);
}

/**
 * Read and parse a policy file
 *
 * @param policyPath - Path to the YAML/JSON file
 * @param basePath - Base for relative paths (default: cwd)
 * @throws PolicyLoadUnavailable if the file cannot be read
 * @throws PolicyParseError if the file is not a valid policy
 */
export function loadPolicyFile(policyPath: string, basePath?: string): Policy {
  const absolutePath = isAbsolute(policyPath)
    ? policyPath
    : resolve(basePath ?? process.cwd(), policyPath);

  if (!existsSync(absolutePath)) {
    throw new PolicyLoadUnavailable(absolutePath, 'file not found');
  }

  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    throw new PolicyLoadUnavailable(absolutePath, formatError(err));
  }

  let doc: unknown;
  try {
    doc = parseYaml(content);
  } catch (err) {
    throw new PolicyParseError(`Failed to parse ${absolutePath}: ${formatError(err)}`, [], {
      path: absolutePath,
    });
  }

  return loadFromDocument(doc, { path: absolutePath });
}

/**
 * Resolve the policy for a run. Never throws for policy problems: a document
 * that cannot be loaded is reported and the built-in default is used instead.
 *
 * @param policyPath - Optional policy file; the built-in default when omitted
 */
export function resolvePolicy(
  policyPath: string | undefined,
  options: { basePath?: string; logger?: Logger } = {}
): PolicyResolution {
  const log = options.logger ?? defaultLogger;

  if (!policyPath) {
    log.debug('No policy file configured, using built-in default');
    return { policy: loadDefault(), fellBack: false };
  }

  try {
    const policy = loadPolicyFile(policyPath, options.basePath);
    log.debug('Loaded policy file', { path: policyPath, tags: [...policy.rules.keys()] });
    return { policy, fellBack: false };
  } catch (err) {
    if (!isRecoverablePolicyError(err)) {
      throw err;
    }
    log.warn(`${formatError(err)}; falling back to built-in default policy`, { code: err.code });
    return { policy: loadDefault(), fellBack: true, error: err };
  }
}
