/**
 * Policy type definitions for tf-tag-guard
 *
 * A policy maps each required tag to the constraint its value must satisfy,
 * plus a list of address globs for resources that are exempt from checking.
 */

/**
 * Pattern constraint on a tag value
 */
export interface TagPattern {
  /** Compiled expression, matched anchored at the start of the value */
  regex: RegExp;
  /** Human-readable description of the expected format */
  description: string;
}

/**
 * Constraint applied to a present, non-empty tag value
 */
export type TagConstraint =
  | { kind: 'none' }
  | { kind: 'allowed-values'; allowedValues: readonly string[] }
  | { kind: 'pattern'; pattern: TagPattern }
  | { kind: 'allowed-values-and-pattern'; allowedValues: readonly string[]; pattern: TagPattern };

/**
 * One required tag and its constraint
 */
export interface TagRule {
  readonly name: string;
  readonly constraint: TagConstraint;
}

/**
 * Where a policy came from: the built-in rules, a document handed over in
 * code, or a file on disk
 */
export type PolicySource = 'default' | 'document' | { path: string };

/**
 * Complete tagging policy for one validation run
 */
export interface Policy {
  /** Rules keyed by tag name, in evaluation order */
  readonly rules: ReadonlyMap<string, TagRule>;
  /** Address globs exempt from validation */
  readonly exclusions: readonly string[];
  readonly source: PolicySource;
}

// =============================================================================
// Policy document (YAML/JSON on disk)
// =============================================================================

/**
 * Object form of a `required_tags` entry
 */
export interface TagRuleDocument {
  allowed_values?: string[];
  pattern?: string;
  pattern_description?: string;
}

/**
 * Shape of a policy document after successful structural validation
 */
export interface PolicyDocument {
  /** Tag name → scalar/null (no constraint) or rule object */
  required_tags: Record<string, TagRuleDocument | null>;
  exclude_resources?: string[];
}

// =============================================================================
// Constraint helpers
// =============================================================================

/**
 * Build the constraint variant from optional parts
 */
export function makeConstraint(
  allowedValues?: readonly string[],
  pattern?: TagPattern
): TagConstraint {
  if (allowedValues && pattern) {
    return { kind: 'allowed-values-and-pattern', allowedValues, pattern };
  }
  if (allowedValues) {
    return { kind: 'allowed-values', allowedValues };
  }
  if (pattern) {
    return { kind: 'pattern', pattern };
  }
  return { kind: 'none' };
}

/**
 * Allowed values of a constraint, if it has any
 */
export function allowedValuesOf(constraint: TagConstraint): readonly string[] | undefined {
  switch (constraint.kind) {
    case 'allowed-values':
    case 'allowed-values-and-pattern':
      return constraint.allowedValues;
    default:
      return undefined;
  }
}

/**
 * Pattern of a constraint, if it has one
 */
export function patternOf(constraint: TagConstraint): TagPattern | undefined {
  switch (constraint.kind) {
    case 'pattern':
    case 'allowed-values-and-pattern':
      return constraint.pattern;
    default:
      return undefined;
  }
}

/**
 * Describe a policy source for log and CLI output
 */
export function describeSource(source: PolicySource): string {
  switch (source) {
    case 'default':
      return 'built-in default';
    case 'document':
      return 'inline document';
    default:
      return source.path;
  }
}

/**
 * Build an immutable policy from an ordered rule list.
 * A later rule with the same name replaces the earlier one in place.
 */
export function createPolicy(
  rules: readonly TagRule[],
  exclusions: readonly string[],
  source: PolicySource
): Policy {
  const map = new Map<string, TagRule>();
  for (const rule of rules) {
    map.set(rule.name, Object.freeze({ ...rule }));
  }
  return Object.freeze({
    rules: map,
    exclusions: Object.freeze([...exclusions]),
    source,
  });
}
