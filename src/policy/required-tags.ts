/**
 * Required tag list handling
 *
 * CI callers pass the tags to enforce as a single string, either
 * comma-separated or one per line. When given, that list decides which tags
 * are checked; the policy only contributes constraints for names it knows.
 */

import { createPolicy, makeConstraint, type Policy, type TagRule } from './types.js';

/**
 * Split a required-tag input into names.
 * Commas win over newlines when both are present.
 *
 * @example
 * parseRequiredTags('owner, application') // ['owner', 'application']
 * parseRequiredTags('owner\napplication\n') // ['owner', 'application']
 */
export function parseRequiredTags(input: string | undefined): string[] {
  if (!input) {
    return [];
  }
  const separator = input.includes(',') ? ',' : '\n';
  const names: string[] = [];
  for (const part of input.split(separator)) {
    const name = part.trim();
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Narrow (or widen) a policy to exactly the given tag names, in order.
 * Names the policy does not know are checked for presence only.
 * An empty list returns the policy unchanged.
 */
export function applyRequiredTags(policy: Policy, names: readonly string[]): Policy {
  if (names.length === 0) {
    return policy;
  }
  const rules: TagRule[] = names.map(
    (name) => policy.rules.get(name) ?? { name, constraint: makeConstraint() }
  );
  return createPolicy(rules, policy.exclusions, policy.source);
}
