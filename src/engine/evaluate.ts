/**
 * Rule evaluation: check one resource's tags against the policy
 *
 * For every rule, in policy order:
 * 1. tag absent → MissingTag
 * 2. value empty or whitespace → MissingTag ("empty value"), nothing else checked
 * 3. otherwise allowed values, then pattern, each reported on its own
 */

import type { Policy, TagRule } from '../policy/types.js';
import { allowedValuesOf, patternOf } from '../policy/types.js';
import type { TagMap, Violation } from './types.js';

function isBlank(value: string): boolean {
  return value.trim() === '';
}

/**
 * Pattern match anchored at the start of the value (the end is left open)
 */
export function matchesAtStart(regex: RegExp, value: string): boolean {
  const match = regex.exec(value);
  // global/sticky expressions carry lastIndex between calls
  regex.lastIndex = 0;
  return match !== null && match.index === 0;
}

function violation(v: Violation): Violation {
  return Object.freeze(v);
}

function evaluateRule(address: string, tags: TagMap, rule: TagRule): Violation[] {
  const { name } = rule;

  if (!Object.hasOwn(tags, name)) {
    return [violation({ kind: 'MissingTag', resourceAddress: address, tagName: name, reason: 'absent' })];
  }

  const value = tags[name] ?? '';
  if (isBlank(value)) {
    return [violation({ kind: 'MissingTag', resourceAddress: address, tagName: name, reason: 'empty value' })];
  }

  const violations: Violation[] = [];

  const allowedValues = allowedValuesOf(rule.constraint);
  if (allowedValues && !allowedValues.includes(value)) {
    violations.push(
      violation({
        kind: 'InvalidValue',
        resourceAddress: address,
        tagName: name,
        actualValue: value,
        allowedValues,
      })
    );
  }

  const pattern = patternOf(rule.constraint);
  if (pattern && !matchesAtStart(pattern.regex, value)) {
    violations.push(
      violation({
        kind: 'InvalidFormat',
        resourceAddress: address,
        tagName: name,
        actualValue: value,
        formatDescription: pattern.description,
      })
    );
  }

  return violations;
}

/**
 * Evaluate a resource's effective tags against every rule of the policy
 *
 * @returns Violations in rule order; empty when the resource complies
 */
export function evaluate(address: string, tags: TagMap, policy: Policy): Violation[] {
  const violations: Violation[] = [];
  for (const rule of policy.rules.values()) {
    violations.push(...evaluateRule(address, tags, rule));
  }
  return violations;
}
