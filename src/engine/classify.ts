/**
 * Change classification: which planned changes get validated
 */

import type { Policy } from '../policy/types.js';
import type { ResourceChange } from './types.js';

/**
 * Why a change was left out of validation
 */
export type SkipReason = 'delete' | 'no-op' | 'excluded' | 'not-taggable';

/**
 * Glob match against a whole address.
 * Supports * (any run of characters) and ? (single character); case-sensitive.
 */
export function matchesGlob(address: string, pattern: string): boolean {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&') // Escape regex special chars
    .replace(/\*/g, '.*') // * -> .*
    .replace(/\?/g, '.'); // ? -> .

  return new RegExp(`^${regexPattern}$`, 's').test(address);
}

/**
 * First exclusion glob matching the address, if any
 */
export function matchingExclusion(address: string, policy: Policy): string | undefined {
  return policy.exclusions.find((pattern) => matchesGlob(address, pattern));
}

function hasOnlyAction(actions: readonly string[], action: string): boolean {
  return actions.length === 1 && actions[0] === action;
}

function exposesTags(change: ResourceChange): boolean {
  return (
    (change.declaredTags !== undefined && change.declaredTags !== null) ||
    (change.resolvedTags !== undefined && change.resolvedTags !== null)
  );
}

/**
 * Reason a change is out of scope, or `null` when it must be validated
 */
export function skipReason(change: ResourceChange, policy: Policy): SkipReason | null {
  if (hasOnlyAction(change.actions, 'delete')) {
    return 'delete';
  }
  if (hasOnlyAction(change.actions, 'no-op')) {
    return 'no-op';
  }
  if (matchingExclusion(change.address, policy) !== undefined) {
    return 'excluded';
  }
  // Resources with neither tags nor tags_all cannot carry tags at all
  if (!exposesTags(change)) {
    return 'not-taggable';
  }
  return null;
}

/**
 * Whether a change is in scope for validation
 */
export function isInScope(change: ResourceChange, policy: Policy): boolean {
  return skipReason(change, policy) === null;
}
