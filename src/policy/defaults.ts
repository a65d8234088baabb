/**
 * Built-in tagging policy
 *
 * Used when no policy document is supplied, and as the fallback whenever a
 * supplied document cannot be loaded.
 */

import { createPolicy, makeConstraint, type Policy, type TagRule } from './types.js';

/** Organisational units accepted for `business-unit` */
export const BUSINESS_UNITS = [
  'HMPPS',
  'OPG',
  'LAA',
  'Central Digital',
  'Technology Services',
  'HMCTS',
  'CICA',
  'OCTO',
  'Platforms',
] as const;

export const ENVIRONMENT_NAMES = ['production', 'staging', 'test', 'development'] as const;

/** `<team name>: <team email>` */
export const OWNER_PATTERN = /^[^:]+:\s*\S+@\S+\.\S+/;

export const OWNER_FORMAT_DESCRIPTION = '<team-name>: <team-email> (e.g. "Platform Team: platform@example.com")';

const DEFAULT_RULES: readonly TagRule[] = [
  { name: 'business-unit', constraint: makeConstraint(BUSINESS_UNITS) },
  { name: 'application', constraint: makeConstraint() },
  {
    name: 'owner',
    constraint: makeConstraint(undefined, {
      regex: OWNER_PATTERN,
      description: OWNER_FORMAT_DESCRIPTION,
    }),
  },
  { name: 'is-production', constraint: makeConstraint(['true', 'false']) },
  { name: 'service-area', constraint: makeConstraint() },
  { name: 'environment-name', constraint: makeConstraint(ENVIRONMENT_NAMES) },
];

/**
 * Return the built-in policy (no exclusions)
 */
export function loadDefault(): Policy {
  return createPolicy(DEFAULT_RULES, [], 'default');
}
