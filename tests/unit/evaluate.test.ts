/**
 * Unit Tests: Rule evaluation
 *
 * Covers presence, empty-value, allowed-value and format checks, their order,
 * and the default-policy scenarios.
 */

import { describe, it, expect } from 'vitest';
import { evaluate, matchesAtStart } from '../../src/engine/evaluate.js';
import { loadDefault, OWNER_FORMAT_DESCRIPTION } from '../../src/policy/defaults.js';
import { applyRequiredTags } from '../../src/policy/required-tags.js';
import { createPolicy, makeConstraint } from '../../src/policy/types.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const ADDRESS = 'aws_s3_bucket.assets';

const COMPLIANT_TAGS = {
  'business-unit': 'HMPPS',
  application: 'Foo',
  owner: 'Team: a@b.com',
  'is-production': 'true',
  'service-area': 'X',
  'environment-name': 'test',
};

// =============================================================================
// Default policy scenarios
// =============================================================================

describe('evaluate with the default policy', () => {
  const policy = loadDefault();

  it('should report nothing for fully compliant tags', () => {
    expect(evaluate(ADDRESS, COMPLIANT_TAGS, policy)).toEqual([]);
  });

  it('should report one missing tag per required tag, in list order', () => {
    const narrowed = applyRequiredTags(policy, ['business-unit', 'owner']);

    expect(evaluate(ADDRESS, {}, narrowed)).toEqual([
      { kind: 'MissingTag', resourceAddress: ADDRESS, tagName: 'business-unit', reason: 'absent' },
      { kind: 'MissingTag', resourceAddress: ADDRESS, tagName: 'owner', reason: 'absent' },
    ]);
  });

  it('should report an unknown business unit and every other missing tag', () => {
    const violations = evaluate(ADDRESS, { 'business-unit': 'Foo' }, policy);

    expect(violations.map((v) => [v.kind, v.tagName])).toEqual([
      ['InvalidValue', 'business-unit'],
      ['MissingTag', 'application'],
      ['MissingTag', 'owner'],
      ['MissingTag', 'is-production'],
      ['MissingTag', 'service-area'],
      ['MissingTag', 'environment-name'],
    ]);
    expect(violations[0]).toMatchObject({ actualValue: 'Foo' });
  });

  it('should report an owner without a team email as a format violation', () => {
    const violations = evaluate(ADDRESS, { owner: 'WebOps' }, policy);
    const formatViolations = violations.filter((v) => v.kind === 'InvalidFormat');

    expect(formatViolations).toEqual([
      {
        kind: 'InvalidFormat',
        resourceAddress: ADDRESS,
        tagName: 'owner',
        actualValue: 'WebOps',
        formatDescription: OWNER_FORMAT_DESCRIPTION,
      },
    ]);
  });

  it.each(['', '   ', '\t', '\n'])('should treat %j as a missing tag', (value) => {
    const violations = evaluate(ADDRESS, { ...COMPLIANT_TAGS, 'is-production': value }, policy);

    expect(violations).toEqual([
      { kind: 'MissingTag', resourceAddress: ADDRESS, tagName: 'is-production', reason: 'empty value' },
    ]);
  });

  it('should reject values outside the closed sets', () => {
    const violations = evaluate(
      ADDRESS,
      { ...COMPLIANT_TAGS, 'is-production': 'yes', 'environment-name': 'prod' },
      policy
    );

    expect(violations.map((v) => [v.kind, v.tagName])).toEqual([
      ['InvalidValue', 'is-production'],
      ['InvalidValue', 'environment-name'],
    ]);
  });

  it('should compare allowed values case-sensitively', () => {
    const violations = evaluate(ADDRESS, { ...COMPLIANT_TAGS, 'business-unit': 'hmpps' }, policy);

    expect(violations).toHaveLength(1);
    expect(violations[0]?.kind).toBe('InvalidValue');
  });
});

// =============================================================================
// Constraint combinations
// =============================================================================

describe('evaluate with custom rules', () => {
  it('should report both an invalid value and an invalid format for the same tag', () => {
    const policy = createPolicy(
      [
        {
          name: 'cost-centre',
          constraint: makeConstraint(['CC-100', 'CC-200'], {
            regex: /^CC-\d+$/,
            description: 'CC-<digits>',
          }),
        },
      ],
      [],
      'default'
    );

    const violations = evaluate(ADDRESS, { 'cost-centre': 'finance' }, policy);

    expect(violations.map((v) => v.kind)).toEqual(['InvalidValue', 'InvalidFormat']);
  });

  it('should check emptiness before a pattern that would match the empty string', () => {
    const policy = createPolicy(
      [{ name: 'note', constraint: makeConstraint(undefined, { regex: /.*/, description: 'anything' }) }],
      [],
      'default'
    );

    expect(evaluate(ADDRESS, { note: '  ' }, policy)).toEqual([
      { kind: 'MissingTag', resourceAddress: ADDRESS, tagName: 'note', reason: 'empty value' },
    ]);
  });

  it('should accept any non-empty value for an unconstrained tag', () => {
    const policy = createPolicy([{ name: 'team', constraint: makeConstraint() }], [], 'default');

    expect(evaluate(ADDRESS, { team: 'anything at all' }, policy)).toEqual([]);
  });

  it('should not treat inherited object keys as present tags', () => {
    const policy = createPolicy([{ name: 'constructor', constraint: makeConstraint() }], [], 'default');

    expect(evaluate(ADDRESS, {}, policy)).toEqual([
      { kind: 'MissingTag', resourceAddress: ADDRESS, tagName: 'constructor', reason: 'absent' },
    ]);
  });

  it('should return identical results on repeated calls', () => {
    const policy = loadDefault();
    const tags = { owner: 'WebOps', 'business-unit': 'Nope' };

    expect(evaluate(ADDRESS, tags, policy)).toEqual(evaluate(ADDRESS, tags, policy));
  });

  it('should return frozen violations', () => {
    const [violation] = evaluate(ADDRESS, {}, loadDefault());

    expect(Object.isFrozen(violation)).toBe(true);
  });
});

// =============================================================================
// matchesAtStart
// =============================================================================

describe('matchesAtStart', () => {
  it('should match only at the start of the value', () => {
    expect(matchesAtStart(/\d+/, '123abc')).toBe(true);
    expect(matchesAtStart(/\d+/, 'abc123')).toBe(false);
  });

  it('should leave the end of the value open', () => {
    expect(matchesAtStart(/abc/, 'abcdef')).toBe(true);
  });

  it('should give the same answer for global expressions on repeated calls', () => {
    const regex = /a/g;

    expect(matchesAtStart(regex, 'abc')).toBe(true);
    expect(matchesAtStart(regex, 'abc')).toBe(true);
  });
});

// =============================================================================
// Owner format
// =============================================================================

describe('default owner pattern', () => {
  const policy = applyRequiredTags(loadDefault(), ['owner']);

  it.each([
    'WebOps: webops@example.org',
    'COAT Team: coat@example.gov.uk',
    'Platform Team:platform@example.com',
  ])('should accept %j', (owner) => {
    expect(evaluate(ADDRESS, { owner }, policy)).toEqual([]);
  });

  it.each(['WebOps', 'webops@example.org', 'Team', 'Team: notanemail', 'Team: a@b'])(
    'should reject %j',
    (owner) => {
      const violations = evaluate(ADDRESS, { owner }, policy);

      expect(violations.map((v) => v.kind)).toEqual(['InvalidFormat']);
    }
  );
});
