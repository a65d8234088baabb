/**
 * Violation report rendering
 *
 * Everything here is derived from a {@link ValidationResult} alone, so the
 * same result always renders to the same text and summary.
 */

import type {
  ResourceLocation,
  ValidationResult,
  Violation,
} from '../engine/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One violation as it appears in the machine summary
 */
export type SummaryViolation =
  | { kind: 'MissingTag'; tag: string; reason: 'absent' | 'empty value' }
  | { kind: 'InvalidValue'; tag: string; value: string; allowedValues: string[] }
  | { kind: 'InvalidFormat'; tag: string; value: string; expectedFormat: string };

/**
 * All violations of one resource
 */
export interface SummaryResource {
  address: string;
  location?: ResourceLocation;
  violations: SummaryViolation[];
}

/**
 * JSON-serialisable summary for downstream automation
 */
export interface MachineSummary {
  passed: boolean;
  resourcesChecked: number;
  violationCount: number;
  resources: SummaryResource[];
}

export interface RenderedReport {
  humanText: string;
  machineSummary: MachineSummary;
  /** 0 when compliant, 1 when any violation was found */
  exitCode: 0 | 1;
}

interface ResourceGroup {
  address: string;
  location?: ResourceLocation;
  violations: Violation[];
}

// =============================================================================
// Grouping
// =============================================================================

/**
 * Group violations by resource, in first-seen order
 */
export function groupByResource(violations: readonly Violation[]): ResourceGroup[] {
  const groups = new Map<string, ResourceGroup>();
  for (const violation of violations) {
    let group = groups.get(violation.resourceAddress);
    if (!group) {
      group = { address: violation.resourceAddress, location: violation.location, violations: [] };
      groups.set(violation.resourceAddress, group);
    }
    group.violations.push(violation);
  }
  return [...groups.values()];
}

export function formatLocation(location: ResourceLocation | undefined): string {
  return location ? ` (${location.file}:${location.line})` : '';
}

function missingTagLabel(violation: Violation): string | undefined {
  if (violation.kind !== 'MissingTag') {
    return undefined;
  }
  return violation.reason === 'empty value' ? `${violation.tagName} (empty value)` : violation.tagName;
}

// =============================================================================
// Human-readable text
// =============================================================================

function renderGroup(group: ResourceGroup): string[] {
  const lines = [`  ❌ ${group.address}${formatLocation(group.location)}`];

  const missing = group.violations
    .map(missingTagLabel)
    .filter((label): label is string => label !== undefined);
  if (missing.length > 0) {
    lines.push(`     Missing tags: ${missing.join(', ')}`);
  }

  for (const violation of group.violations) {
    switch (violation.kind) {
      case 'InvalidValue':
        lines.push(`     Invalid value for '${violation.tagName}': '${violation.actualValue}'`);
        lines.push(`     Allowed values: ${violation.allowedValues.join(', ')}`);
        break;
      case 'InvalidFormat':
        lines.push(`     Invalid format for '${violation.tagName}': '${violation.actualValue}'`);
        lines.push(`     Expected format: ${violation.formatDescription}`);
        break;
      case 'MissingTag':
        break;
    }
  }

  return lines;
}

/**
 * Plain-text report, one block per resource
 */
export function renderText(result: ValidationResult): string {
  const lines = [`📊 Resources checked: ${result.resourcesChecked}`, ''];

  if (result.violations.length === 0) {
    lines.push('✅ All resources have required tags!');
    return lines.join('\n');
  }

  lines.push(`❌ Found ${result.violations.length} violation(s):`, '');
  for (const group of groupByResource(result.violations)) {
    lines.push(...renderGroup(group), '');
  }

  return lines.join('\n').trimEnd();
}

// =============================================================================
// Machine summary
// =============================================================================

function summarizeViolation(violation: Violation): SummaryViolation {
  switch (violation.kind) {
    case 'MissingTag':
      return { kind: 'MissingTag', tag: violation.tagName, reason: violation.reason };
    case 'InvalidValue':
      return {
        kind: 'InvalidValue',
        tag: violation.tagName,
        value: violation.actualValue,
        allowedValues: [...violation.allowedValues],
      };
    case 'InvalidFormat':
      return {
        kind: 'InvalidFormat',
        tag: violation.tagName,
        value: violation.actualValue,
        expectedFormat: violation.formatDescription,
      };
  }
}

export function summarize(result: ValidationResult): MachineSummary {
  return {
    passed: result.violations.length === 0,
    resourcesChecked: result.resourcesChecked,
    violationCount: result.violations.length,
    resources: groupByResource(result.violations).map((group) => ({
      address: group.address,
      ...(group.location ? { location: { ...group.location } } : {}),
      violations: group.violations.map(summarizeViolation),
    })),
  };
}

// =============================================================================
// Markdown (pipeline step summary / PR comment)
// =============================================================================

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/** Inline code; a backtick inside the value would end the span early */
function codeSpan(value: string): string {
  return `\`${value.replace(/`/g, "'")}\``;
}

function describeForTable(violation: Violation): string {
  switch (violation.kind) {
    case 'MissingTag':
      return violation.reason === 'empty value' ? 'Empty value' : 'Missing';
    case 'InvalidValue':
      return `Invalid value ${codeSpan(violation.actualValue)} (allowed: ${violation.allowedValues.join(', ')})`;
    case 'InvalidFormat':
      return `Invalid format ${codeSpan(violation.actualValue)} (expected: ${violation.formatDescription})`;
  }
}

/**
 * Markdown report with one table row per violation
 */
export function renderMarkdown(result: ValidationResult): string {
  const lines = ['## Tag validation', ''];

  if (result.violations.length === 0) {
    lines.push(`✅ All ${result.resourcesChecked} checked resource(s) have the required tags.`);
    return lines.join('\n');
  }

  lines.push(
    `❌ Found ${result.violations.length} violation(s) across ${result.resourcesChecked} checked resource(s).`,
    '',
    '| Resource | Location | Tag | Problem |',
    '| --- | --- | --- | --- |'
  );
  for (const violation of result.violations) {
    const location = violation.location ? `${violation.location.file}:${violation.location.line}` : '';
    lines.push(
      `| ${escapeCell(codeSpan(violation.resourceAddress))} | ${escapeCell(location)} | ${escapeCell(codeSpan(violation.tagName))} | ${escapeCell(describeForTable(violation))} |`
    );
  }
  return lines.join('\n');
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Render a result as human text, machine summary and exit code
 */
export function render(result: ValidationResult): RenderedReport {
  return {
    humanText: renderText(result),
    machineSummary: summarize(result),
    exitCode: result.violations.length === 0 ? 0 : 1,
  };
}
