/**
 * Terraform plan JSON parsing
 *
 * Turns `terraform show -json <planfile>` output into {@link ResourceChange}
 * records. Only the fields the engine reads are kept.
 */

import { readFileSync } from 'node:fs';
import { SnapshotParseError } from '../errors.js';
import type { ResourceChange } from '../engine/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseResourceChange(raw: unknown, index: number): ResourceChange {
  const where = `resource_changes[${index}]`;
  if (!isRecord(raw)) {
    throw new SnapshotParseError(`${where}: expected an object`);
  }
  if (typeof raw.address !== 'string' || raw.address === '') {
    throw new SnapshotParseError(`${where}: missing "address"`);
  }

  const change = raw.change;
  if (!isRecord(change)) {
    throw new SnapshotParseError(`${where} (${raw.address}): missing "change"`);
  }

  const actions = change.actions;
  if (!Array.isArray(actions) || !actions.every((a): a is string => typeof a === 'string')) {
    throw new SnapshotParseError(`${where} (${raw.address}): "change.actions" must be a list of strings`);
  }

  // `after` is null for deletions
  const after = isRecord(change.after) ? change.after : {};

  return {
    address: raw.address,
    type: typeof raw.type === 'string' ? raw.type : '',
    actions,
    declaredTags: after.tags,
    resolvedTags: after.tags_all,
  };
}

/**
 * Parse plan JSON text
 *
 * @throws SnapshotParseError if the text is not valid JSON or not plan-shaped
 */
export function parsePlan(text: string): ResourceChange[] {
  let plan: unknown;
  try {
    plan = JSON.parse(text);
  } catch (err) {
    throw new SnapshotParseError(
      `Plan is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!isRecord(plan)) {
    throw new SnapshotParseError('Plan JSON must be an object');
  }

  // A plan with nothing to change omits the key entirely
  const resourceChanges = plan.resource_changes ?? [];
  if (!Array.isArray(resourceChanges)) {
    throw new SnapshotParseError('"resource_changes" must be a list');
  }

  return resourceChanges.map((raw: unknown, index) => parseResourceChange(raw, index));
}

/**
 * Read and parse a plan JSON file
 *
 * @throws SnapshotParseError if the file cannot be read or parsed
 */
export function readPlanFile(planPath: string): ResourceChange[] {
  let text: string;
  try {
    text = readFileSync(planPath, 'utf-8');
  } catch (err) {
    throw new SnapshotParseError(
      `Failed to read plan file ${planPath}: ${err instanceof Error ? err.message : String(err)}`,
      { path: planPath }
    );
  }
  return parsePlan(text);
}
