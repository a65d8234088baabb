/**
 * Resource declaration lookup in Terraform sources
 *
 * Finds `resource "<type>" "<name>" {` in the `*.tf` files of one directory so
 * violations can point at a file and line.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { LocationLookupFailure } from '../errors.js';
import type { ResourceLocation, ResourceLocator } from '../engine/types.js';

export interface SourceFile {
  name: string;
  content: string;
}

/**
 * Split a plan address into the resource type and name in its own module.
 * Module path segments and instance keys are dropped.
 *
 * @example
 * parseResourceAddress('module.app.aws_s3_bucket.logs["a"]') // { type: 'aws_s3_bucket', name: 'logs' }
 */
export function parseResourceAddress(address: string): { type: string; name: string } | null {
  let rest = address;
  while (rest.startsWith('module.')) {
    const match = /^module\.[^.[]+(?:\[[^\]]*\])?\./.exec(rest);
    if (!match) {
      return null;
    }
    rest = rest.slice(match[0].length);
  }
  if (rest.startsWith('data.')) {
    return null;
  }

  const match = /^([^.]+)\.([^.[]+)(?:\[.*\])?$/.exec(rest);
  if (!match) {
    return null;
  }
  const [, type, name] = match;
  return type && name ? { type, name } : null;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function readSources(dir: string, address: string): SourceFile[] {
  let names: string[];
  try {
    names = readdirSync(dir).filter((name) => name.endsWith('.tf')).sort();
  } catch (err) {
    throw new LocationLookupFailure(address, err instanceof Error ? err.message : String(err));
  }

  const files: SourceFile[] = [];
  for (const name of names) {
    try {
      files.push({ name, content: readFileSync(join(dir, name), 'utf-8') });
    } catch (err) {
      throw new LocationLookupFailure(
        address,
        `cannot read ${name}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
  return files;
}

/**
 * Find where a resource is declared among the given sources.
 * The sources are the root module's, so resources inside child modules are
 * never located: a root resource with the same type and name is not theirs.
 */
export function findResourceLocation(
  address: string,
  files: readonly SourceFile[]
): ResourceLocation | null {
  if (address.startsWith('module.')) {
    return null;
  }
  const parsed = parseResourceAddress(address);
  if (!parsed) {
    return null;
  }

  const pattern = new RegExp(
    `resource\\s+"${escapeRegex(parsed.type)}"\\s+"${escapeRegex(parsed.name)}"\\s*\\{`
  );
  for (const file of files) {
    const match = pattern.exec(file.content);
    if (match) {
      const line = file.content.slice(0, match.index).split('\n').length;
      return { file: file.name, line };
    }
  }
  return null;
}

/**
 * Create a locator over the `*.tf` files of a directory.
 * The files are read once, on the first lookup.
 *
 * @throws LocationLookupFailure from the locator when the directory cannot be read
 */
export function createTerraformLocator(dir: string): ResourceLocator {
  let files: SourceFile[] | undefined;
  return (address) => {
    if (!files) {
      files = readSources(dir, address);
    }
    return findResourceLocation(address, files);
  };
}
