/**
 * Validation pass over a whole plan
 *
 * Classifies every change, resolves the tags of those in scope and evaluates
 * them, collecting violations in plan order. Locations are looked up only for
 * resources that have violations.
 */

import type { Policy } from '../policy/types.js';
import { LocationLookupFailure } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { skipReason } from './classify.js';
import { effectiveTags } from './tags.js';
import { evaluate } from './evaluate.js';
import type {
  ResourceChange,
  ResourceLocation,
  ResourceLocator,
  ValidationResult,
  Violation,
} from './types.js';

export interface ValidateOptions {
  /** Source position lookup used to annotate violations */
  locate?: ResourceLocator;
  logger?: Logger;
}

function lookupLocation(
  address: string,
  locate: ResourceLocator,
  log: Logger
): ResourceLocation | null {
  try {
    return locate(address);
  } catch (err) {
    if (err instanceof LocationLookupFailure) {
      log.debug(err.message, { address });
      return null;
    }
    throw err;
  }
}

/**
 * Validate every planned change against the policy
 */
export function validateChanges(
  changes: readonly ResourceChange[],
  policy: Policy,
  options: ValidateOptions = {}
): ValidationResult {
  const log = options.logger ?? defaultLogger;
  const violations: Violation[] = [];
  let resourcesChecked = 0;

  for (const change of changes) {
    const reason = skipReason(change, policy);
    if (reason !== null) {
      log.debug('Skipping resource', { address: change.address, reason });
      continue;
    }

    resourcesChecked += 1;
    const found = evaluate(change.address, effectiveTags(change), policy);
    if (found.length === 0) {
      continue;
    }

    const location = options.locate ? lookupLocation(change.address, options.locate, log) : null;
    for (const violation of found) {
      violations.push(location ? Object.freeze({ ...violation, location }) : violation);
    }
  }

  return { violations, resourcesChecked };
}
