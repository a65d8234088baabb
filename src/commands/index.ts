/**
 * Command exports
 */

export { validateCommand, type ValidateOptions } from './validate.js';
export { scanCommand, type ScanOptions } from './scan.js';
export {
  policyShowCommand,
  policyCheckCommand,
  describePolicy,
  type PolicyShowOptions,
  type PolicyView,
} from './policy.js';
export { runValidation, type RunData, type RunOptions } from './run.js';
