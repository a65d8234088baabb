/**
 * Policy model exports
 */

export * from './types.js';
export { loadDefault, BUSINESS_UNITS, ENVIRONMENT_NAMES, OWNER_PATTERN, OWNER_FORMAT_DESCRIPTION } from './defaults.js';
export { loadFromDocument, loadPolicyFile, resolvePolicy, type PolicyResolution } from './loader.js';
export { parseRequiredTags, applyRequiredTags } from './required-tags.js';
