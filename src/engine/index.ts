/**
 * Validation engine exports
 */

export * from './types.js';
export { isInScope, skipReason, matchesGlob, matchingExclusion, type SkipReason } from './classify.js';
export { effectiveTags, toTagMap } from './tags.js';
export { evaluate, matchesAtStart } from './evaluate.js';
export { validateChanges, type ValidateOptions } from './validate.js';
export * from '../policy/index.js';
export { parsePlan, readPlanFile } from '../plan/parser.js';
export { createTerraformLocator, findResourceLocation, parseResourceAddress } from '../plan/locator.js';
export { render, renderText, renderMarkdown, summarize, type MachineSummary, type RenderedReport } from '../report/render.js';
export * from '../errors.js';
