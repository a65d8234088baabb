/**
 * CI pipeline outputs
 *
 * Writes step outputs and a job summary through the files named by
 * GITHUB_OUTPUT and GITHUB_STEP_SUMMARY. Outside such a pipeline this does
 * nothing, and a failed write never fails the run.
 */

import { appendFileSync } from 'node:fs';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ValidationResult } from '../engine/types.js';
import { renderMarkdown, summarize } from './render.js';

export interface PipelineOutputOptions {
  /** Environment to read the channel paths from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * What was written, for verbose output and tests
 */
export interface PipelineOutputResult {
  outputsWritten: boolean;
  summaryWritten: boolean;
}

/**
 * Step outputs as `name=value` lines
 */
export function formatStepOutputs(result: ValidationResult): string {
  const summary = summarize(result);
  return [
    `passed=${summary.passed}`,
    `violation-count=${summary.violationCount}`,
    `resources-checked=${summary.resourcesChecked}`,
    `summary=${JSON.stringify(summary)}`,
  ].join('\n') + '\n';
}

function tryAppend(path: string, content: string, channel: string, log: Logger): boolean {
  try {
    appendFileSync(path, content, 'utf-8');
    log.debug(`Wrote ${channel}`, { path });
    return true;
  } catch (err) {
    log.warn(`Could not write ${channel}: ${err instanceof Error ? err.message : String(err)}`, { path });
    return false;
  }
}

/**
 * Publish the result to the pipeline's output channels when they exist
 */
export function writePipelineOutputs(
  result: ValidationResult,
  options: PipelineOutputOptions = {}
): PipelineOutputResult {
  const env = options.env ?? process.env;
  const log = options.logger ?? defaultLogger;

  const outputPath = env.GITHUB_OUTPUT;
  const summaryPath = env.GITHUB_STEP_SUMMARY;

  return {
    outputsWritten: outputPath
      ? tryAppend(outputPath, formatStepOutputs(result), 'step outputs', log)
      : false,
    summaryWritten: summaryPath
      ? tryAppend(summaryPath, renderMarkdown(result) + '\n', 'step summary', log)
      : false,
  };
}
