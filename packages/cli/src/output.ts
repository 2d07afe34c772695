/**
 * Output formatters for single-model answers and model comparisons.
 */

import type { InferenceOutcome, ModelInfo } from './client';
import { formatSeconds, type ComparisonReport } from './compare';
import type { OutputFormat } from './config';
import type { TaskType } from './prompts';

export const WIDE_RULE = '='.repeat(80);
export const NARROW_RULE = '='.repeat(40);

export interface ReportContext {
  format: OutputFormat;
  task: TaskType;
  file: string;
  fileSize: number;
  /** Render every outcome as a comparison entry, even when there is only one */
  comparison: boolean;
}

/** Format output based on the requested output format. */
export function formatOutput(report: ComparisonReport, ctx: ReportContext): string {
  const outcomes = [...report.values()];
  switch (ctx.format) {
    case 'json':
      return JSON.stringify(
        {
          task: ctx.task,
          file: ctx.file,
          fileSize: ctx.fileSize,
          results: outcomes.map((o) => ({
            model: o.model,
            success: o.success,
            responseTime: Number(formatSeconds(o.elapsedMs)),
            response: o.response,
            error: o.error,
          })),
        },
        null,
        2,
      );

    case 'text':
    default:
      return ctx.comparison
        ? formatComparison(outcomes)
        : outcomes.map((o) => formatSingle(o, ctx.task)).join('\n');
  }
}

function formatSingle(outcome: InferenceOutcome, task: TaskType): string {
  const header = outcome.success
    ? [`⏱️  Response time: ${formatSeconds(outcome.elapsedMs)}s`, `✅ Model: ${outcome.model} (${task} task)`]
    : [`❌ Error: ${outcome.error}`];
  return [...header, '', NARROW_RULE, '', outcome.response, '', WIDE_RULE].join('\n');
}

function formatComparison(outcomes: InferenceOutcome[]): string {
  const lines = ['📊 COMPARISON RESULTS:', WIDE_RULE];
  for (const o of outcomes) {
    lines.push(
      '',
      `🤖 Model: ${o.model}`,
      `⏱️  Response time: ${formatSeconds(o.elapsedMs)}s`,
      `✅ Success: ${o.success}`,
      NARROW_RULE,
      o.response,
      WIDE_RULE,
    );
  }
  return lines.join('\n');
}

export function formatModelList(models: readonly ModelInfo[]): string {
  const lines = ['Available models:'];
  for (const model of models) {
    const details: string[] = [];
    if (model.family) {
      details.push(model.family);
    }
    if (model.parameterSize) {
      details.push(model.parameterSize);
    }
    if (model.size) {
      details.push(`${(model.size / 1024 ** 3).toFixed(1)}GB`);
    }
    lines.push(`  - ${model.name}${details.length ? ` (${details.join(', ')})` : ''}`);
  }
  return lines.join('\n');
}
