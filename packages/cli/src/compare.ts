/**
 * Sequential multi-model comparison.
 */

import type { InferenceClient, InferenceOutcome } from './client';
import { silentLogger, type Logger } from './logger';
import type { PromptRequest } from './prompts';

/** Outcomes keyed by model, in the order the models were queried. */
export type ComparisonReport = ReadonlyMap<string, InferenceOutcome>;

export class ModelComparator {
  constructor(
    private readonly client: InferenceClient,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Query each model in turn, one request at a time. A failed model is kept in
   * the report and does not stop the remaining ones. A repeated name is
   * queried again; its latest outcome replaces the earlier one in place.
   */
  async compare(models: readonly string[], request: PromptRequest, timeoutSeconds: number): Promise<ComparisonReport> {
    const report = new Map<string, InferenceOutcome>();
    for (const model of models) {
      this.logger.info(`🧪 Testing model: ${model}`);
      const outcome = await this.client.ask(request, model, timeoutSeconds);
      report.set(model, outcome);
      this.logger.info(`${outcome.success ? '✅' : '❌'} ${model}: ${formatSeconds(outcome.elapsedMs)}s`);
    }
    return report;
  }
}

export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}
