/**
 * Configuration helpers
 */

import { isTaskType, type TaskType } from './prompts';

export type OutputFormat = 'text' | 'json';

export interface CliConfig {
  /** Primary model name */
  model: string;
  /** Second model to compare against the primary one */
  compareModel: string;
  /** Explicit list of models to compare, in request order */
  models: string[];
  /** Prompt template category */
  task: TaskType;
  /** Base URL of the inference server */
  ollamaUrl: string;
  /** Per-request timeout in seconds */
  timeout: number;
  /** Record benchmark logs for this session */
  benchmark: boolean;
  /** Directory that receives the benchmark CSV and JSON files */
  benchmarkDir: string;
  /** Output format */
  outputFormat: OutputFormat;
  /** Verbose logging */
  verbose: boolean;
}

export const DEFAULT_MODEL = 'deepseek-coder';
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
export const DEFAULT_TIMEOUT_SECONDS = 120;
/** Largest timeout a Node timer can hold, in whole seconds */
export const MAX_TIMEOUT_SECONDS = Math.floor(2 ** 31 / 1000) - 1;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Raw values as they arrive from the command line, before validation. */
export type ConfigArgs = Partial<Omit<CliConfig, 'task' | 'outputFormat'>> & {
  task?: string;
  outputFormat?: string;
};

/** Build CLI config by merging command-line args with environment variables. */
export function buildConfig(
  args: ConfigArgs,
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const task = args.task ?? env.CHATTY_TASK ?? 'general';
  if (!isTaskType(task)) {
    throw new ConfigError(`Unknown task type: ${task}`);
  }

  const outputFormat = args.outputFormat ?? env.CHATTY_OUTPUT_FORMAT ?? 'text';
  if (outputFormat !== 'text' && outputFormat !== 'json') {
    throw new ConfigError(`Unknown output format: ${outputFormat}`);
  }

  const timeout = args.timeout ?? parseTimeout(env.CHATTY_TIMEOUT);

  return {
    model: args.model ?? env.CHATTY_MODEL ?? DEFAULT_MODEL,
    compareModel: args.compareModel ?? '',
    models: args.models ?? [],
    task,
    ollamaUrl: args.ollamaUrl ?? env.CHATTY_OLLAMA_URL ?? DEFAULT_OLLAMA_URL,
    timeout,
    benchmark: args.benchmark ?? env.CHATTY_BENCHMARK === 'true',
    benchmarkDir: args.benchmarkDir ?? env.CHATTY_BENCHMARK_DIR ?? 'benchmarks',
    outputFormat,
    verbose: args.verbose ?? env.CHATTY_VERBOSE === 'true',
  };
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  return parsePositiveInt(raw);
}

/** Parse a whole number of seconds between 1 and `MAX_TIMEOUT_SECONDS`. */
export function parsePositiveInt(raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Expected a positive integer, got "${raw}"`);
  }
  if (value > MAX_TIMEOUT_SECONDS) {
    throw new ConfigError(`Expected at most ${MAX_TIMEOUT_SECONDS}, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve the ordered list of models to query. `--models` wins over
 * `--compare-model`; without either, only the primary model is queried.
 */
export function resolveModels(config: CliConfig): { models: string[]; comparison: boolean } {
  if (config.models.length > 0) {
    return { models: [...config.models], comparison: true };
  }
  if (config.compareModel) {
    return { models: [config.model, config.compareModel], comparison: true };
  }
  return { models: [config.model], comparison: false };
}
