/**
 * Command-line program: reads a source file, asks one or more models about it
 * and prints the answers.
 *
 * Usage:
 *   chatty <file> <question> [options]
 *
 * Model selection (in order of precedence):
 *   1. --models <models...>   compare any number of models
 *   2. --compare-model <m>    compare <m> against --model
 *   3. --model <m>            ask a single model (default: deepseek-coder)
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { BenchmarkRecorder } from './benchmark';
import { InferenceClient } from './client';
import { ModelComparator } from './compare';
import { buildConfig, ConfigError, parsePositiveInt, resolveModels, type CliConfig } from './config';
import { createLogger, errorMessage, type Logger } from './logger';
import { formatModelList, formatOutput, WIDE_RULE } from './output';
import { TASK_DESCRIPTIONS, TASK_TYPES, type PromptRequest } from './prompts';
import { InputError, readSourceFile, type SourceFile } from './source';

const VERSION = '1.0.0';

type CliOptions = {
  model?: string;
  compareModel?: string;
  models?: string[];
  task?: string;
  ollamaUrl?: string;
  timeout?: number;
  benchmark?: boolean;
  benchmarkDir?: string;
  outputFormat?: string;
  verbose?: boolean;
  listModels?: boolean;
};

export interface CliIO {
  /** Receives the report; defaults to process stdout */
  stdout: (text: string) => void;
  /** Overrides the stderr logger built from --verbose */
  logger?: Logger;
  env: NodeJS.ProcessEnv;
}

function parseTimeoutOption(value: string): number {
  try {
    return parsePositiveInt(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

export function createProgram(): Command {
  const taskHelp = TASK_TYPES.map((t) => `  ${t.padEnd(9)} - ${TASK_DESCRIPTIONS[t]}`).join('\n');

  return new Command()
    .name('chatty')
    .description('Ask a local model about a source file, with optional benchmarking')
    .version(VERSION)
    .argument('[file]', 'Source file to analyze')
    .argument('[question]', 'Your question about the code')
    .option('--model <model>', 'Model to use (default: deepseek-coder)')
    .option('--compare-model <model>', 'Compare this model against the primary model')
    .option('--models <models...>', 'Compare multiple models (space-separated)')
    .addOption(
      new Option('--task <task>', 'Task type for specialized prompting (default: general)').choices(TASK_TYPES),
    )
    .option('--ollama-url <url>', 'Inference server URL (default: http://localhost:11434)')
    .option('--timeout <seconds>', 'Request timeout in seconds (default: 120)', parseTimeoutOption)
    .option('--benchmark', 'Record response time and sizes to CSV and JSON logs')
    .option('--benchmark-dir <dir>', 'Directory for benchmark logs (default: benchmarks)')
    .addOption(new Option('--output-format <format>', 'Output format (default: text)').choices(['text', 'json']))
    .option('--verbose', 'Enable verbose logging')
    .option('--list-models', 'List available models and exit')
    .addHelpText(
      'after',
      `
Examples:
  chatty test.py "Find bugs" --task debug
  chatty main.py "Explain this code" --task explain --benchmark
  chatty utils.py "Review for optimization" --task optimize --compare-model llama2:7b-code

Task types:
${taskHelp}`,
    )
    .exitOverride();
}

/** Run the CLI and resolve with the process exit code. */
export async function main(argv: string[], io: Partial<CliIO> = {}): Promise<number> {
  const stdout = io.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const [file, question] = program.args;

  let config: CliConfig;
  try {
    config = buildConfig(
      {
        model: opts.model,
        compareModel: opts.compareModel,
        models: opts.models,
        task: opts.task,
        ollamaUrl: opts.ollamaUrl,
        timeout: opts.timeout,
        benchmark: opts.benchmark,
        benchmarkDir: opts.benchmarkDir,
        outputFormat: opts.outputFormat,
        verbose: opts.verbose,
      },
      io.env ?? process.env,
    );
  } catch (err) {
    if (err instanceof ConfigError) {
      (io.logger ?? createLogger()).error(err.message);
      return 1;
    }
    throw err;
  }

  const logger = io.logger ?? createLogger({ verbose: config.verbose });
  logger.verbose(`Endpoint: ${config.ollamaUrl}, task: ${config.task}, timeout: ${config.timeout}s`);

  if (opts.listModels) {
    const client = new InferenceClient({ baseUrl: config.ollamaUrl, logger });
    stdout(formatModelList(await client.listModels()));
    return 0;
  }

  if (!file || !question) {
    logger.error("missing required arguments 'file' and 'question'");
    return 1;
  }

  return ask(config, file, question, logger, stdout);
}

async function ask(
  config: CliConfig,
  file: string,
  question: string,
  logger: Logger,
  stdout: (text: string) => void,
): Promise<number> {
  logger.info(`📖 Reading file: ${file}`);
  let source: SourceFile;
  try {
    source = readSourceFile(file);
  } catch (err) {
    if (err instanceof InputError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
  logger.info(`📊 File size: ${source.size.toLocaleString('en-US')} bytes`);

  let recorder: BenchmarkRecorder | undefined;
  if (config.benchmark) {
    try {
      recorder = BenchmarkRecorder.open({ dir: config.benchmarkDir, logger });
      logger.verbose(`Benchmark session ${recorder.sessionId}`);
    } catch (err) {
      logger.warn(`Could not start benchmark session: ${errorMessage(err)}`);
    }
  }

  logger.info(`❓ Asking: ${question}`);
  logger.info(`🤖 Using task type: ${config.task}`);
  logger.info(`⏱️  Timeout: ${config.timeout}s (first inference may take 30-60s)`);

  const { models, comparison } = resolveModels(config);
  logger.info(comparison ? `🔬 Comparing models: ${models.join(', ')}` : `🤖 Using model: ${models[0]}`);

  const request: PromptRequest = {
    task: config.task,
    context: source.content,
    question,
    language: source.language,
  };

  try {
    const client = new InferenceClient({ baseUrl: config.ollamaUrl, recorder, logger });
    const report = await new ModelComparator(client, logger).compare(models, request, config.timeout);

    if (config.outputFormat === 'text') {
      stdout(`\n${WIDE_RULE}\n`);
    }
    stdout(
      formatOutput(report, {
        format: config.outputFormat,
        task: config.task,
        file,
        fileSize: source.size,
        comparison,
      }),
    );
  } finally {
    if (recorder) {
      const saved = recorder.close();
      if (saved.saved) {
        logger.info('📊 Benchmark data saved to:');
        logger.info(`   JSON: ${saved.jsonPath}`);
        logger.info(`   CSV: ${saved.csvPath}`);
      } else {
        logger.info(`📊 Benchmark rows kept in CSV only: ${saved.csvPath}`);
      }
    }
  }

  return 0;
}
