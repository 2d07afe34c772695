/**
 * Ollama generate client with per-call benchmarking.
 */

import axios, { AxiosError } from 'axios';
import type { BenchmarkRecorder } from './benchmark';
import { MAX_TIMEOUT_SECONDS } from './config';
import { errorMessage, silentLogger, type Logger } from './logger';
import { buildPrompt, type PromptRequest } from './prompts';
import { byteLength } from './source';

export interface InferenceOutcome {
  readonly model: string;
  readonly elapsedMs: number;
  readonly success: boolean;
  readonly response: string;
  /** Empty on success */
  readonly error: string;
}

export interface ModelInfo {
  name: string;
  size?: number;
  family?: string;
  parameterSize?: string;
}

interface GenerateResponse {
  response?: unknown;
}

interface TagsResponse {
  models?: Array<{
    name?: unknown;
    size?: number;
    details?: { family?: string; parameter_size?: string };
  }>;
}

export const FALLBACK_MODELS = ['deepseek-coder', 'codellama', 'llama2:7b-code'];
export const NO_RESPONSE_TEXT = 'No response from endpoint';

const LIST_MODELS_TIMEOUT_MS = 5_000;
const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface InferenceClientOptions {
  baseUrl: string;
  recorder?: BenchmarkRecorder;
  logger?: Logger;
}

/** Strip trailing slashes and a trailing `/api/generate` from a configured URL. */
export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').replace(/\/api\/generate$/, '');
}

export class InferenceClient {
  readonly baseUrl: string;
  private readonly recorder?: BenchmarkRecorder;
  private readonly logger: Logger;

  constructor(options: InferenceClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.recorder = options.recorder;
    this.logger = options.logger ?? silentLogger;
  }

  /** Build the prompt for `request` and send it to `model`. */
  async ask(request: PromptRequest, model: string, timeoutSeconds: number): Promise<InferenceOutcome> {
    return this.send(buildPrompt(request), model, timeoutSeconds, request);
  }

  /**
   * One POST to `/api/generate`, never retried. Failures are returned as an
   * unsuccessful outcome, not thrown. With a recorder attached every call
   * writes exactly one benchmark record.
   */
  async send(
    prompt: string,
    model: string,
    timeoutSeconds: number,
    meta: Pick<PromptRequest, 'task' | 'context'>,
  ): Promise<InferenceOutcome> {
    const timeoutMs = Math.min(timeoutSeconds, MAX_TIMEOUT_SECONDS) * 1000;
    const startedAt = Date.now();

    let signal: AbortSignal | undefined;
    let success = false;
    let response: string;
    let error = '';

    try {
      signal = AbortSignal.timeout(timeoutMs);
      const res = await axios.post<string>(
        `${this.baseUrl}/api/generate`,
        { model, prompt, stream: false },
        { timeout: timeoutMs, signal, responseType: 'text' },
      );
      response = extractResponse(res.data);
      success = true;
    } catch (err) {
      error = this.classifyError(err, timeoutSeconds, signal?.aborted ?? false);
      response = `Error: ${error}`;
    }

    const elapsedMs = Date.now() - startedAt;
    this.logger.verbose(`${model} answered in ${elapsedMs}ms (success=${success})`);

    this.recorder?.record({
      model,
      task_type: meta.task,
      response_time: elapsedMs / 1000,
      file_size: byteLength(meta.context),
      prompt_length: byteLength(prompt),
      response_length: byteLength(response),
      success,
      error_message: error,
    });

    return Object.freeze({ model, elapsedMs, success, response, error });
  }

  /** Models installed on the server, or a fixed fallback list when discovery fails. */
  async listModels(): Promise<ModelInfo[]> {
    try {
      const res = await axios.get<TagsResponse>(`${this.baseUrl}/api/tags`, {
        timeout: LIST_MODELS_TIMEOUT_MS,
      });
      const models = res.data?.models;
      if (!Array.isArray(models)) {
        throw new Error('Malformed /api/tags response');
      }
      return models.flatMap((m) =>
        typeof m.name === 'string'
          ? [{ name: m.name, size: m.size, family: m.details?.family, parameterSize: m.details?.parameter_size }]
          : [],
      );
    } catch (err) {
      this.logger.warn(`Could not fetch model list: ${errorMessage(err)}`);
      return FALLBACK_MODELS.map((name) => ({ name }));
    }
  }

  private classifyError(err: unknown, timeoutSeconds: number, timedOut: boolean): string {
    if (err instanceof AxiosError) {
      if (err.code && UNREACHABLE_CODES.has(err.code)) {
        return `Cannot connect to endpoint at ${this.baseUrl}. Make sure the inference server is running`;
      }
      if ((err.code && TIMEOUT_CODES.has(err.code)) || timedOut) {
        return `Request timed out after ${timeoutSeconds} seconds. Try increasing it with --timeout`;
      }
      if (err.response) {
        return `Endpoint returned error: ${err.response.status} - ${stringifyBody(err.response.data)}`;
      }
    }
    return `Error communicating with endpoint: ${errorMessage(err)}`;
  }
}

function extractResponse(body: string): string {
  const parsed: GenerateResponse | null = JSON.parse(body);
  if (parsed && typeof parsed.response === 'string') {
    return parsed.response;
  }
  return NO_RESPONSE_TEXT;
}

function stringifyBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data) ?? '';
  } catch {
    return String(data);
  }
}
