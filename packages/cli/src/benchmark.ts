/**
 * Benchmark session logs.
 *
 * One session writes two files into the benchmark directory:
 * `benchmark_<session>.csv`, appended and flushed row by row, and
 * `benchmark_<session>.json`, written once on close with every record of the
 * session. Both always hold the same records in the same order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, silentLogger, type Logger } from './logger';
import type { TaskType } from './prompts';

export interface BenchmarkRecord {
  timestamp: string;
  model: string;
  task_type: TaskType;
  /** Seconds */
  response_time: number;
  /** Bytes of source context */
  file_size: number;
  /** Bytes of the full prompt */
  prompt_length: number;
  /** Bytes of the response text */
  response_length: number;
  success: boolean;
  error_message: string;
}

export type BenchmarkEntry = Omit<BenchmarkRecord, 'timestamp'>;

export interface BenchmarkSessionLog {
  session_id: string;
  start_time: string;
  end_time?: string;
  benchmarks: BenchmarkRecord[];
}

export const CSV_COLUMNS = [
  'timestamp',
  'model',
  'task_type',
  'response_time',
  'file_size',
  'prompt_length',
  'response_length',
  'success',
  'error_message',
] as const satisfies ReadonlyArray<keyof BenchmarkRecord>;

export interface RecorderOptions {
  dir: string;
  logger?: Logger;
  /** Clock used for the session id and timestamps */
  now?: () => Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export function sessionIdFor(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Quote a CSV field when needed. Line breaks are folded so a record stays on one line. */
export function csvField(value: string | number | boolean): string {
  const text = String(value).replace(/\r\n|\r|\n/g, ' ');
  if (/[",]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsvRow(record: BenchmarkRecord): string {
  return CSV_COLUMNS.map((column) => csvField(record[column])).join(',');
}

export class BenchmarkRecorder {
  readonly sessionId: string;
  readonly csvPath: string;
  readonly jsonPath: string;

  private readonly log: BenchmarkSessionLog;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private fd: number | undefined;

  private constructor(options: RecorderOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());

    const started = this.now();
    this.sessionId = sessionIdFor(started);
    this.csvPath = path.join(options.dir, `benchmark_${this.sessionId}.csv`);
    this.jsonPath = path.join(options.dir, `benchmark_${this.sessionId}.json`);
    this.log = {
      session_id: this.sessionId,
      start_time: started.toISOString(),
      benchmarks: [],
    };

    fs.mkdirSync(options.dir, { recursive: true });
    this.fd = fs.openSync(this.csvPath, 'w');
    fs.writeSync(this.fd, `${CSV_COLUMNS.join(',')}\n`);
  }

  /** Start a session: creates the directory if absent and writes the CSV header. */
  static open(options: RecorderOptions): BenchmarkRecorder {
    return new BenchmarkRecorder(options);
  }

  get count(): number {
    return this.log.benchmarks.length;
  }

  get records(): readonly BenchmarkRecord[] {
    return this.log.benchmarks;
  }

  record(entry: BenchmarkEntry): BenchmarkRecord {
    if (this.fd === undefined) {
      throw new Error(`Benchmark session ${this.sessionId} is closed`);
    }
    const record: BenchmarkRecord = { timestamp: this.now().toISOString(), ...entry };
    this.log.benchmarks.push(record);
    fs.writeSync(this.fd, `${toCsvRow(record)}\n`);
    return record;
  }

  /**
   * Write the JSON session log and release the CSV handle. A failed JSON
   * write is reported as a warning; CSV rows already written stay on disk.
   */
  close(): { csvPath: string; jsonPath: string; saved: boolean } {
    let saved = false;
    this.log.end_time = this.now().toISOString();
    try {
      fs.writeFileSync(this.jsonPath, JSON.stringify(this.log, null, 2));
      saved = true;
    } catch (err) {
      this.logger.warn(`Could not save benchmark data: ${errorMessage(err)}`);
    }

    if (this.fd !== undefined) {
      fs.closeSync(this.fd);
      this.fd = undefined;
    }
    return { csvPath: this.csvPath, jsonPath: this.jsonPath, saved };
  }
}
