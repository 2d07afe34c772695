import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './logger';

export interface SourceFile {
  path: string;
  content: string;
  /** UTF-8 byte length of the content */
  size: number;
  /** Fence language tag used in prompts */
  language: string;
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'jsx',
  '.ts': 'typescript',
  '.tsx': 'tsx',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.kt': 'kotlin',
  '.rb': 'ruby',
  '.php': 'php',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.swift': 'swift',
  '.sh': 'bash',
  '.sql': 'sql',
};

export function languageFor(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'python';
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/** Read the file to analyze. Throws `InputError` when it is missing or unreadable. */
export function readSourceFile(filePath: string): SourceFile {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`File '${filePath}' does not exist`);
  }
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new InputError(`Could not read file '${filePath}': ${errorMessage(err)}`);
  }
  return {
    path: filePath,
    content,
    size: byteLength(content),
    language: languageFor(filePath),
  };
}
