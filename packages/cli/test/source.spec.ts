import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InputError, languageFor, readSourceFile } from '../src/source';

describe('languageFor', () => {
  it('maps known extensions', () => {
    expect(languageFor('example.py')).toBe('python');
    expect(languageFor('src/App.TSX')).toBe('tsx');
    expect(languageFor('main.go')).toBe('go');
  });

  it('defaults to python', () => {
    expect(languageFor('Makefile')).toBe('python');
  });
});

describe('readSourceFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatty-source-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads content and measures bytes', () => {
    const file = path.join(dir, 'greet.ts');
    fs.writeFileSync(file, 'const s = "naïve";\n');

    expect(readSourceFile(file)).toEqual({
      path: file,
      content: 'const s = "naïve";\n',
      size: 20,
      language: 'typescript',
    });
  });

  it('throws InputError for a missing file', () => {
    const file = path.join(dir, 'nope.py');

    expect(() => readSourceFile(file)).toThrow(InputError);
    expect(() => readSourceFile(file)).toThrow(`File '${file}' does not exist`);
  });

  it('throws InputError for a path that cannot be read as a file', () => {
    expect(() => readSourceFile(dir)).toThrow(/^Could not read file /);
  });
});
