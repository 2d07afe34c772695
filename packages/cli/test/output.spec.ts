import { describe, expect, it } from 'vitest';
import type { InferenceOutcome } from '../src/client';
import { formatModelList, formatOutput, NARROW_RULE, WIDE_RULE } from '../src/output';

const ok: InferenceOutcome = { model: 'a', elapsedMs: 1500, success: true, response: 'Looks fine.', error: '' };
const failed: InferenceOutcome = {
  model: 'b',
  elapsedMs: 20,
  success: false,
  response: 'Error: Endpoint returned error: 500 - boom',
  error: 'Endpoint returned error: 500 - boom',
};

const ctx = { format: 'text' as const, task: 'debug' as const, file: 'example.py', fileSize: 84 };

describe('formatOutput', () => {
  it('renders a single successful answer', () => {
    const text = formatOutput(new Map([['a', ok]]), { ...ctx, comparison: false });

    expect(text).toBe(
      ['⏱️  Response time: 1.50s', '✅ Model: a (debug task)', '', NARROW_RULE, '', 'Looks fine.', '', WIDE_RULE].join('\n'),
    );
  });

  it('renders a single failure with its error', () => {
    const text = formatOutput(new Map([['b', failed]]), { ...ctx, comparison: false });

    expect(text.split('\n')[0]).toBe('❌ Error: Endpoint returned error: 500 - boom');
  });

  it('renders every model of a comparison in order', () => {
    const text = formatOutput(
      new Map([
        ['a', ok],
        ['b', failed],
      ]),
      { ...ctx, comparison: true },
    );

    expect(text).toBe(
      [
        '📊 COMPARISON RESULTS:',
        WIDE_RULE,
        '',
        '🤖 Model: a',
        '⏱️  Response time: 1.50s',
        '✅ Success: true',
        NARROW_RULE,
        'Looks fine.',
        WIDE_RULE,
        '',
        '🤖 Model: b',
        '⏱️  Response time: 0.02s',
        '✅ Success: false',
        NARROW_RULE,
        'Error: Endpoint returned error: 500 - boom',
        WIDE_RULE,
      ].join('\n'),
    );
  });

  it('renders JSON', () => {
    const text = formatOutput(
      new Map([
        ['a', ok],
        ['b', failed],
      ]),
      { ...ctx, format: 'json', comparison: true },
    );

    expect(JSON.parse(text)).toEqual({
      task: 'debug',
      file: 'example.py',
      fileSize: 84,
      results: [
        { model: 'a', success: true, responseTime: 1.5, response: 'Looks fine.', error: '' },
        {
          model: 'b',
          success: false,
          responseTime: 0.02,
          response: 'Error: Endpoint returned error: 500 - boom',
          error: 'Endpoint returned error: 500 - boom',
        },
      ],
    });
  });
});

describe('formatModelList', () => {
  it('lists names with size details when known', () => {
    expect(
      formatModelList([
        { name: 'deepseek-coder:6.7b', family: 'llama', parameterSize: '7B', size: 3 * 1024 ** 3 },
        { name: 'qwen2.5-coder', family: 'qwen2' },
        { name: 'codellama' },
      ]),
    ).toBe(
      ['Available models:', '  - deepseek-coder:6.7b (llama, 7B, 3.0GB)', '  - qwen2.5-coder (qwen2)', '  - codellama'].join(
        '\n',
      ),
    );
  });
});
