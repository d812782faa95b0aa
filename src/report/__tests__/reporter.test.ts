import { describe, expect, it } from 'vitest';

import type { WorkflowResult } from '../../workflow/runner.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../reporter.js';

const RUN: WorkflowResult = {
  name: 'readme',
  ok: false,
  context: {},
  steps: [
    {
      index: 0,
      type: 'open',
      description: 'Open https://catalog.test',
      ok: true,
      durationMs: 400,
      value: 'https://catalog.test/',
    },
    {
      index: 1,
      type: 'extract_category',
      description: 'Extract category PLAYWRIGHT',
      ok: true,
      durationMs: 20,
      value: [{ task: 'OpenBrowser' }],
    },
    {
      index: 2,
      type: 'click',
      description: 'Click a|b',
      ok: false,
      durationMs: 1_600,
      error: 'Timeout\nwaiting',
    },
  ],
};

describe('generateJSON', () => {
  it('keeps string values and errors only', () => {
    const output = generateJSON(RUN, 1);

    expect(output.durationMs).toBe(2_020);
    expect(output.steps[0]?.value).toBe('https://catalog.test/');
    expect(output.steps[1]).not.toHaveProperty('value');
    expect(output.steps[2]?.error).toBe('Timeout\nwaiting');
  });
});

describe('serializeJSON', () => {
  it('sorts keys at every level', () => {
    const text = serializeJSON(generateJSON({ ...RUN, steps: [] }, 0));

    expect(text).toBe(
      [
        '{',
        '  "durationMs": 0,',
        '  "exitCode": 0,',
        '  "ok": false,',
        '  "steps": [],',
        '  "version": 1,',
        '  "workflow": "readme"',
        '}',
      ].join('\n'),
    );
  });
});

describe('generateMarkdown', () => {
  it('renders one row per step with escaped cells', () => {
    const markdown = generateMarkdown(RUN);

    expect(markdown).toContain('| **Result** | **FAILED** |');
    expect(markdown).toContain('| **Duration** | 2.0s |');
    expect(markdown).toContain(
      '| 3 | Click a\\|b | [FAIL] | 1.6s | Timeout waiting |',
    );
    expect(markdown).toContain('| 1 | Open https://catalog.test | [OK] | 400ms |  |');
  });
});
