import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { loadWorkflowFile, parseWorkflow } from '../loader.js';

const YAML_WORKFLOW = `
name: playwright-readme
headless: true
vars:
  category: PLAYWRIGHT
steps:
  - type: open
    url: https://catalog.test/components
  - type: click
    target: "#load-more"
  - type: fill
    target:
      strategy: label
      value: Search
    text: "{category}"
  - type: extract_category
    category: "{category}"
`;

describe('parseWorkflow', () => {
  it('applies defaults and expands string targets', () => {
    const workflow = parseWorkflow(YAML_WORKFLOW, 'yaml');

    expect(workflow.name).toBe('playwright-readme');
    expect(workflow.headless).toBe(true);
    expect(workflow.vars).toEqual({ category: 'PLAYWRIGHT' });
    expect(workflow.steps).toHaveLength(4);
    expect(workflow.steps[1]).toEqual({
      type: 'click',
      target: { strategy: 'css', value: '#load-more' },
      double: false,
      continueOnError: false,
    });
    expect(workflow.steps[2]).toEqual({
      type: 'fill',
      target: { strategy: 'label', value: 'Search' },
      text: '{category}',
      sequential: false,
      delay: 0,
      continueOnError: false,
    });
  });

  it('rejects unknown step types', () => {
    const raw = JSON.stringify({
      name: 'bad',
      steps: [{ type: 'teleport' }],
    });

    expect(() => parseWorkflow(raw, 'json')).toThrow(ZodError);
  });

  it('requires at least one step', () => {
    expect(() => parseWorkflow('{"name":"empty","steps":[]}', 'json')).toThrow(
      ZodError,
    );
  });
});

describe('loadWorkflowFile', () => {
  it('reads JSON files by extension', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'pageline-config-'));
    const file = path.join(dir, 'flow.json');
    await writeFile(
      file,
      JSON.stringify({ name: 'json-flow', steps: [{ type: 'close' }] }),
      'utf-8',
    );

    const workflow = await loadWorkflowFile(file);

    expect(workflow.headless).toBe(false);
    expect(workflow.vars).toEqual({});
    expect(workflow.steps).toEqual([{ type: 'close', continueOnError: false }]);
  });
});
