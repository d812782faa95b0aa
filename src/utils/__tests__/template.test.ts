import { describe, expect, it } from 'vitest';

import { formatTemplate, TemplateError } from '../template.js';

describe('formatTemplate', () => {
  it('fills placeholders from vars', () => {
    expect(
      formatTemplate("[data-task='{comp_info_task}'] .{cls}", {
        comp_info_task: 'OpenBrowser',
        cls: 'node',
      }),
    ).toBe("[data-task='OpenBrowser'] .node");
  });

  it('leaves text without braces untouched', () => {
    expect(formatTemplate('#submit > span', {})).toBe('#submit > span');
  });

  it('turns doubled braces into literal ones', () => {
    expect(formatTemplate('{{"q": "{term}"}}', { term: 'button' })).toBe(
      '{"q": "button"}',
    );
  });

  it('rejects unknown placeholders', () => {
    expect(() => formatTemplate('#{missing}', {})).toThrow(
      'Unknown placeholder "{missing}" in template "#{missing}"',
    );
  });

  it('rejects stray braces', () => {
    expect(() => formatTemplate('a { b', {})).toThrow(TemplateError);
    expect(() => formatTemplate('a { b', {})).toThrow(
      'Unbalanced "{" in template "a { b"',
    );
  });

  it('rejects placeholders that are not plain names', () => {
    expect(() => formatTemplate('{a b}', { 'a b': 'x' })).toThrow(
      'Invalid placeholder "{a b}"',
    );
  });
});
