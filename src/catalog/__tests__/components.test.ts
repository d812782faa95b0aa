import { describe, expect, it } from 'vitest';

import {
  componentContext,
  filterCategory,
  findComponent,
  flattenComponents,
  parseCatalogJson,
} from '../components.js';
import { CatalogError } from '../errors.js';
import { parseInputDocument } from '../../schema/inputs.js';

const CATALOG = {
  library: {
    browser: [
      { task: 'OpenBrowser', category: 'PLAYWRIGHT', ports: { in: ['url'] } },
      { task: 'ClickElement', category: ' playwright ' },
    ],
    text: {
      nested: [{ task: 'SplitText', category: 'STRINGS' }],
    },
  },
  meta: { version: 3 },
  broken: { task: 42 },
  extra: [{ task: 'Untagged' }],
};

describe('flattenComponents', () => {
  it('collects components in document order', () => {
    const tasks = flattenComponents(CATALOG).map((c) => c.task);

    expect(tasks).toEqual(['OpenBrowser', 'ClickElement', 'SplitText', 'Untagged']);
  });

  it('keeps every field of a component', () => {
    const [first] = flattenComponents(CATALOG);

    expect(first).toEqual({
      task: 'OpenBrowser',
      category: 'PLAYWRIGHT',
      ports: { in: ['url'] },
    });
  });

  it('does not descend into components', () => {
    const data = [{ task: 'Outer', children: [{ task: 'Inner' }] }];

    expect(flattenComponents(data).map((c) => c.task)).toEqual(['Outer']);
  });

  it('returns nothing for scalars', () => {
    expect(flattenComponents('text')).toEqual([]);
    expect(flattenComponents(null)).toEqual([]);
  });
});

describe('findComponent', () => {
  const components = flattenComponents(CATALOG);

  it('matches the task name ignoring case', () => {
    expect(findComponent(components, 'clickelement').task).toBe('ClickElement');
  });

  it('throws CatalogError when absent', () => {
    expect(() => findComponent(components, 'Teleport')).toThrow(CatalogError);
    expect(() => findComponent(components, 'Teleport')).toThrow(
      'Component not found: Teleport',
    );
  });
});

describe('filterCategory', () => {
  it('matches trimmed categories ignoring case', () => {
    const tasks = filterCategory(flattenComponents(CATALOG), '  Playwright').map(
      (c) => c.task,
    );

    expect(tasks).toEqual(['OpenBrowser', 'ClickElement']);
  });

  it('treats a missing category as empty', () => {
    const tasks = filterCategory(flattenComponents(CATALOG), '').map((c) => c.task);

    expect(tasks).toEqual(['Untagged']);
  });
});

describe('componentContext', () => {
  it('exposes task and category', () => {
    expect(componentContext({ task: 'Untagged' })).toEqual({
      comp_info_category: '',
      comp_info_task: 'Untagged',
    });
  });
});

describe('parseCatalogJson', () => {
  it('wraps syntax errors', () => {
    expect(() => parseCatalogJson('<html>')).toThrow(CatalogError);
  });
});

describe('parseInputDocument', () => {
  it('fills missing category data fields with empty values', () => {
    expect(
      parseInputDocument('category_data', '{"screenshot_links":["a.png"]}'),
    ).toEqual({
      category_info: [],
      readme_template: '',
      screenshot_links: ['a.png'],
    });
  });

  it('reads component paths', () => {
    expect(
      parseInputDocument(
        'component_paths',
        '{"url":"https://catalog.test/api","file_path":"lib/open.py"}',
      ),
    ).toEqual({ url: 'https://catalog.test/api', file_path: 'lib/open.py' });
  });
});
