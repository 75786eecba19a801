import { describe, it, expect } from 'vitest';

import { treeFromHtml } from '../../test/support/dom.js';
import { findNode, flattenTree, formatContextTree, frameDescriptors } from './tree.js';

const PAGE =
  '<html><body><h1>Hello</h1><input id="q" name="q" placeholder="Search"><img src="x.png"></body></html>';

describe('context tree', () => {
  const tree = treeFromHtml(PAGE);

  it('keeps every element in pre-order', () => {
    expect(flattenTree(tree).map((n) => `${n.id} ${n.descriptor.tag}`)).toEqual([
      '0:0 html',
      '0:1 body',
      '0:2 h1',
      '0:3 input',
      '0:4 img',
    ]);
  });

  it('finds nodes by id', () => {
    expect(findNode(tree, '0:3')?.descriptor.attributes['name']).toBe('q');
    expect(findNode(tree, '9:9')).toBeUndefined();
  });

  it('returns no descriptors for an unknown frame', () => {
    expect(frameDescriptors(tree, 'checkout')).toEqual([]);
    expect(frameDescriptors(tree, null)).toHaveLength(5);
  });

  it('records the capture time and url', () => {
    expect(tree.capturedAt).toBe('2026-01-15T10:00:00.000Z');
    expect(tree.url).toBe('https://example.test/');
  });
});

describe('formatContextTree', () => {
  const tree = treeFromHtml(PAGE);

  it('lists only relevant nodes', () => {
    expect(formatContextTree(tree)).toBe(
      [
        '# frame: main (https://example.test/)',
        '[0:2] <h1> Hello',
        '[0:3] <input id="q" name="q" placeholder="Search">',
        '[0:4] <img> (visual-only)',
      ].join('\n'),
    );
  });

  it('truncates past the node budget', () => {
    expect(formatContextTree(tree, { maxNodes: 2 }).split('\n')).toEqual([
      '# frame: main (https://example.test/)',
      '[0:2] <h1> Hello',
      '[0:3] <input id="q" name="q" placeholder="Search">',
      '... 1 more elements omitted',
    ]);
  });

  it('indents relevant descendants under relevant ancestors', () => {
    const nested = treeFromHtml(
      '<html><body><button id="menu">Menu <span>3</span></button></body></html>',
    );
    expect(formatContextTree(nested).split('\n').slice(1)).toEqual([
      '[0:2] <button id="menu"> Menu 3',
      '  [0:3] <span> 3',
    ]);
  });
});
