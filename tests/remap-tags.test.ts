import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { remapTags, type RewriteRule } from '../pipeline/renderer/remap-tags';
import { element, type ContentElement } from '../pipeline/schema/content-tree';

const toSpan: RewriteRule = () => element('span', {}, { text: '[ ] ' });

function rules(entries: Array<[string, RewriteRule]>) {
  return new Map<string, RewriteRule>(entries);
}

describe('remapTags', () => {
  it('puts the replacement in the original slot and hands it the tail', () => {
    const root = element('en-note', {}, {
      text: 'A',
      children: [element('x', {}, { tail: ' mid ' }), element('todo', {}, { tail: ' after' }), element('y')],
    });

    const result = remapTags(root, rules([['todo', toSpan]]));

    assert.equal(result.root, root);
    assert.equal(result.replaced, 1);
    assert.deepEqual(
      root.children.map((c) => c.tag),
      ['x', 'span', 'y']
    );
    assert.equal(root.children[1].text, '[ ] ');
    assert.equal(root.children[1].tail, ' after');
  });

  it('drops a tail the replacement carried when the original had none', () => {
    const root = element('en-note', {}, { children: [element('todo')] });
    remapTags(root, rules([['todo', () => element('span', {}, { tail: 'stray' })]]));
    assert.equal('tail' in root.children[0], false);
  });

  it('leaves unregistered tags and no-op rules untouched', () => {
    const root = element('en-note', {}, {
      children: [element('div', { class: 'c' }, { text: 't', tail: 'u', children: [element('b', {}, { text: 'b' })] })],
    });
    const before = structuredClone(root);

    const result = remapTags(root, rules([['b', (el) => el]]));

    assert.deepEqual(root, before);
    assert.equal(result.replaced, 0);
  });

  it('logs a failing rule and keeps the element', (t) => {
    const warn = t.mock.method(console, 'warn', () => {});
    const good = element('a', { href: 'ok' });
    const bad = element('a');
    const root = element('en-note', {}, { children: [bad, good] });
    const rule: RewriteRule = (el) => {
      if (!el.attrs.href) throw new Error('no href');
      return element('a', { href: `${el.attrs.href}!` });
    };

    const result = remapTags(root, rules([['a', rule]]), { context: 'A/Note' });

    assert.equal(result.failed, 1);
    assert.equal(result.replaced, 1);
    assert.equal(root.children[0], bad);
    assert.equal(root.children[1].attrs.href, 'ok!');
    assert.equal(warn.mock.callCount(), 1);
    assert.equal(warn.mock.calls[0].arguments[0], '[remap] ⚠️  rule for <a> failed on <a> in A/Note: no href');
  });

  it('returns a replaced root', () => {
    const root = element('en-note', {}, { text: 'body' });
    const result = remapTags(root, rules([['en-note', (el) => element('article', {}, { text: el.text })]]));
    assert.equal(result.root.tag, 'article');
    assert.equal(result.root.text, 'body');
  });

  describe('parent map computed once per pass', () => {
    function nested(): ContentElement {
      return element('en-note', {}, { children: [element('p', {}, { children: [element('todo')] })] });
    }
    const pToDiv: RewriteRule = (el) => element('div', {}, { children: el.children });

    it('splices a nested rewrite into the detached original by default', () => {
      const root = nested();
      const result = remapTags(root, rules([['p', pToDiv], ['todo', toSpan]]));

      assert.equal(root.children[0].tag, 'div');
      assert.equal(root.children[0].children[0].tag, 'todo');
      assert.equal(result.replaced, 2);
    });

    it('reaches the output when parents are refreshed', () => {
      const root = nested();
      remapTags(root, rules([['p', pToDiv], ['todo', toSpan]]), { refreshParents: true });

      assert.equal(root.children[0].tag, 'div');
      assert.equal(root.children[0].children[0].tag, 'span');
    });

    it('cannot place elements created by an earlier rule', (t) => {
      const warn = t.mock.method(console, 'warn', () => {});
      const root = element('en-note', {}, { children: [element('todo')] });
      const chain = rules([
        ['todo', () => element('mark')],
        ['mark', () => element('b')],
      ]);

      const result = remapTags(root, chain);

      assert.equal(root.children[0].tag, 'mark');
      assert.equal(result.failed, 1);
      assert.equal(warn.mock.callCount(), 1);

      const refreshed = element('en-note', {}, { children: [element('todo')] });
      remapTags(refreshed, chain, { refreshParents: true });
      assert.equal(refreshed.children[0].tag, 'b');
    });
  });
});
