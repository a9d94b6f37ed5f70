import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  buildParentMap,
  describeElement,
  element,
  findAll,
  iterElements,
  textContent,
} from '../pipeline/schema/content-tree';

function sampleTree() {
  const italic = element('i', {}, { text: 'it', tail: '.' });
  const link = element('a', { href: 'x' }, { text: 'lnk', tail: '!', children: [italic] });
  const bold = element('b', {}, { text: 'bold', tail: ' and ' });
  const root = element('en-note', {}, { text: 'Hi ', children: [bold, link] });
  return { root, bold, link, italic };
}

describe('content tree', () => {
  it('iterates in document order, root first', () => {
    const { root } = sampleTree();
    assert.deepEqual(
      Array.from(iterElements(root)).map((e) => e.tag),
      ['en-note', 'b', 'a', 'i']
    );
  });

  it('finds elements by tag at any depth', () => {
    const { root, italic } = sampleTree();
    assert.deepEqual(findAll(root, 'i'), [italic]);
    assert.deepEqual(findAll(root, 'table'), []);
  });

  it('builds a child -> parent map', () => {
    const { root, link, italic, bold } = sampleTree();
    const parents = buildParentMap(root);
    assert.equal(parents.get(italic), link);
    assert.equal(parents.get(bold), root);
    assert.equal(parents.get(root), undefined);
  });

  it('concatenates descendant text without the own tail', () => {
    const { root, link } = sampleTree();
    assert.equal(textContent(link), 'lnkit.');
    assert.equal(textContent(root), 'Hi bold and lnkit.!');
  });

  it('copies attributes and children arrays on construction', () => {
    const attrs = { href: 'x' };
    const kids = [element('b')];
    const el = element('a', attrs, { children: kids });
    attrs.href = 'y';
    kids.push(element('i'));
    assert.equal(el.attrs.href, 'x');
    assert.equal(el.children.length, 1);
    assert.equal('text' in el, false);
  });

  it('describes an element for log lines', () => {
    const { link } = sampleTree();
    assert.equal(describeElement(link), '<a href="x">');
  });
});
