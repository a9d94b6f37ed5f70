import assert from 'node:assert/strict';
import * as path from 'path';
import { describe, it } from 'node:test';

import { loadCorpus } from '../pipeline/import/load-corpus';
import { enex, makeTempDir, writeFile } from './helpers/fixtures';

function buildCorpus(): string {
  const root = makeTempDir();
  writeFile(root, 'Cooking/Soup.enex', enex({ title: 'Soup', body: '<div>broth</div>' }));
  writeFile(root, 'Cooking/Broken.enex', enex({ title: 'Broken', body: '', omit: ['title'] }));
  writeFile(root, 'Cooking/Garbled.enex', '<en-export><note><title>x</title>');
  writeFile(root, 'Cooking/readme.txt', 'not an archive');
  writeFile(root, 'Work.stack/Projects/Kickoff.enex', enex({ title: 'Kickoff', body: '' }));
  writeFile(root, 'Work.stack/Inner.stack/Deep/Note.enex', enex({ title: 'Deep note', body: '' }));
  writeFile(root, 'Empty/.keep', '');
  return root;
}

describe('loadCorpus', () => {
  it('flattens stacks into notebooks and keys them relative to the root', (t) => {
    t.mock.method(console, 'log', () => {});
    t.mock.method(console, 'warn', () => {});
    const root = buildCorpus();

    const { notebooks } = loadCorpus(root);

    assert.deepEqual(
      notebooks.map((nb) => nb.key),
      ['Cooking', 'Empty', 'Work.stack/Inner.stack/Deep', 'Work.stack/Projects']
    );
    assert.deepEqual(
      notebooks.map((nb) => nb.notes.map((n) => n.key)),
      [['Cooking/Soup'], [], ['Work.stack/Inner.stack/Deep/Note'], ['Work.stack/Projects/Kickoff']]
    );
    assert.equal(notebooks[0].dir, path.join(root, 'Cooking'));
  });

  it('skips notes that fail to parse and keeps loading', (t) => {
    t.mock.method(console, 'log', () => {});
    const warn = t.mock.method(console, 'warn', () => {});
    const root = buildCorpus();

    const { skipped } = loadCorpus(root);

    assert.deepEqual(
      skipped.map((s) => path.basename(s.archivePath)),
      ['Broken.enex', 'Garbled.enex']
    );
    assert.match(skipped[0].reason, /missing or invalid required field\(s\): title/);
    assert.match(skipped[1].reason, /malformed archive/);
    assert.equal(warn.mock.callCount(), 2);
  });

  it('treats stacks as notebooks when the suffix is disabled', (t) => {
    t.mock.method(console, 'log', () => {});
    t.mock.method(console, 'warn', () => {});
    const root = buildCorpus();

    const { notebooks } = loadCorpus(root, { stackSuffix: '' });

    assert.deepEqual(
      notebooks.map((nb) => nb.key),
      ['Cooking', 'Empty', 'Work.stack']
    );
    assert.deepEqual(notebooks[2].notes, []);
  });
});
