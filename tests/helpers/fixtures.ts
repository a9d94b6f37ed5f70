import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export type RequiredField = 'title' | 'content' | 'created' | 'note-attributes';

export interface EnexOptions {
  title: string;
  /** Inner ENML of <en-note> */
  body: string;
  created?: string;
  attributes?: string;
  omit?: RequiredField[];
}

function escapeXml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function internalHref(guid: string): string {
  return `evernote:///view/1234/s1/${guid}/${guid}/`;
}

export function enml(body: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    '<!DOCTYPE en-note SYSTEM "http://xml.evernote.com/pub/enml2.dtd">' +
    `<en-note>${body}</en-note>`
  );
}

export function enex(opts: EnexOptions): string {
  const omit = new Set(opts.omit ?? []);
  const fields: string[] = [];
  if (!omit.has('title')) fields.push(`    <title>${escapeXml(opts.title)}</title>`);
  if (!omit.has('content')) fields.push(`    <content><![CDATA[${enml(opts.body)}]]></content>`);
  if (!omit.has('created')) fields.push(`    <created>${opts.created ?? '20240115T100000Z'}</created>`);
  if (!omit.has('note-attributes')) {
    fields.push(`    <note-attributes>${opts.attributes ?? '<author>test-author</author>'}</note-attributes>`);
  }
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE en-export SYSTEM "http://xml.evernote.com/pub/evernote-export3.dtd">',
    '<en-export export-date="20240201T000000Z" application="Evernote" version="10.0">',
    '  <note>',
    ...fields,
    '  </note>',
    '</en-export>',
    '',
  ].join('\n');
}

export function makeTempDir(prefix = 'notes-export-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(root: string, rel: string, content: string): string {
  const abs = path.join(root, ...rel.split('/'));
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content, 'utf8');
  return abs;
}
