/**
 * Content tree
 *
 * In-memory shape of a note's ENML body. Mirrors the classic element-tree model:
 * - `text` is the text before the first child
 * - `tail` is the text after the element's end tag, still owned by the parent
 *
 * Parent links are NOT stored on elements; rewrite passes derive a parent map when they need one.
 */

export interface ContentElement {
  tag: string;
  attrs: Record<string, string>;
  text?: string;
  tail?: string;
  children: ContentElement[];
}

export type ParentMap = Map<ContentElement, ContentElement>;

export function element(
  tag: string,
  attrs: Record<string, string> = {},
  opts: { text?: string; tail?: string; children?: ContentElement[] } = {}
): ContentElement {
  const el: ContentElement = { tag, attrs: { ...attrs }, children: opts.children ? [...opts.children] : [] };
  if (opts.text != null) el.text = opts.text;
  if (opts.tail != null) el.tail = opts.tail;
  return el;
}

/** Depth-first, document order, root included. */
export function* iterElements(root: ContentElement): Generator<ContentElement> {
  yield root;
  for (const child of root.children) yield* iterElements(child);
}

export function findAll(root: ContentElement, tag: string): ContentElement[] {
  const out: ContentElement[] = [];
  for (const el of iterElements(root)) {
    if (el.tag === tag) out.push(el);
  }
  return out;
}

export function buildParentMap(root: ContentElement): ParentMap {
  const parents: ParentMap = new Map();
  for (const el of iterElements(root)) {
    for (const child of el.children) parents.set(child, el);
  }
  return parents;
}

/**
 * Concatenated text of an element and its descendants (children's tails included,
 * the element's own tail excluded).
 */
export function textContent(el: ContentElement): string {
  let out = el.text ?? '';
  for (const child of el.children) {
    out += textContent(child);
    out += child.tail ?? '';
  }
  return out;
}

/** Short, log-friendly description of an element: `<a href="...">`. */
export function describeElement(el: ContentElement): string {
  const attrs = Object.entries(el.attrs)
    .map(([k, v]) => ` ${k}="${v}"`)
    .join('');
  return `<${el.tag}${attrs}>`;
}
