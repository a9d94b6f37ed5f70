/**
 * Tag remapping engine.
 *
 * Rules are a capability table: tag name -> rewrite function. For each registered tag, in
 * registration order, every matching element (document order, any depth) is handed to its
 * rule. A rule returns the same element (no-op) or a replacement; a replacement takes over
 * the original's tail and its slot among the parent's children.
 *
 * Ordering constraint: the parent map is computed ONCE per pass, before any substitution.
 * A rule that runs after an earlier substitution sees the pre-rewrite parent links:
 * - an element nested under an already-replaced element is spliced into the detached
 *   original, so its rewrite does not reach the output
 * - an element inserted by an earlier substitution has no parent entry (logged, left as is)
 * `refreshParents: true` rebuilds the map before each tag. It changes output in those cases,
 * which is why it is opt-in.
 */

import {
  buildParentMap,
  describeElement,
  findAll,
  type ContentElement,
  type ParentMap,
} from '../schema/content-tree';
import { errorMessage } from '../lib/errors';

export type RewriteRule = (el: ContentElement, root: ContentElement) => ContentElement;

export type RewriteRules = ReadonlyMap<string, RewriteRule>;

export interface RemapOptions {
  refreshParents?: boolean;
  /** Prefix for log lines (usually the note's identity key) */
  context?: string;
}

export interface RemapResult {
  root: ContentElement;
  replaced: number;
  failed: number;
}

export function remapTags(root: ContentElement, rules: RewriteRules, opts: RemapOptions = {}): RemapResult {
  const where = opts.context ? ` in ${opts.context}` : '';
  let current = root;
  let parents: ParentMap = buildParentMap(current);
  let replaced = 0;
  let failed = 0;

  for (const [tag, rule] of rules) {
    if (opts.refreshParents && replaced > 0) parents = buildParentMap(current);

    for (const el of findAll(current, tag)) {
      let next: ContentElement;
      try {
        next = rule(el, current);
      } catch (err) {
        failed++;
        console.warn(`[remap] ⚠️  rule for <${tag}> failed on ${describeElement(el)}${where}: ${errorMessage(err)}`);
        continue;
      }
      if (next === el) continue;

      if (el.tail != null) next.tail = el.tail;
      else delete next.tail;

      if (el === current) {
        current = next;
        replaced++;
        continue;
      }

      const parent = parents.get(el);
      const idx = parent ? parent.children.indexOf(el) : -1;
      if (!parent || idx === -1) {
        failed++;
        console.warn(`[remap] ⚠️  no parent for ${describeElement(el)}${where}; left unrewritten`);
        continue;
      }

      parent.children.splice(idx, 0, next);
      parent.children.splice(idx + 1, 1);
      replaced++;
    }
  }

  return { root: current, replaced, failed };
}
