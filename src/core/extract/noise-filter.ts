// src/core/extract/noise-filter.ts
import { cloneNode, isComment, isTag, type Element } from 'domhandler';
import type { RenderedPageHandle } from '../render/types.js';
import { describeError } from '../errors.js';
import { detachNode } from './dom.js';
import { NOISE_RULES, matchNoiseRule, type NoiseRule } from './noise-rules.js';

export class NoiseFilter {
  constructor(private readonly rules: readonly NoiseRule[] = NOISE_RULES) {}

  /**
   * Returns a copy of `root` without noise elements or comments. `root` itself
   * is kept as-is and the input tree is left untouched.
   */
  filter(root: Element): Element {
    const copy = cloneNode(root, true);
    this.prune(copy);
    return copy;
  }

  private prune(parent: Element): void {
    for (const child of [...parent.children]) {
      if (isComment(child)) {
        detachNode(child);
        continue;
      }
      if (!isTag(child)) {
        continue;
      }
      if (matchNoiseRule(child.name, name => child.attribs[name], this.rules)) {
        // Whole subtree goes; descendants are not looked at
        detachNode(child);
        continue;
      }
      this.prune(child);
    }
  }
}

interface SerializedRule {
  tags: string[];
  attributes: string[];
  patterns: Array<{ source: string; flags: string }>;
}

export function buildNoiseRemovalScript(rules: readonly NoiseRule[] = NOISE_RULES): string {
  const serialized: SerializedRule[] = rules.map(rule => ({
    tags: [...(rule.tags ?? [])],
    attributes: [...(rule.attributes ?? [])],
    patterns: (rule.patterns ?? []).map(pattern => ({ source: pattern.source, flags: pattern.flags })),
  }));

  return `(() => {
  const rules = ${JSON.stringify(serialized)}.map(rule => ({
    tags: rule.tags,
    attributes: rule.attributes,
    patterns: rule.patterns.map(p => new RegExp(p.source, p.flags)),
  }));
  const matches = el => rules.some(rule =>
    rule.tags.includes(el.localName) ||
    rule.attributes.some(name => {
      const value = el.getAttribute(name);
      return value !== null && rule.patterns.some(p => p.test(value));
    })
  );
  let removed = 0;
  const visit = parent => {
    for (const child of Array.from(parent.children)) {
      if (matches(child)) {
        child.remove();
        removed++;
      } else {
        visit(child);
      }
    }
  };
  if (document.body) visit(document.body);
  return removed;
})()`;
}

/**
 * Applies the same rules to the live DOM. Best-effort: it runs after the page
 * source is read, so it only reduces the body text; failures are logged and ignored.
 */
export async function removeNoiseFromPage(
  handle: RenderedPageHandle,
  rules: readonly NoiseRule[] = NOISE_RULES,
  verbose = false
): Promise<number> {
  try {
    const removed = await handle.executeScript(buildNoiseRemovalScript(rules));
    const count = typeof removed === 'number' ? removed : 0;
    if (verbose) {
      console.error(`[DEBUG] Removed ${count} noise elements from live DOM`);
    }
    return count;
  } catch (error) {
    console.error(`[INFO] Live DOM cleanup skipped: ${describeError(error)}`);
    return 0;
  }
}
