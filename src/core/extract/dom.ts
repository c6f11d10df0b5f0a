// src/core/extract/dom.ts
import * as cheerio from 'cheerio';
import type { AnyNode, Element } from 'domhandler';

// htmlparser2 mode keeps the document as written: no synthesized <html>/<body>
export const HTML_OPTIONS: cheerio.CheerioOptions = {
  xml: {
    xmlMode: false,
    decodeEntities: true,
  },
};

// Bound to an empty document; only used to wrap nodes that live elsewhere
const $detached = cheerio.load('', HTML_OPTIONS);

export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html, HTML_OPTIONS);
}

/** Inner HTML of `element`. */
export function serializeChildren(element: Element): string {
  return $detached.html(element.children);
}

export function textOf(element: Element): string {
  return $detached.text([element]);
}

export function detachNode(node: AnyNode): void {
  $detached(node).remove();
}
