// src/core/extract/content-isolator.ts
import { isTag, type Element } from 'domhandler';
import { ErrorCode, PipelineError } from '../errors.js';
import { loadHtml } from './dom.js';

export interface ContentStrategy {
  readonly name: string;
  readonly selector: string;
}

/** Tried top-to-bottom; the first strategy with a match wins. */
export const CONTENT_STRATEGIES: readonly ContentStrategy[] = Object.freeze([
  { name: 'main-landmark', selector: 'main, [role="main"]' },
  { name: 'article', selector: 'article, [role="article"]' },
  { name: 'body', selector: 'body' },
]);

export interface IsolatedContent {
  content: Element;
  strategy: string;
}

export class ContentIsolator {
  constructor(private readonly strategies: readonly ContentStrategy[] = CONTENT_STRATEGIES) {}

  isolate(html: string): IsolatedContent {
    const $ = loadHtml(html);

    for (const strategy of this.strategies) {
      // Selector lists match in document order, so this is the earliest hit
      const content = $(strategy.selector).toArray().find(isTag);
      if (content) {
        return { content, strategy: strategy.name };
      }
    }

    throw new PipelineError(
      ErrorCode.CONTENT_NOT_FOUND,
      'isolate',
      'No content region found: the document has no main, article or body element',
      {
        suggestion: 'Check that the page rendered an HTML document',
        context: { htmlLength: html.length },
      }
    );
  }
}
