// src/core/export/markdown.ts
import { isTag, isText, type ChildNode, type Element } from 'domhandler';
import { DEFAULT_MAX_HEADING_LEVEL } from '../config/constants.js';
import { textOf } from '../extract/dom.js';

export interface MarkdownOptions {
  /** Deeper headings are rendered at this level. 1-6. */
  maxHeadingLevel?: number;
}

const BLOCK_TAGS = new Set([
  'address', 'article', 'body', 'dd', 'details', 'div', 'dl', 'dt', 'fieldset',
  'figcaption', 'figure', 'form', 'html', 'main', 'p', 'section', 'summary',
]);

const SKIPPED_TAGS = new Set([
  'button', 'head', 'iframe', 'input', 'link', 'meta', 'noscript', 'script',
  'select', 'style', 'svg', 'template', 'textarea', 'title',
]);

export class MarkdownRenderer {
  private readonly maxHeadingLevel: number;

  constructor(options: MarkdownOptions = {}) {
    const level = options.maxHeadingLevel ?? DEFAULT_MAX_HEADING_LEVEL;
    this.maxHeadingLevel = Math.min(6, Math.max(1, Math.floor(level)));
  }

  /** Renders the children of `root`; `root` itself contributes no markup. */
  render(root: Element): string {
    return this.normalize(this.renderChildren(root));
  }

  private renderChildren(parent: Element): string {
    let output = '';
    for (const child of parent.children) {
      let chunk = this.renderNode(child);
      // Text right after a block boundary never starts with a space
      if (isText(child) && (output === '' || output.endsWith('\n'))) {
        chunk = escapeLineStart(chunk.trimStart());
      }
      output += chunk;
    }
    return output;
  }

  private renderNode(node: ChildNode): string {
    if (isText(node)) {
      return escapeInline(node.data.replace(/\s+/g, ' '));
    }
    if (isTag(node)) {
      return this.renderElement(node);
    }
    return '';
  }

  private renderElement(element: Element): string {
    const tagName = element.name.toLowerCase();
    if (SKIPPED_TAGS.has(tagName)) {
      return '';
    }

    const heading = /^h([1-6])$/.exec(tagName);
    if (heading) {
      return this.heading(element, Number(heading[1]));
    }

    switch (tagName) {
      case 'br':
        return '\n';
      case 'hr':
        return block('---');
      case 'strong':
      case 'b':
        return this.wrapInline(element, '**');
      case 'em':
      case 'i':
        return this.wrapInline(element, '*');
      case 'del':
      case 's':
      case 'strike':
        return this.wrapInline(element, '~~');
      case 'code':
        return this.inlineCode(element);
      case 'pre':
        return this.codeBlock(element);
      case 'a':
        return this.link(element);
      case 'img':
        return this.image(element);
      case 'ul':
      case 'ol':
        return block(this.list(element));
      case 'blockquote':
        return this.blockquote(element);
      case 'table':
        return this.table(element);
      default:
        if (BLOCK_TAGS.has(tagName)) {
          return block(this.renderChildren(element).trim());
        }
        return this.renderChildren(element);
    }
  }

  private heading(element: Element, level: number): string {
    const content = collapse(this.renderChildren(element));
    if (!content) {
      return '';
    }
    const clamped = Math.min(level, this.maxHeadingLevel);
    return block(`${'#'.repeat(clamped)} ${content}`);
  }

  private wrapInline(element: Element, marker: string): string {
    const { leading, core, trailing } = splitWhitespace(this.renderChildren(element));
    if (!core) {
      return leading + trailing;
    }
    return `${leading}${marker}${core}${marker}${trailing}`;
  }

  private inlineCode(element: Element): string {
    const code = textOf(element).replace(/\s+/g, ' ');
    if (!code.trim()) {
      return code;
    }
    const fence = code.includes('`') ? '``' : '`';
    return `${fence}${code}${fence}`;
  }

  private codeBlock(element: Element): string {
    const codeElement = element.children.find(
      (child): child is Element => isTag(child) && child.name === 'code'
    );
    const language = detectLanguage(codeElement?.attribs.class ?? element.attribs.class ?? '');
    const code = textOf(codeElement ?? element)
      .replace(/\r\n?/g, '\n')
      .replace(/^\n+|\n+$/g, '');
    if (!code.trim()) {
      return '';
    }
    return block('```' + language + '\n' + code + '\n```');
  }

  private link(element: Element): string {
    const { leading, core, trailing } = splitWhitespace(this.renderChildren(element));
    const text = collapse(core);
    if (!text) {
      return leading + trailing;
    }
    const href = element.attribs.href?.trim();
    if (!href || href.toLowerCase().startsWith('javascript:')) {
      return `${leading}${text}${trailing}`;
    }
    return `${leading}[${text}](${href})${trailing}`;
  }

  private image(element: Element): string {
    const src = extractImageUrl(element);
    if (!src) {
      return '';
    }
    const alt = collapse(element.attribs.alt ?? '');
    return `![${alt}](${src})`;
  }

  private list(element: Element): string {
    const ordered = element.name.toLowerCase() === 'ol';
    const start = Number.parseInt(element.attribs.start ?? '1', 10);
    let index = Number.isNaN(start) ? 1 : start;

    const items: string[] = [];
    for (const child of element.children) {
      if (!isTag(child) || child.name.toLowerCase() !== 'li') {
        continue;
      }
      const content = this.renderChildren(child).trim().replace(/\n{2,}/g, '\n');
      if (!content) {
        continue;
      }
      const marker = ordered ? `${index}. ` : '- ';
      index++;
      const indent = ' '.repeat(marker.length);
      const lines = content.split('\n');
      items.push(
        [marker + lines[0], ...lines.slice(1).map(line => (line ? indent + line : line))].join('\n')
      );
    }
    return items.join('\n');
  }

  private blockquote(element: Element): string {
    const content = this.normalize(this.renderChildren(element));
    if (!content) {
      return '';
    }
    return block(
      content
        .split('\n')
        .map(line => (line ? `> ${line}` : '>'))
        .join('\n')
    );
  }

  private table(element: Element): string {
    const rows = collectRows(element).map(row =>
      row.children
        .filter((cell): cell is Element => isTag(cell) && (cell.name === 'td' || cell.name === 'th'))
        .map(cell => collapse(this.renderChildren(cell)).replace(/\|/g, '\\|'))
    );
    const width = Math.max(0, ...rows.map(cells => cells.length));
    if (rows.length === 0 || width === 0) {
      return '';
    }

    const formatRow = (cells: string[]): string => {
      const padded = [...cells, ...Array<string>(width - cells.length).fill('')];
      return `| ${padded.join(' | ')} |`;
    };
    const [header, ...body] = rows;
    const lines = [
      formatRow(header),
      formatRow(Array<string>(width).fill('---')),
      ...body.map(formatRow),
    ];
    return block(lines.join('\n'));
  }

  private normalize(markdown: string): string {
    return markdown
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t]+$/gm, '')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}

function block(content: string): string {
  return content ? `\n\n${content}\n\n` : '';
}

function escapeInline(text: string): string {
  return text.replace(/[\\`*_[\]]/g, '\\$&');
}

// Literal text that would otherwise read as a heading, list item or quote
function escapeLineStart(text: string): string {
  return text
    .replace(/^(#{1,6})(?=\s|$)/, '\\$1')
    .replace(/^([-+>])(?=\s)/, '\\$1')
    .replace(/^(\d+)([.)])(?=\s|$)/, '$1\\$2');
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function splitWhitespace(text: string): { leading: string; core: string; trailing: string } {
  const leading = /^\s*/.exec(text)?.[0] ?? '';
  const core = text.trim();
  const trailing = core ? /\s*$/.exec(text)?.[0] ?? '' : '';
  return { leading: leading ? ' ' : '', core, trailing: trailing ? ' ' : '' };
}

function collectRows(element: Element): Element[] {
  const rows: Element[] = [];
  for (const child of element.children) {
    if (!isTag(child)) continue;
    if (child.name === 'tr') {
      rows.push(child);
    } else if (child.name === 'thead' || child.name === 'tbody' || child.name === 'tfoot') {
      rows.push(...collectRows(child));
    }
  }
  return rows;
}

function extractImageUrl(element: Element): string | undefined {
  const src = element.attribs['data-src'] || element.attribs['data-original'] || element.attribs.src || '';
  if (!src || src.startsWith('data:')) return undefined;
  if (src.startsWith('//')) {
    return `https:${src}`;
  }
  return src;
}

/**
 * Detects the code language from a class string such as `language-ts` or
 * `lang-python`.
 */
function detectLanguage(className: string): string {
  const match = /(?:^|\s)(?:language|lang)-([\w.+#-]+)/i.exec(className);
  return match ? match[1].toLowerCase() : '';
}
