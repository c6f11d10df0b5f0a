// src/core/export/__tests__/markdown.test.ts
import { isTag, type Element } from 'domhandler';
import { MarkdownRenderer, type MarkdownOptions } from '../markdown.js';
import { loadHtml } from '../../extract/dom.js';

const bodyOf = (html: string): Element => {
  const body = loadHtml(`<body>${html}</body>`)('body').toArray().find(isTag);
  if (!body) {
    throw new Error('fixture has no body');
  }
  return body;
};

const render = (html: string, options?: MarkdownOptions): string =>
  new MarkdownRenderer(options).render(bodyOf(html));

describe('MarkdownRenderer', () => {
  describe('headings', () => {
    it('caps heading depth at level 3 by default', () => {
      expect(render('<h1>Title</h1><h5>Deep</h5>')).toBe('# Title\n\n### Deep');
    });

    it('honours a custom cap', () => {
      expect(render('<h1>Title</h1><h5>Deep</h5>', { maxHeadingLevel: 6 })).toBe('# Title\n\n##### Deep');
      expect(render('<h2>Title</h2><h3>Deep</h3>', { maxHeadingLevel: 1 })).toBe('# Title\n\n# Deep');
    });

    it('drops empty headings', () => {
      expect(render('<h2>  </h2><p>Body</p>')).toBe('Body');
    });
  });

  describe('inline formatting', () => {
    it('renders emphasis', () => {
      expect(render('<p>Some <strong>bold</strong> and <em>soft</em> text</p>')).toBe(
        'Some **bold** and *soft* text'
      );
      expect(render('<p><del>old</del> <b>new</b></p>')).toBe('~~old~~ **new**');
    });

    it('renders links and strips script links', () => {
      expect(render('<p>See <a href="https://example.com/docs">the docs</a>.</p>')).toBe(
        'See [the docs](https://example.com/docs).'
      );
      expect(render('<p><a href="javascript:void(0)">Click</a></p>')).toBe('Click');
      expect(render('<p><a>Anchor</a></p>')).toBe('Anchor');
    });

    it('renders images with lazy-load sources', () => {
      expect(render('<p><img alt="Chart" data-src="//cdn.example.com/c.png" src="data:image/gif;base64,R0"></p>')).toBe(
        '![Chart](https://cdn.example.com/c.png)'
      );
      expect(render('<p><img src="data:image/gif;base64,R0"></p><p>After</p>')).toBe('After');
    });

    it('renders inline code and line breaks', () => {
      expect(render('<p>Run <code>npm test</code> now</p>')).toBe('Run `npm test` now');
      expect(render('<p>Line one<br>Line two</p>')).toBe('Line one\nLine two');
    });

    it('collapses whitespace in text', () => {
      expect(render('<p>\n  Hello\n  world\n</p>')).toBe('Hello world');
    });

    it('escapes markdown syntax in literal text', () => {
      expect(render('<p>*not emphasis* and snake_case</p>')).toBe('\\*not emphasis\\* and snake\\_case');
      expect(render('<p>See [draft] and `tick`</p>')).toBe('See \\[draft\\] and \\`tick\\`');
      expect(render('<p>Use <code>a_b*c</code></p>')).toBe('Use `a_b*c`');
    });

    it('escapes text that would start a heading or list', () => {
      expect(render('<p># Not a heading</p>')).toBe('\\# Not a heading');
      expect(render('<p>1. item</p>')).toBe('1\\. item');
      expect(render('<p>- dash</p><p>Issue #4</p>')).toBe('\\- dash\n\nIssue #4');
    });
  });

  describe('blocks', () => {
    it('renders nested lists', () => {
      expect(render('<ul><li>One</li><li>Two<ul><li>Inner</li></ul></li></ul>')).toBe(
        '- One\n- Two\n  - Inner'
      );
    });

    it('numbers ordered lists from their start attribute', () => {
      expect(render('<ol start="3"><li>Three</li><li>Four</li></ol>')).toBe('3. Three\n4. Four');
    });

    it('fences code blocks with their language', () => {
      expect(render('<pre><code class="language-TS">const x = 1;\nconsole.log(x);</code></pre>')).toBe(
        '```ts\nconst x = 1;\nconsole.log(x);\n```'
      );
    });

    it('quotes blockquotes line by line', () => {
      expect(render('<blockquote><p>Quoted</p><p>Again</p></blockquote>')).toBe('> Quoted\n>\n> Again');
    });

    it('renders tables with a header separator', () => {
      const html =
        '<table><thead><tr><th>Name</th><th>Qty</th></tr></thead>' +
        '<tbody><tr><td>Pen</td><td>2</td></tr><tr><td>Ink</td></tr></tbody></table>';

      expect(render(html)).toBe('| Name | Qty |\n| --- | --- |\n| Pen | 2 |\n| Ink |  |');
    });

    it('skips form controls and scripts', () => {
      expect(render('<p>Keep</p><script>x()</script><button>Press</button>')).toBe('Keep');
    });
  });

  describe('normalization', () => {
    it('never leaves more than one blank line', () => {
      const markdown = render('<div><p>A</p><div></div><p>B</p></div><hr><p>C</p>');

      expect(markdown).toBe('A\n\nB\n\n---\n\nC');
      expect(markdown).not.toContain('\n\n\n');
    });

    it('is deterministic', () => {
      const html = '<h2>Notes</h2><ul><li>First</li><li>Second</li></ul><p>Done</p>';

      expect(render(html)).toBe(render(html));
      expect(render(html)).toBe('## Notes\n\n- First\n- Second\n\nDone');
    });

    it('returns an empty string for empty content', () => {
      expect(render('')).toBe('');
    });
  });
});
