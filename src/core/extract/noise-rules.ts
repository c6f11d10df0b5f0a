// src/core/extract/noise-rules.ts

export interface NoiseRule {
  readonly name: string;
  readonly tags?: readonly string[];
  readonly attributes?: readonly string[];
  readonly patterns?: readonly RegExp[];
}

// Matches a word inside class/id values delimited by start/end, whitespace, '-' or '_'
function token(word: string): RegExp {
  return new RegExp(`(?:^|[\\s_-])${word}(?:$|[\\s_-])`, 'i');
}

// Same, but the word must end its class name: `page-overlay`, not `image-overlay-caption`
function lastToken(word: string): RegExp {
  return new RegExp(`(?:^|[\\s_-])${word}(?:$|\\s)`, 'i');
}

export const NOISE_RULES: readonly NoiseRule[] = Object.freeze([
  {
    name: 'landmarks',
    tags: ['header', 'nav', 'footer', 'aside'],
  },
  {
    name: 'scripts',
    tags: ['script', 'style', 'noscript', 'template', 'iframe'],
  },
  {
    name: 'landmark-roles',
    attributes: ['role'],
    patterns: [/^(?:navigation|banner|contentinfo|complementary|dialog|alertdialog)$/i],
  },
  {
    name: 'advertising',
    attributes: ['class', 'id'],
    patterns: [token('ads?'), /advert/i, /sponsor/i, token('promo')],
  },
  {
    name: 'overlays',
    attributes: ['class', 'id'],
    patterns: [token('modal'), lastToken('overlay'), token('popup'), token('lightbox')],
  },
  {
    name: 'modal-dialogs',
    attributes: ['aria-modal'],
    patterns: [/^true$/i],
  },
  {
    name: 'cookie-consent',
    attributes: ['class', 'id'],
    patterns: [
      token('cookies?[-_]?(?:banner|bar|notice|consent|popup|policy|law|message|notification)'),
      token('consent'),
      token('gdpr'),
    ],
  },
]);

export type AttributeReader = (name: string) => string | null | undefined;

/** Returns the first rule the element matches, if any. */
export function matchNoiseRule(
  tagName: string,
  readAttribute: AttributeReader,
  rules: readonly NoiseRule[] = NOISE_RULES
): NoiseRule | undefined {
  const tag = tagName.toLowerCase();
  return rules.find(rule => {
    if (rule.tags?.includes(tag)) {
      return true;
    }
    const patterns = rule.patterns ?? [];
    return (rule.attributes ?? []).some(attribute => {
      const value = readAttribute(attribute);
      return typeof value === 'string' && patterns.some(pattern => pattern.test(value));
    });
  });
}
