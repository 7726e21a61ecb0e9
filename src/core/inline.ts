/**
 * Inline formatter.
 *
 * Turns emphasis, image, link and code markers inside a single line into HTML
 * tags. Rules run in a fixed order and each one makes a single global pass
 * over the output of the rules before it.
 *
 * @module core/inline
 */
import type { AttributeTable } from './styles.js';

export type InlineRuleName = 'bold' | 'italic' | 'image' | 'link' | 'code';

export interface InlineRule {
  name: InlineRuleName;
  pattern: RegExp;
  replace: (match: string, ...groups: string[]) => string;
}

/**
 * Build the ordered rule list for an attribute table.
 *
 * The order matters:
 * 1. Bold before italic, or `*` would eat half of each `**` pair
 * 2. Image before link, since an image is a link with a leading `!`
 * 3. Inline code last
 */
export function buildInlineRules(attrs: AttributeTable): readonly InlineRule[] {
  return [
    {
      name: 'bold',
      pattern: /\*\*(.+?)\*\*/g,
      replace: (_m, text) => `<strong${attrs.strong}>${text}</strong>`,
    },
    {
      name: 'italic',
      pattern: /\*(.+?)\*/g,
      replace: (_m, text) => `<em${attrs.em}>${text}</em>`,
    },
    {
      name: 'image',
      pattern: /!\[(.+?)\]\((.+?)\)/g,
      replace: (_m, alt, src) => `<img src="${src}" alt="${alt}" />`,
    },
    {
      name: 'link',
      pattern: /\[(.+?)\]\((.+?)\)/g,
      replace: (_m, text, href) => `<a href="${href}"${attrs.a}>${text}</a>`,
    },
    {
      name: 'code',
      pattern: /`(.*?)`/g,
      replace: (_m, text) => `<code${attrs.code}>${text}</code>`,
    },
  ];
}

/**
 * Apply every rule to one line of text.
 *
 * Content is passed through as-is: HTML special characters are not escaped.
 *
 * @example
 * ```ts
 * const rules = buildInlineRules(buildAttributeTable('plain'));
 * formatInline('Hello **world**', rules); // 'Hello <strong>world</strong>'
 * ```
 */
export function formatInline(line: string, rules: readonly InlineRule[]): string {
  let result = line;
  for (const rule of rules) {
    result = result.replace(rule.pattern, rule.replace);
  }
  return result;
}
