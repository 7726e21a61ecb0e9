/**
 * mdpress - Style Themes
 *
 * Static lookup tables mapping each element kind the converter emits to the
 * `class` attribute it carries. Themes are plain data so the rest of the
 * pipeline never builds class strings on the fly.
 */

export const STYLE_THEME_NAMES = ['plain', 'tailwind'] as const;

export type StyleThemeName = (typeof STYLE_THEME_NAMES)[number];

export const ELEMENT_KINDS = [
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'p',
  'ul',
  'ol',
  'li',
  'strong',
  'em',
  'a',
  'code',
  'byline',
  'byline-dates',
  'byline-text',
] as const;

export type ElementKind = (typeof ELEMENT_KINDS)[number];

const HEADER_KINDS: readonly ElementKind[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export type ClassTable = Partial<Record<ElementKind, string>>;

export interface StyleTheme {
  name: StyleThemeName;
  classes: ClassTable;
}

/**
 * Plain theme: bare tags, no class attributes at all.
 */
const plain: StyleTheme = {
  name: 'plain',
  classes: {},
};

const HEADER_TAIL = 'text-red-900 mb-5 font-black uppercase';
const BYLINE_TEXT = 'text-xs text-slate-500';

/**
 * Tailwind theme: utility classes for a stylesheet built with Tailwind CSS.
 * h1 and h2 get their own sizes, h3 to h6 share one.
 */
const tailwind: StyleTheme = {
  name: 'tailwind',
  classes: {
    h1: `text-6xl ${HEADER_TAIL}`,
    h2: `text-4xl ${HEADER_TAIL}`,
    h3: `text-2xl ${HEADER_TAIL}`,
    h4: `text-2xl ${HEADER_TAIL}`,
    h5: `text-2xl ${HEADER_TAIL}`,
    h6: `text-2xl ${HEADER_TAIL}`,
    p: 'mb-5 text-justify',
    ul: 'list-disc list-inside',
    ol: 'list-decimal list-inside',
    strong: 'font-bold',
    em: 'italic',
    a: 'underline',
    code: 'bg-slate-300',
    byline: 'flex flex-row justify-between mb-5',
    'byline-dates': 'flex flex-row gap-x-4',
    'byline-text': BYLINE_TEXT,
  },
};

export const STYLE_THEMES: Record<StyleThemeName, StyleTheme> = {
  plain,
  tailwind,
};

export const DEFAULT_THEME: StyleThemeName = 'tailwind';

export function isStyleThemeName(name: string): name is StyleThemeName {
  return STYLE_THEME_NAMES.some((theme) => theme === name);
}

/**
 * Resolved attribute strings for every element kind, built once per renderer.
 */
export type AttributeTable = Readonly<Record<ElementKind, string>>;

/**
 * Merge a theme with per-element overrides and precompute each element's
 * attribute string (` class="..."`, or empty when no class applies).
 *
 * An override of `''` removes the theme's class for that element.
 */
export function buildAttributeTable(
  themeName: StyleThemeName = DEFAULT_THEME,
  overrides: ClassTable = {},
): AttributeTable {
  const merged: ClassTable = { ...STYLE_THEMES[themeName].classes, ...overrides };
  const attr = (kind: ElementKind): string => {
    const cls = merged[kind]?.trim() ?? '';
    return cls ? ` class="${cls}"` : '';
  };
  return {
    h1: attr('h1'),
    h2: attr('h2'),
    h3: attr('h3'),
    h4: attr('h4'),
    h5: attr('h5'),
    h6: attr('h6'),
    p: attr('p'),
    ul: attr('ul'),
    ol: attr('ol'),
    li: attr('li'),
    strong: attr('strong'),
    em: attr('em'),
    a: attr('a'),
    code: attr('code'),
    byline: attr('byline'),
    'byline-dates': attr('byline-dates'),
    'byline-text': attr('byline-text'),
  };
}

/**
 * Attribute string for a header of the given level (clamped to 1..6).
 */
export function headerAttribute(attrs: AttributeTable, level: number): string {
  const clamped = Math.min(6, Math.max(1, level));
  return attrs[HEADER_KINDS[clamped - 1]];
}
