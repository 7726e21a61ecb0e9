import {
  buildAttributeTable,
  headerAttribute,
  isStyleThemeName,
  ELEMENT_KINDS,
  STYLE_THEMES,
} from '../../src/core/styles';
import type { StyleThemeName } from '../../src/core/styles';

// ---------------------------------------------------------------------------
// STYLE_THEMES registry
// ---------------------------------------------------------------------------

describe('STYLE_THEMES', () => {
  it('contains the plain and tailwind themes', () => {
    expect(Object.keys(STYLE_THEMES)).toEqual(['plain', 'tailwind']);
  });

  it.each(['plain', 'tailwind'] as StyleThemeName[])('%s theme is registered under its own name', (name) => {
    expect(STYLE_THEMES[name].name).toBe(name);
  });

  it('plain theme defines no classes', () => {
    expect(STYLE_THEMES.plain.classes).toEqual({});
  });
});

// ---------------------------------------------------------------------------
// buildAttributeTable
// ---------------------------------------------------------------------------

describe('buildAttributeTable', () => {
  it('has an entry for every element kind', () => {
    const table = buildAttributeTable('plain');
    expect(Object.keys(table).sort()).toEqual([...ELEMENT_KINDS].sort());
    for (const kind of ELEMENT_KINDS) {
      expect(table[kind]).toBe('');
    }
  });

  it('defaults to the tailwind theme', () => {
    const table = buildAttributeTable();
    expect(table.p).toBe(' class="mb-5 text-justify"');
    expect(table.li).toBe('');
  });

  it('applies overrides on top of the theme', () => {
    const table = buildAttributeTable('tailwind', { p: 'prose', li: ' item ' });
    expect(table.p).toBe(' class="prose"');
    expect(table.li).toBe(' class="item"');
    expect(table.ul).toBe(' class="list-disc list-inside"');
  });

  it('removes a class with an empty override', () => {
    expect(buildAttributeTable('tailwind', { a: '' }).a).toBe('');
  });
});

describe('headerAttribute', () => {
  const table = buildAttributeTable('tailwind');

  it.each([
    [1, ' class="text-6xl text-red-900 mb-5 font-black uppercase"'],
    [2, ' class="text-4xl text-red-900 mb-5 font-black uppercase"'],
    [3, ' class="text-2xl text-red-900 mb-5 font-black uppercase"'],
    [6, ' class="text-2xl text-red-900 mb-5 font-black uppercase"'],
  ])('level %i', (level, expected) => {
    expect(headerAttribute(table, level)).toBe(expected);
  });

  it('clamps out-of-range levels', () => {
    expect(headerAttribute(table, 0)).toBe(table.h1);
    expect(headerAttribute(table, 9)).toBe(table.h6);
  });
});

describe('isStyleThemeName', () => {
  it('accepts known themes only', () => {
    expect(isStyleThemeName('plain')).toBe(true);
    expect(isStyleThemeName('tailwind')).toBe(true);
    expect(isStyleThemeName('fancy')).toBe(false);
    expect(isStyleThemeName('toString')).toBe(false);
  });
});
