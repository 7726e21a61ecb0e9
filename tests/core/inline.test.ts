import { buildInlineRules, formatInline } from '../../src/core/inline';
import { buildAttributeTable } from '../../src/core/styles';

const plainRules = buildInlineRules(buildAttributeTable('plain'));
const tailwindRules = buildInlineRules(buildAttributeTable('tailwind'));

function plain(line: string): string {
  return formatInline(line, plainRules);
}

describe('buildInlineRules', () => {
  it('orders bold before italic and image before link, code last', () => {
    expect(plainRules.map((rule) => rule.name)).toEqual(['bold', 'italic', 'image', 'link', 'code']);
  });
});

describe('formatInline', () => {
  it('renders bold text', () => {
    expect(plain('Hello **world**')).toBe('Hello <strong>world</strong>');
  });

  it('renders italic text next to bold text', () => {
    expect(plain('*a* and **b**')).toBe('<em>a</em> and <strong>b</strong>');
  });

  it('matches the shortest span for each pair', () => {
    expect(plain('**a** b **c**')).toBe('<strong>a</strong> b <strong>c</strong>');
  });

  it('renders images', () => {
    expect(plain('![logo](img/logo.png)')).toBe('<img src="img/logo.png" alt="logo" />');
  });

  it('renders links', () => {
    expect(plain('see [docs](https://example.com)')).toBe(
      'see <a href="https://example.com">docs</a>',
    );
  });

  it('does not mistake an image for a link', () => {
    expect(plain('![a](b.png) [c](d)')).toBe('<img src="b.png" alt="a" /> <a href="d">c</a>');
  });

  it('renders inline code', () => {
    expect(plain('run `npm test` now')).toBe('run <code>npm test</code> now');
  });

  it('renders an empty code span', () => {
    expect(plain('a `` b')).toBe('a <code></code> b');
  });

  it('applies later rules to the output of earlier ones', () => {
    expect(plain('**`x`**')).toBe('<strong><code>x</code></strong>');
  });

  it('leaves unmatched delimiters alone', () => {
    expect(plain('a * b')).toBe('a * b');
    expect(plain('**open')).toBe('**open');
  });

  it('passes HTML through without escaping', () => {
    expect(plain('<b>raw</b> & co')).toBe('<b>raw</b> & co');
  });

  it('adds theme classes', () => {
    expect(formatInline('x **y** *z* [t](u) `c`', tailwindRules)).toBe(
      'x <strong class="font-bold">y</strong> <em class="italic">z</em> ' +
        '<a href="u" class="underline">t</a> <code class="bg-slate-300">c</code>',
    );
  });
});
