/**
 * Block segmenter.
 *
 * Walks the document body line by line and groups lines into header,
 * paragraph, list and fenced code blocks. Inline formatting and list nesting
 * are delegated to the inline formatter and the list stack.
 *
 * @module core/segmenter
 */
import { formatInline } from './inline.js';
import type { InlineRule } from './inline.js';
import { ListStack, matchListItem } from './list-stack.js';
import { headerAttribute } from './styles.js';
import type { AttributeTable } from './styles.js';
import type { Block, BlockKind, Fragment, FragmentKind, SegmentResult } from './types.js';

const FENCE = '```';
const HEADER_RE = /^(#{1,6})\s(.+)$/;

const BLOCK_KIND_BY_FRAGMENT: Record<FragmentKind, BlockKind> = {
  header: 'header',
  list: 'list',
  'list-end': 'list',
  text: 'paragraph',
};

interface OpenFence {
  language: string;
  lines: string[];
  /** 1-based line number of the opening fence within the body. */
  openedAt: number;
}

/**
 * Per-call segmentation state. A new instance is created for every document,
 * so the list stack always starts empty.
 */
class Segmenter {
  private readonly blocks: Block[] = [];
  private readonly diagnostics: string[] = [];
  private readonly stack: ListStack;
  private buffer: Fragment[] = [];
  private fence: OpenFence | null = null;

  constructor(
    private readonly attrs: AttributeTable,
    private readonly rules: readonly InlineRule[],
  ) {
    this.stack = new ListStack(attrs);
  }

  run(lines: string[]): SegmentResult {
    for (let i = 0; i < lines.length; i++) {
      this.consume(lines[i], i, lines[i + 1]);
    }

    if (this.fence) {
      const count = this.fence.lines.length;
      this.diagnostics.push(
        `Unterminated code fence opened at line ${this.fence.openedAt}; ` +
          `${count} line${count === 1 ? '' : 's'} dropped`,
      );
      this.fence = null;
    }
    this.flush();
    this.closeLists();

    return { blocks: this.blocks, diagnostics: this.diagnostics };
  }

  private consume(line: string, index: number, nextLine: string | undefined): void {
    if (line.trim().startsWith(FENCE)) {
      this.toggleFence(line, index);
      return;
    }

    if (this.fence) {
      this.fence.lines.push(line);
      return;
    }

    if (line.trim() === '') {
      this.flush();
      const nextIsItem = nextLine !== undefined && matchListItem(nextLine) !== null;
      if (!this.stack.isEmpty && !nextIsItem) {
        this.closeLists();
      }
      return;
    }

    const header = HEADER_RE.exec(line);
    if (header) {
      const level = header[1].length;
      const text = formatInline(header[2], this.rules);
      this.append('header', `<h${level}${headerAttribute(this.attrs, level)}>${text}</h${level}>`);
      return;
    }

    const item = matchListItem(line);
    if (item) {
      if (this.buffer.some((fragment) => fragment.kind !== 'list')) {
        this.flush();
      }
      const itemHtml = formatInline(item.content, this.rules);
      this.buffer.push({
        kind: 'list',
        html: this.stack.push(item.indent, item.ordered, itemHtml).join('\n'),
      });
      return;
    }

    this.append('text', formatInline(line, this.rules));
  }

  /**
   * Buffer a header or text fragment. Open lists are closed first and their
   * closing tags travel with the line in one `list-end` fragment.
   */
  private append(kind: 'header' | 'text', html: string): void {
    const closing = this.stack.closeAll();
    if (closing.length > 0) {
      this.buffer.push({ kind: 'list-end', html: `${closing.join('\n')}\n${html}` });
      return;
    }
    this.buffer.push({ kind, html });
  }

  private toggleFence(line: string, index: number): void {
    if (!this.fence) {
      this.flush();
      this.closeLists();
      this.fence = {
        language: line.trim().slice(FENCE.length).trim(),
        lines: [],
        openedAt: index + 1,
      };
      return;
    }

    const { language, lines } = this.fence;
    this.blocks.push({
      kind: 'code',
      html: `<pre><code class="language-${language}">${lines.join('\n')}</code></pre>`,
    });
    this.fence = null;
  }

  /**
   * Emit the pending fragments as one block. The first fragment decides the
   * block kind; only text is wrapped in a paragraph.
   */
  private flush(): void {
    if (this.buffer.length === 0) return;

    let html = '';
    let previous: FragmentKind | null = null;
    for (const fragment of this.buffer) {
      if (previous !== null) {
        const breaks = previous === 'list' || fragment.kind === 'list' || fragment.kind === 'list-end';
        html += breaks ? '\n' : ' ';
      }
      html += fragment.html;
      previous = fragment.kind;
    }

    const kind = BLOCK_KIND_BY_FRAGMENT[this.buffer[0].kind];
    this.blocks.push({
      kind,
      html: kind === 'paragraph' ? `<p${this.attrs.p}>${html}</p>` : html,
    });
    this.buffer = [];
  }

  private closeLists(): void {
    const tags = this.stack.closeAll();
    if (tags.length > 0) {
      this.blocks.push({ kind: 'list', html: tags.join('\n') });
    }
  }
}

/**
 * Split a document body into HTML blocks.
 *
 * Never throws on malformed input: an unclosed fence swallows the rest of the
 * document and is reported in `diagnostics` instead.
 *
 * @param body  - Document body (front matter already removed), `\n` line endings.
 * @param attrs - Attribute table of the active style theme.
 * @param rules - Inline rules built from the same table.
 */
export function segmentBlocks(
  body: string,
  attrs: AttributeTable,
  rules: readonly InlineRule[],
): SegmentResult {
  return new Segmenter(attrs, rules).run(body.split('\n'));
}
