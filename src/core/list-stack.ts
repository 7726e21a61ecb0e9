/**
 * List stack manager.
 *
 * Tracks open `<ul>`/`<ol>` contexts by indentation and computes the tags to
 * emit as the indentation of successive list items changes.
 *
 * @module core/list-stack
 */
import type { AttributeTable } from './styles.js';
import type { ListFrame } from './types.js';

const UNORDERED_ITEM_RE = /^(\s*)[-*]\s(.+)$/;
const ORDERED_ITEM_RE = /^(\s*)\d+\.\s(.+)$/;

export interface ListItemLine {
  indent: number;
  ordered: boolean;
  content: string;
}

/**
 * Match a line against the unordered (`-`, `*`) and ordered (`1.`) item
 * patterns.
 *
 * @returns The item's indent, kind and raw content, or `null` for any other line.
 */
export function matchListItem(line: string): ListItemLine | null {
  const unordered = UNORDERED_ITEM_RE.exec(line);
  if (unordered) {
    return { indent: unordered[1].length, ordered: false, content: unordered[2] };
  }
  const ordered = ORDERED_ITEM_RE.exec(line);
  if (ordered) {
    return { indent: ordered[1].length, ordered: true, content: ordered[2] };
  }
  return null;
}

export class ListStack {
  private readonly frames: ListFrame[] = [];

  constructor(private readonly attrs: AttributeTable) {}

  get depth(): number {
    return this.frames.length;
  }

  get isEmpty(): boolean {
    return this.frames.length === 0;
  }

  /** Copy of the open frames, bottom first. */
  snapshot(): ListFrame[] {
    return this.frames.map((frame) => ({ ...frame }));
  }

  /**
   * Emit the lines for one list item.
   *
   * Deeper frames are closed first. A new frame opens only when the item is
   * indented further than the current top; at equal indent the existing
   * frame is reused even if the marker kind differs.
   *
   * @param itemHtml - Already inline-formatted item content.
   */
  push(indent: number, ordered: boolean, itemHtml: string): string[] {
    const lines: string[] = [];

    let top = this.frames.at(-1);
    while (top !== undefined && top.indent > indent) {
      lines.push(this.closeTag(top));
      this.frames.pop();
      top = this.frames.at(-1);
    }

    if (top === undefined || top.indent < indent) {
      const frame: ListFrame = { indent, ordered };
      this.frames.push(frame);
      lines.push(this.openTag(frame));
    }

    lines.push(`<li${this.attrs.li}>${itemHtml}</li>`);
    return lines;
  }

  /**
   * Pop every open frame.
   *
   * @returns Closing tags, innermost first. Empty when nothing was open.
   */
  closeAll(): string[] {
    const lines: string[] = [];
    let frame = this.frames.pop();
    while (frame !== undefined) {
      lines.push(this.closeTag(frame));
      frame = this.frames.pop();
    }
    return lines;
  }

  private openTag(frame: ListFrame): string {
    return frame.ordered ? `<ol${this.attrs.ol}>` : `<ul${this.attrs.ul}>`;
  }

  private closeTag(frame: ListFrame): string {
    return frame.ordered ? '</ol>' : '</ul>';
  }
}
