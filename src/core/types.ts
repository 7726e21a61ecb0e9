/**
 * Core type definitions shared by the segmenter, list stack and assembler.
 */

/**
 * Front-matter metadata. A `Map` keeps the author's key order, which is the
 * order template placeholders are substituted in.
 */
export type Metadata = Map<string, string>;

/**
 * One open list context on the nesting stack.
 */
export interface ListFrame {
  /** Raw count of leading whitespace characters on the line that opened it. */
  indent: number;
  /** `true` for `<ol>`, `false` for `<ul>`. */
  ordered: boolean;
}

export type BlockKind = 'header' | 'paragraph' | 'list' | 'code' | 'byline';

/**
 * A unit of emitted HTML. `html` may span several lines.
 */
export interface Block {
  kind: BlockKind;
  html: string;
}

/**
 * Kind of a fragment waiting in the paragraph buffer. The block a buffer
 * flushes into takes the kind of its first fragment.
 *
 * `list-end` carries the closing tags of every open list followed by the
 * header or text line that ended them.
 */
export type FragmentKind = 'header' | 'list' | 'list-end' | 'text';

export interface Fragment {
  kind: FragmentKind;
  html: string;
}

export interface FrontMatterResult {
  metadata: Metadata;
  body: string;
}

export interface SegmentResult {
  blocks: Block[];
  /** Non-fatal findings, such as a fence that was never closed. */
  diagnostics: string[];
}
