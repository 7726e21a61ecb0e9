import type { Block, Metadata } from './core/types';
import type { ClassTable, StyleThemeName } from './core/styles';
import type { ConversionErrorKind } from './errors';

/**
 * Options shared by every conversion entry point.
 */
export interface RenderOptions {
  /** Style theme for class attributes. @default 'tailwind' */
  style?: StyleThemeName;
  /** Per-element class overrides on top of the theme. */
  classes?: ClassTable;
  /** Stylesheet linked from the default HTML shell. */
  stylesheet?: string;
  /** Offset used for the synthesised byline time. @default 7 */
  utcOffsetHours?: number;
  /** Source of "now" for the byline; defaults to the system clock. */
  clock?: () => Date;
}

/**
 * Options for converting a markdown string.
 */
export interface ConvertOptions extends RenderOptions {
  /** Title used when the front matter has none. @default 'Untitled' */
  title?: string;
  /** Template text containing `{{content}}`. */
  template?: string;
}

/**
 * Options for converting a file on disk.
 */
export interface ConvertFileOptions extends RenderOptions {
  /** Path of a template file containing `{{content}}`. */
  templatePath?: string;
}

/**
 * A converted page before it is written anywhere.
 */
export interface PageDocument {
  /** Front-matter `title`, or the fallback title. */
  title: string;
  /** Front matter exactly as written by the author. */
  metadata: Metadata;
  /** Byline plus formatted blocks, the value of `{{content}}`. */
  content: string;
}

/**
 * Result of converting a markdown string.
 */
export interface ConvertResult {
  /** Final HTML page. */
  html: string;
  document: PageDocument;
  /** Blocks in document order, before indentation. */
  blocks: Block[];
  /** Non-fatal findings from the segmenter. */
  diagnostics: string[];
}

export interface ConversionFailure {
  kind: ConversionErrorKind;
  message: string;
}

/**
 * Outcome of {@link convertFile}. Failures are returned, never thrown.
 */
export type ConvertFileResult =
  | { ok: true; outputPath: string; document: PageDocument; diagnostics: string[] }
  | { ok: false; error: ConversionFailure };
