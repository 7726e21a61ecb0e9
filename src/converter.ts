import * as fs from 'node:fs';
import * as path from 'node:path';
import type {
  ConvertFileOptions,
  ConvertFileResult,
  ConvertOptions,
  ConvertResult,
  RenderOptions,
} from './types';
import { assembleDocument, DEFAULT_UTC_OFFSET_HOURS } from './core/assembler';
import { extractFrontMatter } from './core/front-matter';
import { buildInlineRules } from './core/inline';
import type { InlineRule } from './core/inline';
import { segmentBlocks } from './core/segmenter';
import { buildAttributeTable } from './core/styles';
import type { AttributeTable } from './core/styles';
import { MissingInputError, MissingTemplateError, toConversionError } from './errors';

const DEFAULT_TITLE = 'Untitled';

/**
 * Normalize line endings so every pattern can rely on `\n`.
 */
function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Reusable converter bound to one set of render options.
 *
 * The attribute table and inline rules are built once in the constructor.
 * Everything that changes while a document is converted (the list stack, the
 * paragraph buffer) lives inside a single {@link PageRenderer.render} call, so
 * one instance can convert any number of documents.
 *
 * @example
 * ```ts
 * const renderer = new PageRenderer({ style: 'plain' });
 * const { html } = renderer.render('# Hello **world**', 'hello');
 * ```
 */
export class PageRenderer {
  private readonly attrs: AttributeTable;
  private readonly rules: readonly InlineRule[];
  private readonly clock: () => Date;

  constructor(private readonly options: RenderOptions = {}) {
    this.attrs = buildAttributeTable(options.style, options.classes);
    this.rules = buildInlineRules(this.attrs);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Convert one document.
   *
   * @param markdown      - Full document text, front matter included.
   * @param fallbackTitle - Title used when the front matter has no `title`.
   * @param template      - Optional template text containing `{{content}}`.
   * @throws {InvalidTemplateError} When `template` lacks `{{content}}`.
   */
  render(markdown: string, fallbackTitle: string, template?: string): ConvertResult {
    const { metadata, body } = extractFrontMatter(normalizeLineEndings(markdown));
    const { blocks, diagnostics } = segmentBlocks(body, this.attrs, this.rules);
    const title = metadata.get('title') ?? fallbackTitle;

    const { content, html } = assembleDocument(title, metadata, blocks, {
      attrs: this.attrs,
      template,
      stylesheet: this.options.stylesheet,
      now: this.clock(),
      utcOffsetHours: this.options.utcOffsetHours ?? DEFAULT_UTC_OFFSET_HOURS,
    });

    return {
      html,
      document: { title, metadata, content },
      blocks,
      diagnostics,
    };
  }
}

/**
 * Convert a markdown string to an HTML page.
 *
 * @param markdown - Document text, optionally starting with `---` front matter.
 * @param options  - Style, template and title options.
 * @returns The page, its parts and any segmenter diagnostics.
 * @throws {InvalidTemplateError} When `options.template` lacks `{{content}}`.
 *
 * @example
 * ```ts
 * const result = convertMarkdown('# Title\n\nHello **world**', { style: 'plain' });
 * result.document.content; // '  <h1>Title</h1>\n  <p>Hello <strong>world</strong></p>'
 * ```
 */
export function convertMarkdown(markdown: string, options: ConvertOptions = {}): ConvertResult {
  const { title, template, ...renderOptions } = options;
  return new PageRenderer(renderOptions).render(markdown, title ?? DEFAULT_TITLE, template);
}

function readInput(inputPath: string): string {
  try {
    return fs.readFileSync(inputPath, 'utf-8');
  } catch (err) {
    throw new MissingInputError(inputPath, { cause: err });
  }
}

function readTemplate(templatePath: string): string {
  try {
    return fs.readFileSync(templatePath, 'utf-8');
  } catch (err) {
    throw new MissingTemplateError(templatePath, { cause: err });
  }
}

/**
 * Convert a markdown file and write the HTML page to `outputPath`.
 *
 * The title falls back to the input file name without its extension. The
 * output is written only after the whole page rendered; on any failure
 * nothing is written and the error kind and message are returned.
 */
export function convertFile(
  inputPath: string,
  outputPath: string,
  options: ConvertFileOptions = {},
): ConvertFileResult {
  const { templatePath, ...renderOptions } = options;
  try {
    const markdown = readInput(inputPath);
    const template = templatePath !== undefined ? readTemplate(templatePath) : undefined;

    const result = new PageRenderer(renderOptions).render(
      markdown,
      path.parse(inputPath).name,
      template,
    );

    fs.writeFileSync(outputPath, result.html, 'utf-8');
    return {
      ok: true,
      outputPath,
      document: result.document,
      diagnostics: result.diagnostics,
    };
  } catch (err) {
    const error = toConversionError(err);
    return { ok: false, error: { kind: error.kind, message: error.message } };
  }
}
