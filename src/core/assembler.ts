/**
 * Document assembler.
 *
 * Indents the segmenter's blocks, prepends the metadata byline and places the
 * result either into a user template or into the default HTML shell.
 *
 * @module core/assembler
 */
import { InvalidTemplateError } from '../errors.js';
import type { AttributeTable } from './styles.js';
import type { Block, Metadata } from './types.js';

export const DEFAULT_UTC_OFFSET_HOURS = 7;
export const DEFAULT_STYLESHEET = './styles/style.css';

const CONTENT_TOKEN = '{{content}}';
const TITLE_TOKEN = '{{title}}';

// ---------------------------------------------------------------------------
// Indentation
// ---------------------------------------------------------------------------

function indentLine(line: string): string {
  return line.startsWith('<li') || line.startsWith('</li>') ? `    ${line}` : `  ${line}`;
}

/**
 * Indent every block line and join the blocks with newlines.
 *
 * List item lines get four spaces, everything else two. Only the first line
 * of a code block is indented; the code itself is kept byte for byte.
 */
export function formatBlocks(blocks: readonly Block[]): string {
  return blocks
    .map((block) => {
      const lines = block.html.split('\n');
      if (block.kind === 'code') {
        return [indentLine(lines[0]), ...lines.slice(1)].join('\n');
      }
      return lines.map(indentLine).join('\n');
    })
    .join('\n');
}

// ---------------------------------------------------------------------------
// Byline
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a point in time as `YYYY-MM-DD HH:MM:SS` at a fixed UTC offset.
 */
export function formatTimestamp(date: Date, utcOffsetHours: number = DEFAULT_UTC_OFFSET_HOURS): string {
  const shifted = new Date(date.getTime() + utcOffsetHours * 3_600_000);
  return (
    `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())} ` +
    `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`
  );
}

export interface BylineOptions {
  /** Used when metadata has no `datetime`. */
  now: Date;
  utcOffsetHours?: number;
}

/**
 * Render the author/date byline, or `null` when there is no metadata.
 *
 * A synthesised creation time is only rendered here; it is never written
 * back into `metadata`.
 */
export function renderByline(
  metadata: Metadata,
  attrs: AttributeTable,
  options: BylineOptions,
): Block | null {
  if (metadata.size === 0) return null;

  const text = attrs['byline-text'];
  const createdAt =
    metadata.get('datetime') || formatTimestamp(options.now, options.utcOffsetHours);
  const updatedAt = metadata.get('updatetime');

  const dates = [`<p${text}>at ${createdAt}</p>`];
  if (updatedAt) {
    dates.push(`<p${text}>edited at ${updatedAt}</p>`);
  }

  const parts: string[] = [];
  const author = metadata.get('author');
  if (author) {
    parts.push(`<p${text}>Written by ${author}</p>`);
  }
  parts.push(`<section${attrs['byline-dates']}>${dates.join('\n')}</section>`);

  return { kind: 'byline', html: `<section${attrs.byline}>${parts.join('\n')}</section>` };
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export interface TemplateValues {
  title: string;
  metadata: Metadata;
  content: string;
}

function replaceToken(template: string, token: string, value: string): string {
  // A function replacement keeps `$&` and friends in the value literal.
  return template.replaceAll(token, () => value);
}

/**
 * Fill a user template by literal text substitution.
 *
 * Order: `{{title}}`, then every `{{key}}` from metadata in insertion order,
 * then `{{content}}`. All occurrences of each token are replaced.
 *
 * @throws {InvalidTemplateError} When the template has no `{{content}}` token.
 */
export function applyTemplate(template: string, values: TemplateValues): string {
  let result = replaceToken(template, TITLE_TOKEN, values.title);

  if (!result.includes(CONTENT_TOKEN)) {
    throw new InvalidTemplateError();
  }

  for (const [key, value] of values.metadata) {
    result = replaceToken(result, `{{${key}}}`, value);
  }

  return replaceToken(result, CONTENT_TOKEN, values.content);
}

/**
 * Minimal HTML5 page used when no template is supplied.
 */
export function createDefaultHtml(
  title: string,
  content: string,
  stylesheet: string = DEFAULT_STYLESHEET,
): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    <link rel="stylesheet" href="${stylesheet}" />
</head>
<body>
    ${content}
</body>
</html>`;
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

export interface AssembleOptions extends BylineOptions {
  attrs: AttributeTable;
  /** Template text; the default shell is used when absent. */
  template?: string;
  stylesheet?: string;
}

export interface AssembledDocument {
  /** Byline plus indented blocks, as substituted for `{{content}}`. */
  content: string;
  /** Final page. */
  html: string;
}

export function assembleDocument(
  title: string,
  metadata: Metadata,
  blocks: readonly Block[],
  options: AssembleOptions,
): AssembledDocument {
  const byline = renderByline(metadata, options.attrs, options);
  const content = formatBlocks(byline ? [byline, ...blocks] : blocks);

  const html =
    options.template !== undefined
      ? applyTemplate(options.template, { title, metadata, content })
      : createDefaultHtml(title, content, options.stylesheet);

  return { content, html };
}
