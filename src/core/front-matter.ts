/**
 * Front-matter extractor.
 *
 * Recognises a `---` delimited block of `key: value` lines, but only when it
 * starts at the very first character of the document.
 *
 * @module core/front-matter
 */
import type { FrontMatterResult, Metadata } from './types.js';

const DELIMITER_RE = /^---[ \t]*$/;

/**
 * Strip one matching pair of single or double quotes around a value.
 */
function unquote(value: string): string {
  if (value.length < 2) return value;
  const first = value[0];
  const last = value[value.length - 1];
  if ((first === '"' || first === "'") && first === last) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse the lines between the delimiters. Lines without a colon are skipped;
 * a repeated key overwrites the earlier value.
 */
function parseEntries(lines: string[]): Metadata {
  const metadata: Metadata = new Map();
  for (const raw of lines) {
    const line = raw.trim();
    const colonIdx = line.indexOf(':');
    if (colonIdx < 0) continue;

    const key = line.slice(0, colonIdx).trim();
    if (!key) continue;
    metadata.set(key, unquote(line.slice(colonIdx + 1).trim()));
  }
  return metadata;
}

/**
 * Split a document into its front-matter metadata and the remaining body.
 *
 * @param text - Full document text with `\n` line endings.
 * @returns The metadata (empty when there is no front matter) and the body.
 *
 * @example
 * ```ts
 * const { metadata, body } = extractFrontMatter('---\ntitle: Foo\n---\nBody');
 * metadata.get('title'); // 'Foo'
 * body;                  // 'Body'
 * ```
 */
export function extractFrontMatter(text: string): FrontMatterResult {
  const lines = text.split('\n');
  if (!DELIMITER_RE.test(lines[0])) {
    return { metadata: new Map(), body: text };
  }

  const closeIdx = lines.findIndex((line, idx) => idx > 0 && DELIMITER_RE.test(line));
  if (closeIdx < 0) {
    return { metadata: new Map(), body: text };
  }

  return {
    metadata: parseEntries(lines.slice(1, closeIdx)),
    body: lines.slice(closeIdx + 1).join('\n'),
  };
}
