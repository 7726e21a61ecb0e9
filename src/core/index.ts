/**
 * Core module barrel exports.
 *
 * Re-exports the front-matter extractor, inline formatter, list stack,
 * segmenter, assembler, style themes and shared types.
 *
 * @module core
 */

// Front matter
export { extractFrontMatter } from './front-matter.js';

// Inline formatting
export { buildInlineRules, formatInline } from './inline.js';
export type { InlineRule, InlineRuleName } from './inline.js';

// Lists
export { ListStack, matchListItem } from './list-stack.js';
export type { ListItemLine } from './list-stack.js';

// Segmentation
export { segmentBlocks } from './segmenter.js';

// Assembly
export {
  applyTemplate,
  assembleDocument,
  createDefaultHtml,
  formatBlocks,
  formatTimestamp,
  renderByline,
  DEFAULT_STYLESHEET,
  DEFAULT_UTC_OFFSET_HOURS,
} from './assembler.js';
export type { AssembleOptions, AssembledDocument, BylineOptions, TemplateValues } from './assembler.js';

// Styles
export {
  buildAttributeTable,
  headerAttribute,
  isStyleThemeName,
  DEFAULT_THEME,
  ELEMENT_KINDS,
  STYLE_THEMES,
  STYLE_THEME_NAMES,
} from './styles.js';
export type {
  AttributeTable,
  ClassTable,
  ElementKind,
  StyleTheme,
  StyleThemeName,
} from './styles.js';

// Types
export type {
  Block,
  BlockKind,
  Fragment,
  FragmentKind,
  FrontMatterResult,
  ListFrame,
  Metadata,
  SegmentResult,
} from './types.js';
