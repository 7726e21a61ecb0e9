/**
 * mdpress - Markdown to HTML page converter
 */

// High-level conversion API
export { convertFile, convertMarkdown, PageRenderer } from './converter';

// Configuration
export { configSchema, loadConfig, parseConfig, DEFAULT_CONFIG_FILE } from './config';
export type { MdpressConfig } from './config';

// Errors
export {
  ConfigError,
  ConversionError,
  InvalidTemplateError,
  MissingInputError,
  MissingTemplateError,
  toConversionError,
} from './errors';
export type { ConversionErrorKind } from './errors';

// Types
export type {
  ConversionFailure,
  ConvertFileOptions,
  ConvertFileResult,
  ConvertOptions,
  ConvertResult,
  PageDocument,
  RenderOptions,
} from './types';

// Core module re-exports
export * from './core/index';
