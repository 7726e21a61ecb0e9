/**
 * Error types raised while converting a document.
 */

export type ConversionErrorKind =
  | 'MissingInput'
  | 'MissingTemplate'
  | 'InvalidTemplate'
  | 'InvalidConfig'
  | 'GenericConversionFailure';

/** Base error class; `kind` tells callers which failure occurred. */
export class ConversionError extends Error {
  constructor(
    public readonly kind: ConversionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

/** Input file absent or unreadable. */
export class MissingInputError extends ConversionError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super('MissingInput', `Input file not found: ${path}`, options);
    this.name = 'MissingInputError';
  }
}

/** Template path given but unreadable. */
export class MissingTemplateError extends ConversionError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super('MissingTemplate', `Template file not found: ${path}`, options);
    this.name = 'MissingTemplateError';
  }
}

/** Template has no `{{content}}` placeholder. */
export class InvalidTemplateError extends ConversionError {
  constructor() {
    super('InvalidTemplate', 'Template must contain {{content}} mark in the body');
    this.name = 'InvalidTemplateError';
  }
}

/** Config file unreadable, not JSON, or rejected by the schema. */
export class ConfigError extends ConversionError {
  constructor(public readonly path: string, detail: string, options?: { cause?: unknown }) {
    super('InvalidConfig', `Invalid config ${path}: ${detail}`, options);
    this.name = 'ConfigError';
  }
}

/**
 * Wrap anything thrown into a {@link ConversionError}, keeping known ones as-is.
 */
export function toConversionError(err: unknown): ConversionError {
  if (err instanceof ConversionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ConversionError('GenericConversionFailure', message, { cause: err });
}
