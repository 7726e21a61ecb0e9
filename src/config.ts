/**
 * Optional JSON configuration file.
 *
 * Looked up as `mdpress.config.json` in the working directory unless an
 * explicit path is given. Every field is optional; CLI flags win over it.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ELEMENT_KINDS, STYLE_THEME_NAMES } from './core/styles';
import { ConfigError } from './errors';

export const DEFAULT_CONFIG_FILE = 'mdpress.config.json';

export const configSchema = z
  .object({
    style: z.enum(STYLE_THEME_NAMES).optional(),
    classes: z.record(z.enum(ELEMENT_KINDS), z.string()).optional(),
    stylesheet: z.string().min(1).optional(),
    utcOffsetHours: z.number().min(-12).max(14).optional(),
    template: z.string().min(1).optional(),
  })
  .strict();

export type MdpressConfig = z.infer<typeof configSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse and validate config text. A relative `template` is resolved against
 * the directory of `configPath`.
 *
 * @throws {ConfigError} On malformed JSON or a schema violation.
 */
export function parseConfig(text: string, configPath: string): MdpressConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, detail, { cause: err });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(configPath, describeIssues(parsed.error));
  }

  const config = parsed.data;
  if (config.template !== undefined) {
    config.template = path.resolve(path.dirname(configPath), config.template);
  }
  return config;
}

/**
 * Load the configuration.
 *
 * @param configPath - Explicit file; it must exist.
 * @param cwd        - Directory searched for {@link DEFAULT_CONFIG_FILE}
 *   when no explicit path is given. A missing default file yields `{}`.
 * @throws {ConfigError} When the file cannot be read or is invalid.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): MdpressConfig {
  const target = configPath ?? path.join(cwd, DEFAULT_CONFIG_FILE);
  if (configPath === undefined && !fs.existsSync(target)) {
    return {};
  }

  let text: string;
  try {
    text = fs.readFileSync(target, 'utf-8');
  } catch (err) {
    throw new ConfigError(target, 'file cannot be read', { cause: err });
  }
  return parseConfig(text, target);
}
