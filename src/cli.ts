#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   mdpress <input-file> <output-file> [--template <path>] [--style <name>] [--config <path>]
 *
 * Exits with 1 on a usage error. Any other run exits with 0 and reports the
 * outcome as `Converted!` or `Error: ...` followed by `Failed to convert`.
 */
import { loadConfig } from './config';
import type { MdpressConfig } from './config';
import { convertFile } from './converter';
import { isStyleThemeName, STYLE_THEME_NAMES } from './core/styles';
import type { StyleThemeName } from './core/styles';

export const USAGE =
  'Usage: mdpress <input-file> <output-file> [--template <path>] ' +
  `[--style <${STYLE_THEME_NAMES.join('|')}>] [--config <path>]`;

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface CliArgs {
  input: string;
  output: string;
  template?: string;
  style?: StyleThemeName;
  config?: string;
}

export type ParsedArgs =
  | { kind: 'run'; args: CliArgs }
  | { kind: 'help' }
  | { kind: 'invalid'; reason: string };

type ValueFlag = 'template' | 'style' | 'config';

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['--template', 'template'],
  ['--style', 'style'],
  ['--config', 'config'],
]);

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/**
 * Parse user arguments (without the node binary and script path).
 * Flags take their value as the next argument or after `=`; a following
 * argument that is itself a flag does not count as a value.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values: Partial<Record<ValueFlag, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq < 0 ? arg : arg.slice(0, eq);
    const flag = VALUE_FLAGS.get(name);
    if (flag === undefined) {
      return { kind: 'invalid', reason: `Unknown option: ${name}` };
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (!value || (eq < 0 && value.startsWith('--'))) {
      return { kind: 'invalid', reason: `Option ${name} requires a value` };
    }
    values[flag] = value;
  }

  if (positionals.length < 2) {
    return { kind: 'invalid', reason: 'Missing input or output file' };
  }
  if (positionals.length > 2) {
    return { kind: 'invalid', reason: `Unexpected argument: ${positionals[2]}` };
  }

  const { style } = values;
  if (style !== undefined && !isStyleThemeName(style)) {
    return { kind: 'invalid', reason: `Unknown style: ${style}` };
  }

  return {
    kind: 'run',
    args: {
      input: positionals[0],
      output: positionals[1],
      template: values.template,
      style,
      config: values.config,
    },
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run the CLI and return the process exit code.
 */
export function run(argv: readonly string[], logger: Logger = console, cwd?: string): number {
  const parsed = parseArgs(argv);

  if (parsed.kind === 'help') {
    logger.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'invalid') {
    logger.error(`Error: ${parsed.reason}`);
    logger.error(USAGE);
    return 1;
  }

  const { args } = parsed;

  let config: MdpressConfig;
  try {
    config = loadConfig(args.config, cwd);
  } catch (err) {
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    logger.log('Failed to convert');
    return 0;
  }

  const result = convertFile(args.input, args.output, {
    templatePath: args.template ?? config.template,
    style: args.style ?? config.style,
    classes: config.classes,
    stylesheet: config.stylesheet,
    utcOffsetHours: config.utcOffsetHours,
  });

  if (!result.ok) {
    logger.error(`Error: ${result.error.message}`);
    logger.log('Failed to convert');
    return 0;
  }

  for (const diagnostic of result.diagnostics) {
    logger.warn(`Warning: ${diagnostic}`);
  }
  logger.log('Converted!');
  return 0;
}

if (require.main === module) {
  process.exit(run(process.argv.slice(2)));
}
