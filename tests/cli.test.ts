import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseArgs, run, USAGE } from '../src/cli';
import { DEFAULT_CONFIG_FILE } from '../src/config';
import { createDefaultHtml } from '../src/core/assembler';

function createLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

// ---------------------------------------------------------------------------
// parseArgs()
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('reads the two positional paths', () => {
    expect(parseArgs(['in.md', 'out.html'])).toEqual({
      kind: 'run',
      args: { input: 'in.md', output: 'out.html' },
    });
  });

  it('reads flags with separate or inline values', () => {
    expect(parseArgs(['--template', 't.html', 'in.md', 'out.html', '--style=plain', '--config', 'c.json'])).toEqual({
      kind: 'run',
      args: { input: 'in.md', output: 'out.html', template: 't.html', style: 'plain', config: 'c.json' },
    });
  });

  it.each<[string[], string]>([
    [['in.md'], 'Missing input or output file'],
    [[], 'Missing input or output file'],
    [['a', 'b', 'c'], 'Unexpected argument: c'],
    [['a', 'b', '--foo'], 'Unknown option: --foo'],
    [['a', 'b', '--template'], 'Option --template requires a value'],
    [['a', 'b', '--style='], 'Option --style requires a value'],
    [['a', 'b', '--template', '--style', 'plain'], 'Option --template requires a value'],
    [['a', 'b', '--style', 'fancy'], 'Unknown style: fancy'],
  ])('rejects %j', (argv, reason) => {
    expect(parseArgs(argv)).toEqual({ kind: 'invalid', reason });
  });

  it('accepts a dash-prefixed value given after =', () => {
    expect(parseArgs(['in.md', 'out.html', '--template=--odd.html'])).toEqual({
      kind: 'run',
      args: { input: 'in.md', output: 'out.html', template: '--odd.html' },
    });
  });

  it('recognises help', () => {
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['a', '-h'])).toEqual({ kind: 'help' });
  });
});

// ---------------------------------------------------------------------------
// run()
// ---------------------------------------------------------------------------

describe('run', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdpress-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('exits with 1 and prints usage when arguments are missing', () => {
    const logger = createLogger();
    expect(run(['only-input.md'], logger, dir)).toBe(1);
    expect(logger.error.mock.calls).toEqual([['Error: Missing input or output file'], [USAGE]]);
  });

  it('prints usage for --help and exits with 0', () => {
    const logger = createLogger();
    expect(run(['--help'], logger, dir)).toBe(0);
    expect(logger.log).toHaveBeenCalledWith(USAGE);
  });

  it('converts a file and reports success', () => {
    const input = path.join(dir, 'post.md');
    const output = path.join(dir, 'post.html');
    fs.writeFileSync(input, '# Post');
    const logger = createLogger();

    expect(run([input, output, '--style', 'plain'], logger, dir)).toBe(0);
    expect(logger.log.mock.calls).toEqual([['Converted!']]);
    expect(fs.readFileSync(output, 'utf-8')).toBe(createDefaultHtml('post', '  <h1>Post</h1>'));
  });

  it('reports a failed conversion but still exits with 0', () => {
    const input = path.join(dir, 'absent.md');
    const logger = createLogger();

    expect(run([input, path.join(dir, 'out.html')], logger, dir)).toBe(0);
    expect(logger.error).toHaveBeenCalledWith(`Error: Input file not found: ${input}`);
    expect(logger.log.mock.calls).toEqual([['Failed to convert']]);
  });

  it('prints segmenter diagnostics as warnings', () => {
    const input = path.join(dir, 'code.md');
    fs.writeFileSync(input, '```\nx');
    const logger = createLogger();

    expect(run([input, path.join(dir, 'code.html')], logger, dir)).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Warning: Unterminated code fence opened at line 1; 1 line dropped');
    expect(logger.log).toHaveBeenCalledWith('Converted!');
  });

  it('applies the config file from the working directory', () => {
    fs.writeFileSync(
      path.join(dir, DEFAULT_CONFIG_FILE),
      JSON.stringify({ style: 'plain', stylesheet: 'site.css' }),
    );
    const input = path.join(dir, 'page.md');
    const output = path.join(dir, 'page.html');
    fs.writeFileSync(input, 'Hi');

    expect(run([input, output], createLogger(), dir)).toBe(0);
    expect(fs.readFileSync(output, 'utf-8')).toBe(createDefaultHtml('page', '  <p>Hi</p>', 'site.css'));
  });

  it('lets --style override the config file', () => {
    fs.writeFileSync(path.join(dir, DEFAULT_CONFIG_FILE), JSON.stringify({ style: 'tailwind' }));
    const input = path.join(dir, 'page.md');
    const output = path.join(dir, 'page.html');
    fs.writeFileSync(input, 'Hi');

    expect(run([input, output, '--style', 'plain'], createLogger(), dir)).toBe(0);
    expect(fs.readFileSync(output, 'utf-8')).toBe(createDefaultHtml('page', '  <p>Hi</p>'));
  });

  it('reports an invalid config file as a failed conversion', () => {
    const configPath = path.join(dir, 'bad.json');
    fs.writeFileSync(configPath, '{"style": 1}');
    const logger = createLogger();

    expect(run(['a.md', 'b.html', '--config', configPath], logger, dir)).toBe(0);
    expect(logger.log.mock.calls).toEqual([['Failed to convert']]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
