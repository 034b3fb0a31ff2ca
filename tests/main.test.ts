import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { runCli, parseCliArgs, CliOptions } from '../src/main';

const text = fsSync.readFileSync(path.join(__dirname, 'fixtures', 'two-deltas.patch'), 'utf-8');

const options = (overrides: Partial<CliOptions> = {}): Pick<CliOptions, 'verbose' | 'json' | 'check' | 'extract'> => ({
  verbose: false,
  json: false,
  check: false,
  extract: [],
  ...overrides
});

describe('runCli', () => {
  let errorSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;
  let output: string;
  const write = (chunk: string): void => { output += chunk; };

  beforeEach(() => {
    output = '';
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    stderrSpy.mockRestore();
  });

  it('prints one summary line per delta', async () => {
    const code = await runCli({ diffText: text }, options(), write);
    expect(code).toBe(0);
    expect(output).toBe('src/render.ts (2 hunks)\ndocs/NOTES.md (2 hunks)\n');
  });

  it('prints the commit line in the summary', async () => {
    const code = await runCli({ diffText: `abc123\n${text}` }, options(), write);
    expect(code).toBe(0);
    expect(output.split('\n')[0]).toBe('commit abc123');
  });

  it('extracts hunks as standalone patches', async () => {
    const code = await runCli({ diffText: text }, options({ extract: [{ delta: 1, hunk: 0 }] }), write);
    expect(code).toBe(0);
    const start = text.indexOf('diff --git a/docs');
    expect(output).toBe(text.slice(start, text.indexOf('@@ -20,2')));
  });

  it('fails for a hunk that does not exist', async () => {
    const code = await runCli({ diffText: text }, options({ extract: [{ delta: 5, hunk: 0 }] }), write);
    expect(code).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith('No hunk 5:0 in diff');
  });

  it('prints the parsed diff as JSON', async () => {
    const code = await runCli({ diffText: text }, options({ json: true }), write);
    expect(code).toBe(0);
    const parsed = JSON.parse(output);
    expect(parsed.deltas[1].newFile).toBe('b/docs/NOTES.md');
    expect(parsed.deltas[1].hunks[0].newLines).toBe(4);
  });

  it('passes --check on a well-formed diff', async () => {
    const code = await runCli({ diffText: text }, options({ check: true }), write);
    expect(code).toBe(0);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('fails --check when declared counts do not match', async () => {
    const diff = 'diff --git a/f b/f\n--- a/f\n+++ b/f\n@@ -1,1 +1,1 @@\n-a\n+b\n+c\n';
    const code = await runCli({ diffText: diff }, options({ check: true }), write);
    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('[hunkwise] f hunk 1 -> declares 1 new lines but body has 2');
  });

  it('returns 2 and reports the position of a syntax error', async () => {
    const code = await runCli({ diffText: 'not a diff\nstill not\n' }, options(), write);
    expect(code).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith("Invalid diff at line 2, column 1: expected 'diff --git' header");
    expect(output).toBe('');
  });

  it('logs progress to stderr in verbose mode', async () => {
    await runCli({ diffText: text }, options({ verbose: true }), write);
    expect(stderrSpy).toHaveBeenCalledWith('[hunkwise] Parsed 2 file deltas\n');
  });

  it('reads the diff from a file', async () => {
    const tmpFile = path.join(os.tmpdir(), `hunkwise-${Date.now()}.patch`);
    await fs.writeFile(tmpFile, text, 'utf-8');
    const code = await runCli({ filePath: tmpFile }, options(), write);
    await fs.unlink(tmpFile);
    expect(code).toBe(0);
    expect(output).toBe('src/render.ts (2 hunks)\ndocs/NOTES.md (2 hunks)\n');
  });

  it('reads the diff from stdin', async () => {
    const stdin = new PassThrough();
    stdin.end(text);
    const code = await runCli({ filePath: '-', stdin }, options(), write);
    expect(code).toBe(0);
    expect(output).toBe('src/render.ts (2 hunks)\ndocs/NOTES.md (2 hunks)\n');
  });

  it('throws error if no input provided', async () => {
    await expect(runCli({}, options(), write)).rejects.toThrow('No diff input provided');
  });
});

describe('parseCliArgs', () => {
  it('defaults with no args', () => {
    expect(parseCliArgs([])).toEqual({
      showHelp: false,
      verbose: false,
      json: false,
      check: false,
      extract: [],
      diffFile: undefined
    });
  });
  it('parses help flag', () => {
    expect(parseCliArgs(['--help']).showHelp).toBe(true);
  });
  it('parses verbose, json and check flags', () => {
    const opts = parseCliArgs(['-v', '--json', '-c']);
    expect(opts.verbose).toBe(true);
    expect(opts.json).toBe(true);
    expect(opts.check).toBe(true);
  });
  it('parses repeated extract options in order', () => {
    const opts = parseCliArgs(['-x', '0:1', '--extract=2:0']);
    expect(opts.extract).toEqual([{ delta: 0, hunk: 1 }, { delta: 2, hunk: 0 }]);
  });
  it('rejects an invalid hunk reference', () => {
    const opts = parseCliArgs(['-x', 'abc']);
    expect(opts.error).toMatch(/Invalid hunk reference: abc/);
  });
  it('rejects missing extract value', () => {
    const opts = parseCliArgs(['--extract']);
    expect(opts.error).toBe('Missing value for --extract');
  });
  it('rejects too many args', () => {
    expect(parseCliArgs(['a', 'b']).error).toBe('Too many arguments');
  });
  it('parses diffFile as positional', () => {
    expect(parseCliArgs(['file.diff']).diffFile).toBe('file.diff');
  });
});
