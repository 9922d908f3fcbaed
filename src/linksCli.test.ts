/**
 * Tests for the html-extract-links command
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { Readable, Writable } from 'stream';
import { parseLinksArgs, runLinks } from './linksCli';
import { extractLinksFromHtml } from './index';

const collector = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
};

const runWith = async (argv: string[], stdin = '') => {
  const stdout = collector();
  const stderr = collector();
  const code = await runLinks(argv, {
    stdin: Readable.from([stdin]),
    stdout: stdout.stream,
    stderr: stderr.stream,
  });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
};

const PAGE = '<p><a href="/a">A</a> <a href="/b">\n</a><a href="/c">C\nD</a></p>';

beforeAll(() => {
  chalk.level = 0;
});

describe('extractLinksFromHtml', () => {
  it('should parse with the chosen backend', () => {
    expect(extractLinksFromHtml(PAGE, { parser: 'parse5' })).toEqual([
      { href: '/a', text: 'A' },
      { href: '/c', text: 'C\nD' },
    ]);
  });
});

describe('parseLinksArgs', () => {
  it('should default to stdin and stdout', () => {
    expect(parseLinksArgs([])).toEqual({
      input: undefined,
      output: undefined,
      parser: undefined,
      help: false,
    });
  });

  it('should reject options of the other command', () => {
    expect(() => parseLinksArgs(['-d', 'nav'])).toThrow("Unknown option '-d'");
  });
});

describe('runLinks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'html-extract-links-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should print one line per link with text', async () => {
    const result = await runWith(['-p', 'htmlparser2'], PAGE);

    expect(result).toEqual({
      code: 0,
      stdout: 'Link: [A](/a)\nLink: [C\\nD](/c)\n',
      stderr: '',
    });
  });

  it('should print nothing for a page without links', async () => {
    const result = await runWith(['-p', 'htmlparser2'], '<p>none</p>');

    expect(result).toEqual({ code: 0, stdout: '', stderr: '' });
  });

  it('should write the output file', async () => {
    const output = path.join(dir, 'links.txt');
    const result = await runWith(['-O', output, '-p', 'lxml'], PAGE);

    expect(result.code).toBe(0);
    expect(await readFile(output, 'utf-8')).toBe('Link: [A](/a)\nLink: [C\\nD](/c)\n');
  });

  it('should report a missing input file', async () => {
    const input = path.join(dir, 'missing.html');
    const result = await runWith([input]);

    expect(result).toEqual({
      code: 1,
      stdout: '',
      stderr: `html-extract-links: error: '${input}' does not exist.\n`,
    });
  });

  it('should print help and exit 0', async () => {
    const result = await runWith(['--help']);

    expect(result.code).toBe(0);
    expect(result.stdout).toContain('Usage:\n  html-extract-links [options] [input_file]');
  });

  it('should report usage errors', async () => {
    const result = await runWith(['a.html', 'b.html']);

    expect(result).toEqual({
      code: 1,
      stdout: '',
      stderr: "html-extract-links: error: unexpected argument 'b.html'\n",
    });
  });
});
