/**
 * Snippet Collector Tests
 */

import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SnippetDirectoryError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { collectSnippets, snippetId } from './collector.js';

describe('snippetId', () => {
  it('strips recognized extensions', () => {
    expect(snippetId('intro.txt')).toBe('intro');
    expect(snippetId('intro.TXT')).toBe('intro');
    expect(snippetId('intro.text')).toBe('intro');
    expect(snippetId('intro.TEXT')).toBe('intro');
  });

  it('keeps inner dots in the identifier', () => {
    expect(snippetId('notes.v2.txt')).toBe('notes.v2');
  });

  it('matches extensions case-sensitively', () => {
    expect(snippetId('intro.Txt')).toBeUndefined();
    expect(snippetId('intro.Text')).toBeUndefined();
  });

  it('rejects other files', () => {
    expect(snippetId('intro.md')).toBeUndefined();
    expect(snippetId('intro')).toBeUndefined();
    expect(snippetId('.txt')).toBeUndefined(); // dotfile, no extension
  });
});

describe('collectSnippets', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'framedeck-collector-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads recognized files keyed by base name', async () => {
    await writeFile(join(dir, 'a.txt'), 'Alpha');
    await writeFile(join(dir, 'b.text'), 'Beta');
    await writeFile(join(dir, 'c.md'), 'ignored');
    await writeFile(join(dir, 'd.Txt'), 'ignored too');

    const snippets = await collectSnippets(dir);

    expect([...snippets.keys()]).toEqual(['a', 'b']);
    expect(snippets.get('a')).toEqual({ id: 'a', content: 'Alpha' });
    expect(snippets.get('b')).toEqual({ id: 'b', content: 'Beta' });
  });

  it('trims leading and trailing whitespace', async () => {
    await writeFile(join(dir, 'hello.txt'), '  hello\n\n');

    const snippets = await collectSnippets(dir);

    expect(snippets.get('hello')?.content).toBe('hello');
  });

  it('keeps inner whitespace', async () => {
    await writeFile(join(dir, 'lines.txt'), '\tfirst line\n  second line \n');

    const snippets = await collectSnippets(dir);

    expect(snippets.get('lines')?.content).toBe('first line\n  second line');
  });

  it('orders snippets by file name', async () => {
    await writeFile(join(dir, 'z.txt'), 'Z');
    await writeFile(join(dir, 'm.TEXT'), 'M');
    await writeFile(join(dir, 'a.txt'), 'A');

    const snippets = await collectSnippets(dir);

    expect([...snippets.keys()]).toEqual(['a', 'm', 'z']);
  });

  it('lets the last file name win on identifier collisions', async () => {
    await writeFile(join(dir, 'a.txt'), 'lower');
    await writeFile(join(dir, 'a.TXT'), 'upper');
    await writeFile(join(dir, 'b.txt'), 'B');

    const snippets = await collectSnippets(dir);

    // "a.TXT" sorts before "a.txt"
    expect([...snippets.keys()]).toEqual(['a', 'b']);
    expect(snippets.get('a')?.content).toBe('lower');
  });

  it('warns about identifier collisions', async () => {
    await writeFile(join(dir, 'a.txt'), 'lower');
    await writeFile(join(dir, 'a.text'), 'other');
    const warnings: string[] = [];
    const logger: Logger = {
      level: 'debug',
      error: () => {},
      warn: (message) => warnings.push(message),
      info: () => {},
      debug: () => {},
      child: () => logger,
    };

    await collectSnippets(dir, { logger });

    expect(warnings).toEqual(['Snippet "a" defined more than once, using a.txt']);
  });

  it('skips directories even with a text extension', async () => {
    await mkdir(join(dir, 'nested.txt'));
    await writeFile(join(dir, 'real.txt'), 'Real');

    const snippets = await collectSnippets(dir);

    expect([...snippets.keys()]).toEqual(['real']);
  });

  it('returns an empty collection for a directory without snippets', async () => {
    await writeFile(join(dir, 'readme.md'), '# nothing here');

    const snippets = await collectSnippets(dir);

    expect(snippets.size).toBe(0);
  });

  it('yields the same collection when run twice', async () => {
    await writeFile(join(dir, 'one.txt'), ' One ');
    await writeFile(join(dir, 'two.text'), 'Two\n');

    const first = await collectSnippets(dir);
    const second = await collectSnippets(dir);

    expect([...second.entries()]).toEqual([...first.entries()]);
  });

  it('does not modify the directory', async () => {
    await writeFile(join(dir, 'a.txt'), '  padded  ');

    await collectSnippets(dir);

    expect(await readdir(dir)).toEqual(['a.txt']);
    expect(await readFile(join(dir, 'a.txt'), 'utf-8')).toBe('  padded  ');
  });

  it('fails with SnippetDirectoryError for a missing directory', async () => {
    const missing = join(dir, 'does-not-exist');

    const promise = collectSnippets(missing);

    await expect(promise).rejects.toBeInstanceOf(SnippetDirectoryError);
    await expect(promise).rejects.toMatchObject({ code: 'INPUT_DIRECTORY', path: missing });
  });

  it('fails with SnippetDirectoryError when given a file', async () => {
    const file = join(dir, 'a.txt');
    await writeFile(file, 'Alpha');

    await expect(collectSnippets(file)).rejects.toMatchObject({
      code: 'INPUT_DIRECTORY',
      path: file,
    });
  });
});
