/**
 * Snippet Collector
 *
 * Reads every recognized text file of a directory into a SnippetCollection.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { SnippetCollection } from '../types/index.js';
import { errorMessage, SnippetDirectoryError } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';

/** Recognized extensions, matched case-sensitively */
export const SNIPPET_EXTENSIONS: ReadonlySet<string> = new Set(['.txt', '.TXT', '.text', '.TEXT']);

export interface CollectOptions {
  logger?: Logger;
}

/**
 * Identifier for a snippet file name, or undefined when the extension is not recognized
 *
 * Examples:
 * - intro.txt -> intro
 * - notes.v2.TEXT -> notes.v2
 * - slide.Txt -> undefined
 */
export function snippetId(fileName: string): string | undefined {
  const ext = extname(fileName);
  if (!SNIPPET_EXTENSIONS.has(ext)) {
    return undefined;
  }
  return fileName.slice(0, -ext.length);
}

/**
 * Code-unit order, independent of locale
 */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Collect snippets from `dir`.
 *
 * Files are visited in code-unit order of their names. When two files share an
 * identifier (`a.txt` and `a.text`), the one visited last wins and keeps the
 * position of the first.
 */
export async function collectSnippets(
  dir: string,
  options: CollectOptions = {}
): Promise<SnippetCollection> {
  const logger = options.logger ?? silentLogger;

  let fileNames: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    fileNames = entries
      .filter((entry) => !entry.isDirectory())
      .map((entry) => entry.name)
      .sort(compareNames);
  } catch (error) {
    throw new SnippetDirectoryError(
      `Cannot read snippet directory ${dir}: ${errorMessage(error)}`,
      dir,
      { cause: error }
    );
  }

  const snippets: SnippetCollection = new Map();

  for (const fileName of fileNames) {
    const id = snippetId(fileName);
    if (id === undefined) {
      logger.debug(`Skipping ${fileName} (unrecognized extension)`);
      continue;
    }

    const filePath = join(dir, fileName);
    let content: string;
    try {
      content = (await readFile(filePath, 'utf-8')).trim();
    } catch (error) {
      throw new SnippetDirectoryError(
        `Cannot read snippet ${filePath}: ${errorMessage(error)}`,
        filePath,
        { cause: error }
      );
    }

    if (snippets.has(id)) {
      logger.warn(`Snippet "${id}" defined more than once, using ${fileName}`);
    }
    snippets.set(id, { id, content });
    logger.debug(`Collected "${id}" from ${fileName} (${content.length} chars)`);
  }

  logger.info(`Collected ${snippets.size} snippet(s) from ${dir}`);
  return snippets;
}
