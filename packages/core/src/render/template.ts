/**
 * Template loading and single-placeholder substitution
 *
 * A template holds exactly one `%s`, which receives the joined fragments.
 * `%%` stands for a literal `%` (LaTeX comments in a template are written `%%`).
 * Width, flag and other printf conversions (`%5s`, `%-s`, `%d`) are rejected
 * as unsupported format sequences rather than interpreted.
 */

import { readFile } from 'node:fs/promises';
import type { SnippetCollection } from '../types/index.js';
import { errorMessage, TemplateError } from '../utils/errors.js';
import { renderFragments } from './fragment.js';

export const PLACEHOLDER = '%s';

export async function loadTemplate(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new TemplateError(
      'TEMPLATE_READ',
      `Cannot read template ${path}: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }
}

/**
 * Replace the template's single `%s` with `body`.
 *
 * The template is scanned once, so `%` sequences inside `body` are never
 * interpreted. Throws TemplateError when the template has no `%s`, more than
 * one, or any other `%` sequence.
 *
 * @param source - Reported in errors (usually the template path)
 */
export function substitute(template: string, body: string, source = '<template>'): string {
  const parts: string[] = [];
  let placeholders = 0;
  let start = 0;
  let i = template.indexOf('%');

  while (i !== -1) {
    parts.push(template.slice(start, i));
    const next = template[i + 1];

    if (next === '%') {
      parts.push('%');
    } else if (next === 's') {
      placeholders++;
      parts.push(body);
    } else {
      const found =
        next === undefined ? 'lone "%" at end' : `format sequence "%${next}" at offset ${i}`;
      throw new TemplateError(
        'TEMPLATE_FORMAT',
        `Unsupported ${found} in ${source} (write "%%" for a literal percent sign)`,
        source
      );
    }

    start = i + 2;
    i = template.indexOf('%', start);
  }
  parts.push(template.slice(start));

  if (placeholders !== 1) {
    throw new TemplateError(
      'TEMPLATE_FORMAT',
      `Template ${source} must contain exactly one "${PLACEHOLDER}" placeholder, found ${placeholders}`,
      source
    );
  }

  return parts.join('');
}

/**
 * Render every snippet and substitute the result into the template
 */
export function renderDocument(
  snippets: SnippetCollection,
  template: string,
  source?: string
): string {
  return substitute(template, renderFragments(snippets).join('\n'), source);
}
