import type { SnippetCollection, TextEntry } from '../types/index.js';

/**
 * Render one snippet as a beamer frame titled with its identifier.
 *
 * Content is inserted as-is: LaTeX special characters in a snippet reach the
 * engine unescaped.
 */
export function renderFragment(entry: TextEntry): string {
  return `\\begin{frame}\\frametitle{${entry.id}}\n\t${entry.content}\n\\end{frame}\n`;
}

export function renderFragments(snippets: SnippetCollection): string[] {
  return Array.from(snippets.values(), renderFragment);
}
