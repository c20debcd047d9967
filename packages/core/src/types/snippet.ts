/**
 * One snippet read from the input directory.
 *
 * `id` is the file name with its extension removed; it becomes the slide title.
 */
export interface TextEntry {
  readonly id: string;
  readonly content: string;
}

/**
 * Snippets keyed by identifier, in collection order.
 */
export type SnippetCollection = Map<string, TextEntry>;
