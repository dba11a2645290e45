// Shared TypeScript interfaces and types

/**
 * Callback for StringList#filter. Receives the index being visited and the
 * source items, and returns whether to keep an entry plus the value to keep.
 * The returned value may differ from `items[index]`, so one pass can filter
 * and transform at once.
 */
export type FilterFunction = (
  index: number,
  items: readonly string[],
) => readonly [keep: boolean, value: string];

// A pattern source, or a RegExp whose flags should carry over
export type PatternInput = string | RegExp;
