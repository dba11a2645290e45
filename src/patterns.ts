// Pattern compilation for the regex filters

import type { PatternInput } from './types.ts';

// Flags that make a RegExp stateful (lastIndex) or anchored to lastIndex
const STATEFUL_FLAGS = /[gy]/g;

/**
 * Build the RegExp a filter runs with.
 *
 * Strings compile with no flags. A RegExp keeps its flags, except `g` and `y`
 * which are always dropped, then `g` is added back when `global` is set.
 * An invalid pattern source throws the engine's SyntaxError as-is.
 */
export function compilePattern(pattern: PatternInput, global: boolean): RegExp {
  let source: string;
  let flags: string;
  if (typeof pattern === 'string') {
    source = pattern;
    flags = '';
  } else {
    source = pattern.source;
    flags = pattern.flags.replace(STATEFUL_FLAGS, '');
  }
  return new RegExp(source, global ? flags + 'g' : flags);
}
