// Public API — barrel export

export { StringList } from './StringList.ts';
export { compareStrings } from './compare.ts';
export type { FilterFunction, PatternInput } from './types.ts';
