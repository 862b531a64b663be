export {
  globToRegex,
  parseGlobFilter,
  isEmptyFilter,
  matchesGlobFilter,
} from './glob-filter.js';
export type { GlobRule, GlobFilter } from './glob-filter.js';
