/**
 * Include/exclude glob filter for transfer selection.
 *
 * A filter is written as a comma-separated list of glob patterns; a leading `!`
 * turns a pattern into an exclusion. A path is selected when it matches at
 * least one include pattern (or there are none) and no exclude pattern.
 *
 * Patterns match the whole forward-slash relative path:
 * - `*` matches anything except `/`
 * - `**` matches anything including `/`; `**` followed by a slash also
 *   matches zero directories
 * - `?` matches a single character except `/`
 * - `[abc]` / `[!abc]` character classes
 */

export interface GlobRule {
  /** Pattern as written, without the leading `!` */
  pattern: string;
  /** Compiled, anchored matcher */
  regex: RegExp;
}

export interface GlobFilter {
  include: GlobRule[];
  exclude: GlobRule[];
}

const REGEX_SPECIAL = new Set(['.', '+', '^', '$', '{', '}', '(', ')', '|', '\\', ']']);

/** Translate a bracket expression starting at `open`, or null if it never closes. */
function bracketClass(pattern: string, open: number): { source: string; end: number } | null {
  const close = pattern.indexOf(']', open + 2);
  if (close === -1) return null;

  let members = pattern.slice(open + 1, close).replace(/\\/g, '\\\\');
  if (members.startsWith('!')) {
    members = '^' + members.slice(1);
  }
  return { source: `[${members}]`, end: close + 1 };
}

/**
 * Compile one glob pattern into an anchored RegExp.
 */
export function globToRegex(pattern: string): RegExp {
  const glob = pattern.replace(/\\/g, '/').replace(/^\/+/, '');
  const out: string[] = [];

  for (let pos = 0; pos < glob.length; ) {
    const char = glob.charAt(pos);

    switch (char) {
      case '*': {
        const doubled = glob.charAt(pos + 1) === '*';
        if (doubled && glob.charAt(pos + 2) === '/') {
          out.push('(?:.*/)?');
          pos += 3;
        } else {
          out.push(doubled ? '.*' : '[^/]*');
          pos += doubled ? 2 : 1;
        }
        break;
      }
      case '?':
        out.push('[^/]');
        pos += 1;
        break;
      case '[': {
        const bracket = bracketClass(glob, pos);
        out.push(bracket ? bracket.source : '\\[');
        pos = bracket ? bracket.end : pos + 1;
        break;
      }
      default:
        out.push(REGEX_SPECIAL.has(char) ? `\\${char}` : char);
        pos += 1;
    }
  }

  return new RegExp(`^${out.join('')}$`);
}

/**
 * Parse a comma-separated pattern list. Blank entries are skipped; an
 * undefined or blank list selects everything.
 */
export function parseGlobFilter(patterns: string | undefined): GlobFilter {
  const filter: GlobFilter = { include: [], exclude: [] };
  if (!patterns) {
    return filter;
  }

  for (const raw of patterns.split(',')) {
    const trimmed = raw.trim();
    if (trimmed === '' || trimmed === '!') {
      continue;
    }
    if (trimmed.startsWith('!')) {
      const pattern = trimmed.slice(1).trim();
      filter.exclude.push({ pattern, regex: globToRegex(pattern) });
    } else {
      filter.include.push({ pattern: trimmed, regex: globToRegex(trimmed) });
    }
  }

  return filter;
}

/** True when the filter has no patterns at all */
export function isEmptyFilter(filter: GlobFilter): boolean {
  return filter.include.length === 0 && filter.exclude.length === 0;
}

/**
 * Check a relative path against a filter.
 */
export function matchesGlobFilter(relativePath: string, filter: GlobFilter): boolean {
  const normalizedPath = relativePath.replace(/\\/g, '/').replace(/^\/+/, '');

  const included =
    filter.include.length === 0 ||
    filter.include.some((rule) => rule.regex.test(normalizedPath));
  if (!included) {
    return false;
  }

  return !filter.exclude.some((rule) => rule.regex.test(normalizedPath));
}
