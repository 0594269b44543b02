// offer/wildcard.ts - Ant-style wildcard matching over flat strings
//
//   ?   exactly one character
//   *   zero or more characters within one "/"-separated segment
//   **  (a whole segment) zero or more segments
//
// Matching is case-sensitive. Instance and price type names rarely contain
// "/", so in practice a pattern is a single segment.

const SEGMENT_SEPARATOR = "/";
const ANY_SEGMENTS = "**";

export function matchWildcard(pattern: string, candidate: string): boolean {
  return matchSegments(pattern.split(SEGMENT_SEPARATOR), 0, candidate.split(SEGMENT_SEPARATOR), 0);
}

/** True when any pattern matches. */
export function matchesAny(patterns: readonly string[], candidate: string): boolean {
  return patterns.some(pattern => matchWildcard(pattern, candidate));
}

/** Split a comma-delimited preference value into trimmed, non-blank patterns. */
export function parsePatterns(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map(p => p.trim())
    .filter(p => p.length > 0);
}

function matchSegments(patterns: string[], pi: number, parts: string[], ci: number): boolean {
  while (pi < patterns.length) {
    const segment = patterns[pi] ?? "";
    if (segment === ANY_SEGMENTS) {
      while (pi + 1 < patterns.length && patterns[pi + 1] === ANY_SEGMENTS) pi++;
      if (pi === patterns.length - 1) return true;
      for (let k = ci; k <= parts.length; k++) {
        if (matchSegments(patterns, pi + 1, parts, k)) return true;
      }
      return false;
    }
    if (ci >= parts.length || !matchSegment(segment, parts[ci] ?? "")) return false;
    pi++;
    ci++;
  }
  return ci === parts.length;
}

// Greedy two-pointer match with backtracking to the last "*".
function matchSegment(pattern: string, text: string): boolean {
  let p = 0;
  let t = 0;
  let star = -1;
  let mark = 0;

  while (t < text.length) {
    const pc = pattern[p];
    if (pc === "*") {
      star = p++;
      mark = t;
    } else if (pc !== undefined && (pc === "?" || pc === text[t])) {
      p++;
      t++;
    } else if (star !== -1) {
      p = star + 1;
      t = ++mark;
    } else {
      return false;
    }
  }
  while (pattern[p] === "*") p++;
  return p === pattern.length;
}
