/**
 * Segment Matcher
 *
 * Matches one compiled pattern against a request path. The trie uses the
 * same per-segment tests, so a route found through the trie and a direct
 * `matches` call always agree.
 */

import type { Pattern, Segment } from './pattern.ts';
import { PathParams } from './params.ts';

export interface MatchOptions {
  /** Compare literal segments case-insensitively */
  ignoreCase?: boolean;
}

/**
 * Split a request path into raw (still percent-encoded) segments.
 * Empty pieces are skipped, as in compilation.
 */
export function splitPath(path: string): string[] {
  const query = path.indexOf('?');
  const pathname = query === -1 ? path : path.slice(0, query);
  return pathname.split('/').filter((piece) => piece.length > 0);
}

/** Try decodeURIComponent, return the original segment on malformed input. */
export function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function literalKey(value: string, ignoreCase: boolean): string {
  return ignoreCase ? value.toLowerCase() : value;
}

/**
 * Test one single-segment pattern piece. Returns the captured value, `true`
 * for a matching literal, or `undefined` on mismatch.
 */
export function matchSegment(
  segment: Exclude<Segment, { kind: 'wildcard' }>,
  raw: string,
  ignoreCase = false,
): string | true | undefined {
  switch (segment.kind) {
    case 'literal':
      return literalKey(segment.value, ignoreCase) === literalKey(raw, ignoreCase) ? true : undefined;
    case 'capture':
      return decodeSegment(raw);
    case 'regex': {
      const value = decodeSegment(raw);
      return segment.regex.test(value) ? value : undefined;
    }
  }
}

/**
 * Join the remaining raw segments into a wildcard value
 */
export function wildcardValue(rawSegments: readonly string[], from: number): string {
  return rawSegments.slice(from).map(decodeSegment).join('/');
}

/**
 * Match `pattern` against `path`.
 *
 * Returns the captured parameters, or undefined when any segment fails.
 */
export function matches(
  pattern: Pattern,
  path: string,
  options: MatchOptions = {},
): PathParams | undefined {
  const values = matchCaptures(pattern, splitPath(path), options.ignoreCase ?? false);
  return values ? PathParams.fromCaptures(pattern.captureNames, values) : undefined;
}

/**
 * Positional capture values for a match, or undefined
 */
export function matchCaptures(
  pattern: Pattern,
  raw: readonly string[],
  ignoreCase: boolean,
): string[] | undefined {
  const { segments, hasWildcard } = pattern;
  const fixed = hasWildcard ? segments.length - 1 : segments.length;

  if (hasWildcard ? raw.length < fixed : raw.length !== fixed) {
    return undefined;
  }

  const values: string[] = [];
  for (let i = 0; i < fixed; i++) {
    const segment = segments[i];
    if (segment.kind === 'wildcard') return undefined;

    const result = matchSegment(segment, raw[i], ignoreCase);
    if (result === undefined) return undefined;
    if (result !== true) values.push(result);
  }

  if (hasWildcard) {
    values.push(wildcardValue(raw, fixed));
  }

  return values;
}
