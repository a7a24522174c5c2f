/**
 * Route Pattern Compiler
 *
 * Compiles route strings into an immutable list of typed segments:
 *
 *   /users/active        literal segments
 *   /users/:id           single-segment capture
 *   /item/:id<\d+>       capture constrained by an anchored regex
 *   /item/<\d+>          unnamed regex capture
 *   /files/*rest         trailing wildcard, captures the remaining path
 *
 * All validation happens here, at startup; nothing about a pattern can fail
 * at request time.
 */

import { CompileError } from '../http/errors.ts';

export type Segment =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'capture'; readonly name?: string }
  | { readonly kind: 'regex'; readonly name?: string; readonly source: string; readonly regex: RegExp }
  | { readonly kind: 'wildcard'; readonly name?: string };

/**
 * Segment counts used to rank patterns matching the same path
 */
export interface Specificity {
  readonly literals: number;
  readonly regexes: number;
  readonly captures: number;
  readonly wildcard: boolean;
}

export interface Pattern {
  /** Pattern text as written (normalized to a leading slash) */
  readonly source: string;
  readonly segments: readonly Segment[];
  /** Name of each capturing segment in order; undefined for unnamed ones */
  readonly captureNames: readonly (string | undefined)[];
  readonly hasWildcard: boolean;
  readonly specificity: Specificity;
  /** Structural identity: equal keys match exactly the same paths */
  readonly shapeKey: string;
}

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Compile a route pattern string
 */
export function compile(pattern: string): Pattern {
  if (pattern.length === 0) {
    throw new CompileError(pattern, 'pattern is empty');
  }

  const segments = pattern
    .split('/')
    .filter((piece) => piece.length > 0)
    .map((piece) => parseSegment(pattern, piece));

  return fromSegments(pattern, segments);
}

/**
 * Concatenate a prefix pattern and a child pattern (mounting)
 */
export function joinPatterns(prefix: Pattern, child: Pattern): Pattern {
  const source = joinSources(prefix.source, child.source);
  return fromSegments(source, [...prefix.segments, ...child.segments]);
}

function joinSources(prefix: string, child: string): string {
  const head = prefix === '/' ? '' : prefix.replace(/\/+$/, '');
  const tail = child === '/' ? '' : child;
  return head + tail || '/';
}

function parseSegment(pattern: string, piece: string): Segment {
  if (piece.startsWith('*')) {
    return { kind: 'wildcard', name: parseName(pattern, piece.slice(1)) };
  }

  if (piece.startsWith(':')) {
    const open = piece.indexOf('<');
    if (open === -1) {
      return { kind: 'capture', name: parseName(pattern, piece.slice(1)) };
    }
    return parseRegex(pattern, piece.slice(open), parseName(pattern, piece.slice(1, open)));
  }

  if (piece.startsWith('<')) {
    return parseRegex(pattern, piece, undefined);
  }

  return { kind: 'literal', value: piece };
}

function parseName(pattern: string, name: string): string | undefined {
  if (name.length === 0) return undefined;
  if (!NAME_RE.test(name)) {
    throw new CompileError(pattern, `invalid capture name "${name}"`);
  }
  return name;
}

/**
 * Parse `<REGEX>` (the whole remainder of the piece)
 */
function parseRegex(pattern: string, text: string, name: string | undefined): Segment {
  if (!text.endsWith('>') || text.length < 2) {
    throw new CompileError(pattern, `unterminated regex in segment "${text}"`);
  }

  const source = text.slice(1, -1);
  if (source.length === 0) {
    throw new CompileError(pattern, 'empty regex');
  }

  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${source})$`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CompileError(pattern, `invalid regex <${source}>: ${reason}`);
  }

  return { kind: 'regex', name, source, regex };
}

function fromSegments(source: string, segments: Segment[]): Pattern {
  const captureNames: (string | undefined)[] = [];
  const seen = new Set<string>();
  let literals = 0;
  let regexes = 0;
  let captures = 0;

  segments.forEach((segment, index) => {
    if (segment.kind === 'literal') {
      literals++;
      return;
    }

    if (segment.kind === 'wildcard' && index !== segments.length - 1) {
      throw new CompileError(source, 'a wildcard must be the last segment');
    }
    if (segment.kind === 'regex') regexes++;
    if (segment.kind === 'capture') captures++;

    if (segment.name !== undefined) {
      if (seen.has(segment.name)) {
        throw new CompileError(source, `duplicate capture name "${segment.name}"`);
      }
      seen.add(segment.name);
    }
    captureNames.push(segment.name);
  });

  const hasWildcard = segments.at(-1)?.kind === 'wildcard';

  return Object.freeze({
    source: source.startsWith('/') ? source : '/' + source,
    segments: Object.freeze(segments),
    captureNames: Object.freeze(captureNames),
    hasWildcard,
    specificity: Object.freeze({ literals, regexes, captures, wildcard: hasWildcard }),
    shapeKey: shapeKey(segments),
  });
}

/**
 * Key for one segment position; capture names do not take part
 */
export function segmentKey(segment: Segment): string {
  switch (segment.kind) {
    case 'literal':
      return 'L' + segment.value;
    case 'capture':
      return ':';
    case 'regex':
      return '<' + segment.source + '>';
    case 'wildcard':
      return '*';
  }
}

function shapeKey(segments: readonly Segment[]): string {
  return '/' + segments.map(segmentKey).join('/');
}

/**
 * Render a concrete path for a pattern. Capture values are percent-encoded;
 * a wildcard value keeps its slashes.
 */
export function buildPath(pattern: Pattern, params: Record<string, string>): string {
  let captureIndex = 0;
  const pieces = pattern.segments.map((segment) => {
    if (segment.kind === 'literal') return segment.value;

    const name = pattern.captureNames[captureIndex++];
    if (name === undefined) {
      throw new Error(`Cannot build a path for "${pattern.source}": it has an unnamed capture`);
    }
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing parameter "${name}" for "${pattern.source}"`);
    }
    if (segment.kind === 'regex' && !segment.regex.test(value)) {
      throw new Error(`Parameter "${name}" does not match <${segment.source}>`);
    }
    if (segment.kind === 'wildcard') {
      return value.split('/').map(encodeURIComponent).join('/');
    }
    return encodeURIComponent(value);
  });

  return '/' + pieces.filter((piece) => piece.length > 0).join('/');
}
