/**
 * Route Trie
 *
 * Segment-based trie holding every registered route. Each node stands for
 * one pattern shape prefix; children are tried in order
 *
 *   literal (Map lookup) → regex captures → plain capture → wildcard
 *
 * (regex and plain capture swap places under the 'capture' precedence
 * policy). Unlike a first-match walk, lookup collects every route whose
 * pattern matches and lets the router rank them by specificity, so the
 * winner does not depend on registration order. Only branches that match
 * the path are visited, which keeps the cost close to the path depth.
 */

import { RegistrationError } from '../http/errors.ts';
import type { MethodTable } from './method_table.ts';
import { literalKey, matchSegment, wildcardValue } from './matcher.ts';
import { segmentKey, type Pattern, type Segment, type Specificity } from './pattern.ts';

export type RegexPrecedence = 'regex' | 'capture';

export interface RouteEntry {
  readonly pattern: Pattern;
  readonly methods: MethodTable;
  /** Registration order; used in diagnostics only, never for precedence */
  readonly order: number;
  readonly name?: string;
  readonly meta?: Readonly<Record<string, unknown>>;
  /** Segment positions hidden from the handler path (stripped mount prefixes) */
  readonly strip: readonly number[];
}

interface TrieNode {
  entries: RouteEntry[];
  literals: Map<string, TrieNode>;
  regexes: { key: string; segment: Extract<Segment, { kind: 'regex' }>; node: TrieNode }[];
  capture?: TrieNode;
  wildcard?: TrieNode;
}

/**
 * A node whose shape matches the path, with the positional capture values
 */
export interface Candidate {
  readonly entries: readonly RouteEntry[];
  readonly values: readonly string[];
}

export interface TrieOptions {
  ignoreCase?: boolean;
  regexPrecedence?: RegexPrecedence;
}

function createNode(): TrieNode {
  return { entries: [], literals: new Map(), regexes: [] };
}

/**
 * Rank two patterns matching the same path. Positive when `a` is more
 * specific than `b`, zero on a tie.
 */
export function compareSpecificity(
  a: Specificity,
  b: Specificity,
  policy: RegexPrecedence = 'regex',
): number {
  if (a.literals !== b.literals) return a.literals - b.literals;
  if (a.wildcard !== b.wildcard) return a.wildcard ? -1 : 1;

  const regexes = a.regexes - b.regexes;
  if (regexes !== 0) return policy === 'regex' ? regexes : -regexes;

  return a.captures - b.captures;
}

export class RouteTrie {
  private readonly root: TrieNode = createNode();
  /** Nodes by structural key, for duplicate checks without walking */
  private readonly index = new Map<string, TrieNode>();
  private readonly all: RouteEntry[] = [];
  readonly ignoreCase: boolean;
  readonly regexPrecedence: RegexPrecedence;

  constructor(options: TrieOptions = {}) {
    this.ignoreCase = options.ignoreCase ?? false;
    this.regexPrecedence = options.regexPrecedence ?? 'regex';
  }

  get size(): number {
    return this.all.length;
  }

  /**
   * Structural key of a pattern under this trie's literal comparison
   */
  shapeOf(pattern: Pattern): string {
    if (!this.ignoreCase) return pattern.shapeKey;
    return '/' + pattern.segments
      .map((segment) =>
        segment.kind === 'literal'
          ? 'L' + literalKey(segment.value, this.ignoreCase)
          : segmentKey(segment)
      )
      .join('/');
  }

  /**
   * Validate a batch of entries against the trie and against each other.
   * Throws on the first structurally identical pattern sharing a method.
   */
  check(entries: readonly RouteEntry[]): void {
    const pending = new Map<string, RouteEntry[]>();

    for (const entry of entries) {
      const shape = this.shapeOf(entry.pattern);
      const others = [...(this.index.get(shape)?.entries ?? []), ...(pending.get(shape) ?? [])];

      for (const other of others) {
        const overlap = other.methods.overlap(entry.methods);
        if (overlap.length > 0) {
          throw new RegistrationError(
            entry.pattern.source,
            `conflicts with route #${other.order} "${other.pattern.source}"`,
            overlap.join(', '),
          );
        }
      }

      pending.set(shape, [...(pending.get(shape) ?? []), entry]);
    }
  }

  /**
   * Add a validated entry
   */
  insert(entry: RouteEntry): void {
    let node = this.root;

    for (const segment of entry.pattern.segments) {
      node = this.child(node, segment);
    }

    node.entries.push(entry);
    this.index.set(this.shapeOf(entry.pattern), node);
    this.all.push(entry);
  }

  /**
   * All entries in registration order
   */
  entries(): readonly RouteEntry[] {
    return this.all;
  }

  /**
   * Every node whose shape matches the raw path segments, in exploration order
   */
  collect(raw: readonly string[]): Candidate[] {
    const out: Candidate[] = [];
    this.walk(this.root, raw, 0, [], out);
    return out;
  }

  private child(node: TrieNode, segment: Segment): TrieNode {
    switch (segment.kind) {
      case 'literal': {
        const key = literalKey(segment.value, this.ignoreCase);
        let next = node.literals.get(key);
        if (!next) {
          next = createNode();
          node.literals.set(key, next);
        }
        return next;
      }
      case 'regex': {
        const key = segment.source;
        let branch = node.regexes.find((r) => r.key === key);
        if (!branch) {
          branch = { key, segment, node: createNode() };
          node.regexes.push(branch);
        }
        return branch.node;
      }
      case 'capture':
        node.capture ??= createNode();
        return node.capture;
      case 'wildcard':
        node.wildcard ??= createNode();
        return node.wildcard;
    }
  }

  private walk(
    node: TrieNode,
    raw: readonly string[],
    index: number,
    values: string[],
    out: Candidate[],
  ): void {
    if (index === raw.length) {
      if (node.entries.length > 0) {
        out.push({ entries: node.entries, values: [...values] });
      }
      // A trailing wildcard may capture nothing
      if (node.wildcard && node.wildcard.entries.length > 0) {
        out.push({ entries: node.wildcard.entries, values: [...values, ''] });
      }
      return;
    }

    const segment = raw[index];

    const literal = node.literals.get(literalKey(segment, this.ignoreCase));
    if (literal) {
      this.walk(literal, raw, index + 1, values, out);
    }

    if (this.regexPrecedence === 'regex') {
      this.walkRegexes(node, raw, index, values, out);
      this.walkCapture(node, raw, index, values, out);
    } else {
      this.walkCapture(node, raw, index, values, out);
      this.walkRegexes(node, raw, index, values, out);
    }

    if (node.wildcard && node.wildcard.entries.length > 0) {
      out.push({ entries: node.wildcard.entries, values: [...values, wildcardValue(raw, index)] });
    }
  }

  private walkRegexes(
    node: TrieNode,
    raw: readonly string[],
    index: number,
    values: string[],
    out: Candidate[],
  ): void {
    for (const branch of node.regexes) {
      const value = matchSegment(branch.segment, raw[index]);
      if (typeof value === 'string') {
        values.push(value);
        this.walk(branch.node, raw, index + 1, values, out);
        values.pop();
      }
    }
  }

  private walkCapture(
    node: TrieNode,
    raw: readonly string[],
    index: number,
    values: string[],
    out: Candidate[],
  ): void {
    if (!node.capture) return;
    const value = matchSegment({ kind: 'capture' }, raw[index]);
    if (typeof value === 'string') {
      values.push(value);
      this.walk(node.capture, raw, index + 1, values, out);
      values.pop();
    }
  }
}
