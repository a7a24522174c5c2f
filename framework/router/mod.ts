/**
 * Layer 3: Routing Layer
 *
 * Maps incoming request paths to endpoints.
 * Supports literal, capture, regex and wildcard segments with
 * order-independent precedence, method tables and mounting.
 *
 * Responsibilities:
 * - Map paths to handlers in time bounded by pattern depth
 * - Extract structured data from URLs
 * - Reject ambiguous routes at startup
 * - Support URL generation/reversing
 */

export {
  type MethodHandlers,
  type MountOptions,
  type Resolution,
  type RouteOptions,
  Router,
  type RouterOptions,
} from './router.ts';
export { buildPath, compile, joinPatterns, type Pattern, type Segment, type Specificity } from './pattern.ts';
export { decodeSegment, matches, splitPath, type MatchOptions } from './matcher.ts';
export {
  HTTP_METHODS,
  type HttpMethod,
  isHttpMethod,
  type MethodSelector,
  MethodTable,
  parseMethod,
} from './method_table.ts';
export { PathParams } from './params.ts';
export { compareSpecificity, type RegexPrecedence, type RouteEntry, RouteTrie } from './trie.ts';
export { DomainRouter, hostName } from './domain.ts';
export { SchemeRouter } from './scheme.ts';
