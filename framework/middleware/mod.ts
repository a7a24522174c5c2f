/**
 * Layer 2: Middleware Layer
 *
 * Cross-cutting concerns that wrap an endpoint. Implements the onion
 * model where each middleware wraps the next.
 *
 * Responsibilities:
 * - Handle cross-cutting concerns without polluting handlers
 * - Compose in a fixed order, built once at startup
 * - Observe 404 and 405 responses like any other
 */

export { after, around, before, compose, toMiddleware } from './compose.ts';
export { conditional, forMethods, forPath, MiddlewarePipeline } from './pipeline.ts';
export { addData } from './add_data.ts';
export { cors, type CorsOptions } from './cors.ts';
export { levelForStatus, logging, type LoggingOptions } from './logging.ts';
export { SetHeader, setHeader } from './set_header.ts';
export { stripPrefix } from './strip_prefix.ts';
export { tracing, type TracingOptions } from './tracing.ts';
