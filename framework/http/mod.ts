/**
 * Layer 1: HTTP Layer
 *
 * Request/response wrappers over the WHATWG Fetch types that Node.js
 * provides, and the error types shared by every layer.
 *
 * Responsibilities:
 * - Expose routing data (params, handler path) on the request
 * - Provide a consistent response builder
 * - Turn thrown errors into responses
 * - Enable testability (requests built in-process)
 */

export { JunctionRequest, MATCHED_ROUTE, type RequestContext } from './request.ts';
export { JunctionResponse, type ResponseOptions, withHeaders } from './response.ts';
export {
  CompileError,
  ConfigError,
  errorToResponse,
  HttpError,
  JunctionError,
  RegistrationError,
  STATUS_TEXT,
} from './errors.ts';
export type {
  AfterFn,
  BeforeFn,
  Endpoint,
  EndpointLike,
  Handler,
  Middleware,
  MiddlewareFn,
  Next,
} from './types.ts';
