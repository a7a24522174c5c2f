/**
 * HTTP Type Definitions
 */

import type { JunctionRequest } from './request.ts';

/**
 * Anything that turns a request into a response
 */
export interface Endpoint {
  call(req: JunctionRequest): Promise<Response>;
}

/**
 * Transforms one endpoint into another
 */
export interface Middleware {
  transform(inner: Endpoint): Endpoint;
}

/**
 * Request handler function
 */
export type Handler = (req: JunctionRequest) => Promise<Response> | Response;

/**
 * Calls the wrapped endpoint; a replacement request may be passed on
 */
export type Next = (req?: JunctionRequest) => Promise<Response>;

/**
 * Middleware function signature (sees request and response, may short-circuit)
 */
export type MiddlewareFn = (
  req: JunctionRequest,
  next: Next
) => Promise<Response> | Response;

/**
 * Request-only transformation
 */
export type BeforeFn = (req: JunctionRequest) => Promise<JunctionRequest> | JunctionRequest;

/**
 * Response-only transformation
 */
export type AfterFn = (res: Response) => Promise<Response> | Response;

export type EndpointLike = Endpoint | Handler;
