/**
 * Endpoints
 *
 * The `call(request) → Response` contract shared by handlers, routers and
 * composed middleware chains.
 */

export {
  AfterEndpoint,
  AroundEndpoint,
  BaseEndpoint,
  BeforeEndpoint,
  endpoint,
  HandlerEndpoint,
  isEndpoint,
  toEndpoint,
} from './endpoint.ts';
