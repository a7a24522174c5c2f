/**
 * Junction
 *
 * Request routing and handler composition for HTTP servers on Node.js.
 * Consumes a Fetch `Request`, produces a `Response`.
 *
 *   const router = new Router()
 *     .use(logging())
 *     .get('/users/:id', (req) => Response.json({ id: req.param('id') }));
 *
 *   const response = await router.call(JunctionRequest.from('/users/42'));
 *
 * @module junction
 */

// Layer 1: HTTP
export * from './http/mod.ts';

// Endpoints
export * from './endpoint/mod.ts';

// Layer 2: Middleware
export * from './middleware/mod.ts';

// Layer 3: Router
export * from './router/mod.ts';

// Layer 14: Config
export * from './config/mod.ts';

// Layer 18: Telemetry
export * from './telemetry/mod.ts';
