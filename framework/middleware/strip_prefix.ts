/**
 * Removes a fixed prefix from the handler path. Requests outside the
 * prefix get a 404 without reaching the inner endpoint.
 */

import { JunctionResponse } from '../http/response.ts';
import type { Middleware } from '../http/types.ts';
import { around } from './compose.ts';

export function stripPrefix(prefix: string): Middleware {
  const base = '/' + prefix.split('/').filter((piece) => piece.length > 0).join('/');

  return around(async (req, next) => {
    if (base === '/') return await next();

    const path = req.path;
    if (path !== base && !path.startsWith(base + '/')) {
      return new JunctionResponse().notFound();
    }
    return await next(req.withPath(path.slice(base.length) || '/'));
  });
}
