/**
 * Puts a shared value (a client, a settings object) into request state
 */

import type { Middleware } from '../http/types.ts';
import { before } from './compose.ts';

export function addData(key: string, value: unknown): Middleware {
  return before((req) => {
    req.state.set(key, value);
    return req;
  });
}
