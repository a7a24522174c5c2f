/**
 * Response header middleware
 *
 *   router.use(
 *     setHeader()
 *       .overriding('X-Frame-Options', 'DENY')
 *       .appending('Cache-Control', 'no-store'),
 *   );
 */

import { AfterEndpoint } from '../endpoint/endpoint.ts';
import { withHeaders } from '../http/response.ts';
import type { Endpoint, Middleware } from '../http/types.ts';

type HeaderAction = { kind: 'override' | 'append'; name: string; value: string };

export class SetHeader implements Middleware {
  private readonly actions: HeaderAction[] = [];

  /**
   * Set a header, replacing any value the response already has
   */
  overriding(name: string, value: string): this {
    this.actions.push({ kind: 'override', name, value });
    return this;
  }

  /**
   * Add a header value, keeping existing values
   */
  appending(name: string, value: string): this {
    this.actions.push({ kind: 'append', name, value });
    return this;
  }

  transform(inner: Endpoint): Endpoint {
    const actions = [...this.actions];
    return new AfterEndpoint(inner, (response) =>
      withHeaders(response, (headers) => {
        for (const action of actions) {
          if (action.kind === 'override') {
            headers.set(action.name, action.value);
          } else {
            headers.append(action.name, action.value);
          }
        }
      })
    );
  }
}

export function setHeader(): SetHeader {
  return new SetHeader();
}
