/**
 * Response Builder
 *
 * Fluent interface for building HTTP responses, including the
 * responses the router produces for unmatched requests.
 */

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

/**
 * Response builder for Junction
 */
export class JunctionResponse {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _body: BodyInit | null = null;

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      new Headers(options.headers).forEach((value, key) => {
        this._headers.set(key, value);
      });
    }
  }

  status(code: number): this {
    this._status = code;
    return this;
  }

  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  json(data: unknown): Response {
    this._headers.set('Content-Type', 'application/json; charset=utf-8');
    this._body = JSON.stringify(data);
    return this.build();
  }

  text(content: string): Response {
    this._headers.set('Content-Type', 'text/plain; charset=utf-8');
    this._body = content;
    return this.build();
  }

  empty(): Response {
    this._body = null;
    return this.build();
  }

  /**
   * Send a 404 Not Found response
   */
  notFound(message = 'Not Found'): Response {
    this._status = 404;
    return this.json({ error: message });
  }

  /**
   * Send a 405 response listing the methods the path accepts
   */
  methodNotAllowed(allowed: readonly string[], message = 'Method Not Allowed'): Response {
    this._status = 405;
    this._headers.set('Allow', allowed.join(', '));
    return this.json({ error: message });
  }

  serverError(message = 'Internal Server Error'): Response {
    this._status = 500;
    return this.json({ error: message });
  }

  build(): Response {
    return new Response(this._body, {
      status: this._status,
      headers: new Headers(this._headers),
    });
  }
}

/**
 * Copy a response with some headers changed; Response headers may be
 * immutable (e.g. from fetch), so middleware edits a copy.
 */
export function withHeaders(
  response: Response,
  edit: (headers: Headers) => void,
): Response {
  const headers = new Headers(response.headers);
  edit(headers);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
