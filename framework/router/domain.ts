/**
 * Host Router
 *
 * Dispatches on the request's host name instead of its path. Patterns are
 * dot-separated labels, matched from the right:
 *
 *   example.com       exactly that host
 *   www.+.com         `+` stands for exactly one label
 *   *.example.com     `*` stands for one or more leading labels
 *   *                 any host, including a missing one
 *
 * A literal label beats `+`, which beats `*`, at every position.
 */

import { BaseEndpoint, toEndpoint } from '../endpoint/endpoint.ts';
import { RegistrationError } from '../http/errors.ts';
import type { JunctionRequest } from '../http/request.ts';
import { JunctionResponse } from '../http/response.ts';
import type { Endpoint, EndpointLike } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

interface HostNode {
  labels: Map<string, HostNode>;
  any?: HostNode;
  rest?: Endpoint;
  endpoint?: Endpoint;
}

function createNode(): HostNode {
  return { labels: new Map() };
}

/**
 * Host name of a Host header value, lowercased, without port or trailing dot
 */
export function hostName(host: string): string {
  const name = host.startsWith('[')
    ? host.slice(0, host.indexOf(']') + 1)
    : host.split(':')[0];
  return name.toLowerCase().replace(/\.$/, '');
}

export class DomainRouter extends BaseEndpoint {
  private readonly root = createNode();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    super();
    this.logger = logger ?? getLogger().child({ component: 'domain-router' });
  }

  /**
   * Register an endpoint for a host pattern
   */
  at(pattern: string, handler: EndpointLike): this {
    const labels = pattern.toLowerCase().split('.').reverse();
    if (labels.some((label) => label === '')) {
      throw new RegistrationError(pattern, 'empty label');
    }

    const endpoint = toEndpoint(handler);
    let node = this.root;
    for (let i = 0; i < labels.length; i++) {
      const label = labels[i];
      if (label === '*') {
        if (i !== labels.length - 1) {
          throw new RegistrationError(pattern, '"*" must be the leftmost label');
        }
        if (node.rest) {
          throw new RegistrationError(pattern, 'host is already registered');
        }
        node.rest = endpoint;
        this.logger.debug('Host registered', { pattern });
        return this;
      }
      node = label === '+' ? (node.any ??= createNode()) : child(node, label);
    }

    if (node.endpoint) {
      throw new RegistrationError(pattern, 'host is already registered');
    }
    node.endpoint = endpoint;
    this.logger.debug('Host registered', { pattern });
    return this;
  }

  /**
   * Endpoint registered for a host, if any
   */
  resolve(host: string): Endpoint | undefined {
    const name = hostName(host);
    if (name === '') return this.root.rest;
    return find(this.root, name.split('.').reverse(), 0);
  }

  async call(req: JunctionRequest): Promise<Response> {
    const endpoint = this.resolve(req.host);
    if (!endpoint) {
      return new JunctionResponse().notFound();
    }
    return await endpoint.call(req);
  }
}

function child(node: HostNode, label: string): HostNode {
  let next = node.labels.get(label);
  if (!next) {
    next = createNode();
    node.labels.set(label, next);
  }
  return next;
}

function find(node: HostNode, labels: string[], index: number): Endpoint | undefined {
  if (index === labels.length) return node.endpoint;

  const named = node.labels.get(labels[index]);
  const fromNamed = named && find(named, labels, index + 1);
  if (fromNamed) return fromNamed;

  const fromAny = node.any && find(node.any, labels, index + 1);
  if (fromAny) return fromAny;

  return node.rest;
}
