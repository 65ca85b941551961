/**
 * Route Matcher
 *
 * Picks the pipeline for an inbound request from its method and path.
 * Stateless; the configured paths are the only input besides the request.
 *
 * @packageDocumentation
 */

export type RouteKind = 'chat' | 'messages' | 'passthrough';

export type RouteMatch = { kind: RouteKind } | { kind: 'method-not-allowed' };

export interface RouteTable {
  readonly chat: readonly string[];
  readonly messages: readonly string[];
}

export const PASSTHROUGH_METHODS: readonly string[] = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'HEAD'];

export function matchRoute(method: string, pathname: string, routes: RouteTable): RouteMatch {
  const m = method.toUpperCase();
  if (m === 'POST') {
    if (routes.chat.includes(pathname)) return { kind: 'chat' };
    if (routes.messages.includes(pathname)) return { kind: 'messages' };
  }
  if (PASSTHROUGH_METHODS.includes(m)) return { kind: 'passthrough' };
  return { kind: 'method-not-allowed' };
}

/**
 * Upstream URL for a pass-through request.
 *
 * The leading `/` is dropped; a `v1/` prefix is dropped only when the base
 * already ends in `/v1`. The query string is kept as sent.
 */
export function passthroughTarget(baseUrl: string, pathname: string, search: string): URL {
  let path = pathname.startsWith('/') ? pathname.slice(1) : pathname;
  if (baseUrl.endsWith('/v1') && path.startsWith('v1/')) {
    path = path.slice(3);
  } else if (path.startsWith('/')) {
    path = path.slice(1);
  }
  return new URL(`${baseUrl}/${path}${search}`);
}

export function chatTarget(baseUrl: string): URL {
  return new URL(`${baseUrl}/chat/completions`);
}

export function messagesTarget(baseUrl: string): URL {
  return new URL(`${baseUrl}/messages`);
}
