/**
 * Tenant Resolver
 *
 * Pure derivation of a routing key from request attributes. First match wins:
 *   1. leftmost host label (unless www/app/api)      -> subdomain
 *   2. /r/<slug> path                                -> slug
 *   3. restaurant_id in query string                 -> slug
 *   4. restaurant_id in body                         -> slug
 */

import { RESERVED_SUBDOMAINS, SLUG_PATH_PREFIX } from '../../config/index.js';
import type { RoutingScheme } from '../../store/tenant.types.js';

export interface RequestAttributes {
  host?: string | undefined;
  path?: string | undefined;
  query?: Record<string, unknown> | undefined;
  body?: unknown;
}

export type TenantRoute =
  | { scheme: RoutingScheme; identifier: string }
  | { scheme: 'none' };

export const NO_ROUTE: TenantRoute = { scheme: 'none' };

const IPV4_LITERAL = /^\d{1,3}(\.\d{1,3}){3}$/;

/**
 * Strip an optional :port and lower-case.
 */
function normalizeHost(host: string): string {
  const trimmed = host.trim().toLowerCase();
  const colon = trimmed.lastIndexOf(':');
  return colon > -1 && /^\d+$/.test(trimmed.slice(colon + 1)) ? trimmed.slice(0, colon) : trimmed;
}

function fromHost(host: string | undefined): string | null {
  if (!host) return null;
  const normalized = normalizeHost(host);
  if (!normalized.includes('.') || IPV4_LITERAL.test(normalized)) return null;

  const label = normalized.split('.')[0];
  if (!label || RESERVED_SUBDOMAINS.includes(label)) return null;
  return label;
}

function fromPath(path: string | undefined): string | null {
  if (!path || !path.startsWith(SLUG_PATH_PREFIX)) return null;
  const segment = path.slice(SLUG_PATH_PREFIX.length).split('/')[0];
  if (!segment) return null;
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function restaurantIdField(source: unknown): string | null {
  if (!source || typeof source !== 'object' || Array.isArray(source)) return null;
  const value: unknown = Reflect.get(source, 'restaurant_id');
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (Array.isArray(value) && typeof value[0] === 'string' && value[0].trim()) return value[0].trim();
  return null;
}

export function resolveTenant(attributes: RequestAttributes): TenantRoute {
  const subdomain = fromHost(attributes.host);
  if (subdomain) return { scheme: 'subdomain', identifier: subdomain };

  const pathSlug = fromPath(attributes.path);
  if (pathSlug) return { scheme: 'slug', identifier: pathSlug };

  const querySlug = restaurantIdField(attributes.query);
  if (querySlug) return { scheme: 'slug', identifier: querySlug };

  const bodySlug = restaurantIdField(attributes.body);
  if (bodySlug) return { scheme: 'slug', identifier: bodySlug };

  return NO_ROUTE;
}
