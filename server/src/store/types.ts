import type { ConversationRecord, DailyConversationStats, MenuItem, Tenant } from './tenant.types.js';

/**
 * Durable store contract. Implementations throw StoreUnavailableError on any
 * query failure; "not found" is a null result, never an error.
 */
export interface TenantStore {
  /** Active tenant by subdomain. */
  findTenantBySubdomain(subdomain: string): Promise<Tenant | null>;

  /** Active tenant by slug. */
  findTenantBySlug(slug: string): Promise<Tenant | null>;

  /** Tenant by id regardless of active flag (cache invalidation needs routing keys). */
  findTenantById(tenantId: string): Promise<Tenant | null>;

  /** Active items ordered by display order, category, name. */
  listMenuItems(tenantId: string): Promise<MenuItem[]>;

  appendConversation(record: ConversationRecord): Promise<void>;

  /** Per-day conversation counts over the trailing window, newest first. */
  getTenantStats(tenantId: string, days: number): Promise<DailyConversationStats[]>;

  ping(): Promise<void>;
}
