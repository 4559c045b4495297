import { StoreUnavailableError } from '../../src/lib/errors/app-errors.js';
import type {
  ConversationRecord,
  DailyConversationStats,
  MenuItem,
  Tenant
} from '../../src/store/tenant.types.js';
import type { TenantStore } from '../../src/store/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * In-process TenantStore with call recording and switchable failures.
 */
export class InMemoryTenantStore implements TenantStore {
  readonly calls: string[] = [];
  readonly conversations: ConversationRecord[] = [];
  /** When set, every operation fails with StoreUnavailableError. */
  down = false;
  failConversationWrites = false;

  constructor(
    private readonly tenants: Tenant[] = [],
    private readonly menus: Map<string, MenuItem[]> = new Map(),
    private readonly now: () => number = Date.now
  ) {}

  setMenu(tenantId: string, items: MenuItem[]): void {
    this.menus.set(tenantId, items);
  }

  async findTenantBySubdomain(subdomain: string): Promise<Tenant | null> {
    this.enter('findTenantBySubdomain');
    return this.tenants.find(t => t.active && t.subdomain === subdomain) ?? null;
  }

  async findTenantBySlug(slug: string): Promise<Tenant | null> {
    this.enter('findTenantBySlug');
    return this.tenants.find(t => t.active && t.slug === slug) ?? null;
  }

  async findTenantById(tenantId: string): Promise<Tenant | null> {
    this.enter('findTenantById');
    return this.tenants.find(t => t.id === tenantId) ?? null;
  }

  async listMenuItems(tenantId: string): Promise<MenuItem[]> {
    this.enter('listMenuItems');
    return [...(this.menus.get(tenantId) ?? [])];
  }

  async appendConversation(record: ConversationRecord): Promise<void> {
    this.enter('appendConversation');
    if (this.failConversationWrites) {
      throw new StoreUnavailableError('appendConversation', new Error('insert rejected'));
    }
    this.conversations.push(record);
  }

  async getTenantStats(tenantId: string, days: number): Promise<DailyConversationStats[]> {
    this.enter('getTenantStats');
    const since = this.now() - days * DAY_MS;
    const byDay = new Map<string, { total: number; sessions: Set<string> }>();

    for (const record of this.conversations) {
      if (record.tenantId !== tenantId || record.timestamp.getTime() <= since) continue;
      const date = record.timestamp.toISOString().slice(0, 10);
      const day = byDay.get(date) ?? { total: 0, sessions: new Set<string>() };
      day.total++;
      day.sessions.add(record.sessionId);
      byDay.set(date, day);
    }

    return [...byDay.entries()]
      .sort(([a], [b]) => b.localeCompare(a))
      .map(([date, day]) => ({ date, totalConversations: day.total, uniqueSessions: day.sessions.size }));
  }

  async ping(): Promise<void> {
    this.enter('ping');
  }

  count(operation: string): number {
    return this.calls.filter(call => call === operation).length;
  }

  private enter(operation: string): void {
    this.calls.push(operation);
    if (this.down) {
      throw new StoreUnavailableError(operation, new Error('connection refused'));
    }
  }
}
