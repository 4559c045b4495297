/**
 * PostgreSQL Tenant Store
 *
 * Query shapes follow database/schema.sql. Rows are normalized into the
 * JSON-safe Tenant / MenuItem records (numeric price, ISO timestamps,
 * arrays for JSONB lists) and validated before they leave this module.
 */

import { z } from 'zod';
import { StoreUnavailableError } from '../lib/errors/app-errors.js';
import {
  MenuItemSchema,
  TenantSchema,
  type ConversationRecord,
  type DailyConversationStats,
  type MenuItem,
  type Tenant
} from './tenant.types.js';
import type { TenantStore } from './types.js';

/**
 * The part of a pg Pool the store needs. Rows are validated, not trusted.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const TenantRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  subdomain: z.string().nullable(),
  slug: z.string().nullable(),
  description: z.string().nullable(),
  theme_config: z.unknown(),
  ai_name: z.string().nullable(),
  ai_personality: z.string().nullable(),
  welcome_message: z.string().nullable(),
  logo_url: z.string().nullable(),
  active: z.boolean(),
  created_at: z.union([z.date(), z.string()])
});

export type TenantRow = z.infer<typeof TenantRowSchema>;

const MenuItemRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  // NUMERIC arrives as a string
  price: z.union([z.string(), z.number()]),
  category: z.string(),
  ingredients: z.unknown(),
  allergens: z.unknown(),
  vegetarian: z.boolean().nullable(),
  vegan: z.boolean().nullable(),
  gluten_free: z.boolean().nullable(),
  spice_level: z.number().nullable(),
  prep_time: z.string().nullable(),
  calories: z.number().nullable(),
  chef_notes: z.string().nullable(),
  image_url: z.string().nullable(),
  display_order: z.number().nullable()
});

export type MenuItemRow = z.infer<typeof MenuItemRowSchema>;

const StatsRowSchema = z.object({
  date: z.string(),
  total_conversations: z.number(),
  unique_sessions: z.number()
});

const TENANT_COLUMNS = `id, name, subdomain, slug, description, theme_config, ai_name, ai_personality,
       welcome_message, logo_url, active, created_at`;

const MENU_COLUMNS = `id, name, description, price, category, ingredients, allergens, vegetarian, vegan,
       gluten_free, spice_level, prep_time, calories, chef_notes, image_url, display_order`;

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

function toRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

export function mapTenantRow(row: TenantRow): Tenant {
  return TenantSchema.parse({
    id: row.id,
    name: row.name,
    subdomain: row.subdomain,
    slug: row.slug,
    description: row.description,
    themeConfig: toRecord(row.theme_config),
    aiName: row.ai_name,
    aiPersonality: row.ai_personality,
    welcomeMessage: row.welcome_message,
    logoUrl: row.logo_url,
    active: row.active,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at)
  });
}

export function mapMenuItemRow(row: MenuItemRow): MenuItem {
  return MenuItemSchema.parse({
    id: row.id,
    name: row.name,
    description: row.description ?? '',
    price: typeof row.price === 'number' ? row.price : Number.parseFloat(row.price),
    category: row.category,
    ingredients: toStringList(row.ingredients),
    allergens: toStringList(row.allergens),
    vegetarian: row.vegetarian ?? false,
    vegan: row.vegan ?? false,
    glutenFree: row.gluten_free ?? false,
    spiceLevel: row.spice_level ?? 0,
    prepTime: row.prep_time,
    calories: row.calories,
    chefNotes: row.chef_notes,
    imageUrl: row.image_url,
    displayOrder: row.display_order ?? 0
  });
}

export class PgTenantStore implements TenantStore {
  constructor(private readonly client: SqlClient) {}

  async findTenantBySubdomain(subdomain: string): Promise<Tenant | null> {
    return this.findOneTenant(
      'findTenantBySubdomain',
      `SELECT ${TENANT_COLUMNS} FROM restaurants WHERE subdomain = $1 AND active = true`,
      subdomain
    );
  }

  async findTenantBySlug(slug: string): Promise<Tenant | null> {
    return this.findOneTenant(
      'findTenantBySlug',
      `SELECT ${TENANT_COLUMNS} FROM restaurants WHERE slug = $1 AND active = true`,
      slug
    );
  }

  async findTenantById(tenantId: string): Promise<Tenant | null> {
    return this.findOneTenant(
      'findTenantById',
      `SELECT ${TENANT_COLUMNS} FROM restaurants WHERE id = $1`,
      tenantId
    );
  }

  async listMenuItems(tenantId: string): Promise<MenuItem[]> {
    return this.run('listMenuItems', async () => {
      const result = await this.client.query(
        `SELECT ${MENU_COLUMNS}
           FROM menu_items
          WHERE restaurant_id = $1 AND active = true
          ORDER BY display_order, category, name`,
        [tenantId]
      );
      return result.rows.map(row => mapMenuItemRow(MenuItemRowSchema.parse(row)));
    });
  }

  async appendConversation(record: ConversationRecord): Promise<void> {
    await this.run('appendConversation', async () => {
      await this.client.query(
        `INSERT INTO conversations
           (restaurant_id, session_id, message, response, ai_service, response_time_ms, timestamp)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          record.tenantId,
          record.sessionId,
          record.message,
          record.response,
          record.responder,
          record.responseTimeMs,
          record.timestamp
        ]
      );
    });
  }

  async getTenantStats(tenantId: string, days: number): Promise<DailyConversationStats[]> {
    return this.run('getTenantStats', async () => {
      const result = await this.client.query(
        `SELECT to_char(DATE(timestamp), 'YYYY-MM-DD') AS date,
                COUNT(*)::int AS total_conversations,
                COUNT(DISTINCT session_id)::int AS unique_sessions
           FROM conversations
          WHERE restaurant_id = $1
            AND timestamp > CURRENT_DATE - make_interval(days => $2::int)
          GROUP BY DATE(timestamp)
          ORDER BY DATE(timestamp) DESC`,
        [tenantId, days]
      );
      return result.rows.map(raw => StatsRowSchema.parse(raw)).map(row => ({
        date: row.date,
        totalConversations: row.total_conversations,
        uniqueSessions: row.unique_sessions
      }));
    });
  }

  async ping(): Promise<void> {
    await this.run('ping', async () => {
      await this.client.query('SELECT 1');
    });
  }

  private async findOneTenant(operation: string, sql: string, key: string): Promise<Tenant | null> {
    return this.run(operation, async () => {
      const result = await this.client.query(sql, [key]);
      const row = result.rows[0];
      return row === undefined ? null : mapTenantRow(TenantRowSchema.parse(row));
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}
