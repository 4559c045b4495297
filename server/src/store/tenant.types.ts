import { z } from 'zod';

/**
 * Tenant profile as served to the pipeline and cached.
 * Timestamps are ISO strings so a cached copy is identical to a fresh read.
 */
export const TenantSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  subdomain: z.string().nullable(),
  slug: z.string().nullable(),
  description: z.string().nullable(),
  themeConfig: z.record(z.string(), z.unknown()),
  aiName: z.string().nullable(),
  aiPersonality: z.string().nullable(),
  welcomeMessage: z.string().nullable(),
  logoUrl: z.string().nullable(),
  active: z.boolean(),
  createdAt: z.string()
});

export type Tenant = z.infer<typeof TenantSchema>;

export const MenuItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  price: z.number().nonnegative(),
  category: z.string(),
  ingredients: z.array(z.string()),
  allergens: z.array(z.string()),
  vegetarian: z.boolean(),
  vegan: z.boolean(),
  glutenFree: z.boolean(),
  spiceLevel: z.number().int().min(0).max(5),
  prepTime: z.string().nullable(),
  calories: z.number().int().nullable(),
  chefNotes: z.string().nullable(),
  imageUrl: z.string().nullable(),
  displayOrder: z.number().int()
});

export type MenuItem = z.infer<typeof MenuItemSchema>;

export const MenuSchema = z.array(MenuItemSchema);

export interface ConversationRecord {
  tenantId: string;
  sessionId: string;
  message: string;
  response: string;
  /** Which generator produced the response: a backend name or 'rules'. */
  responder: string;
  responseTimeMs: number;
  timestamp: Date;
}

export interface DailyConversationStats {
  /** YYYY-MM-DD */
  date: string;
  totalConversations: number;
  uniqueSessions: number;
}

export type RoutingScheme = 'subdomain' | 'slug';
