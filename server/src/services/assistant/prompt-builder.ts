import { DEFAULT_ASSISTANT_NAME, DEFAULT_PERSONALITY } from '../../config/index.js';
import type { MenuItem, Tenant } from '../../store/tenant.types.js';

export function assistantName(tenant: Tenant): string {
  return tenant.aiName?.trim() || DEFAULT_ASSISTANT_NAME;
}

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

const yesNo = (flag: boolean): string => (flag ? 'Yes' : 'No');

export function formatMenuLine(item: MenuItem): string {
  return (
    `- ${item.name}: ${item.description} (${formatPrice(item.price)}) ` +
    `[Category: ${item.category}, Vegetarian: ${yesNo(item.vegetarian)}, ` +
    `Vegan: ${yesNo(item.vegan)}, Gluten-free: ${yesNo(item.glutenFree)}]`
  );
}

/**
 * Tenant-specific system prompt. Deterministic for a given tenant + menu.
 */
export function buildSystemPrompt(tenant: Tenant, menu: readonly MenuItem[]): string {
  const name = assistantName(tenant);
  const personality = tenant.aiPersonality?.trim() || DEFAULT_PERSONALITY;
  const menuText = menu.length > 0 ? menu.map(formatMenuLine).join('\n') : '(the menu is currently empty)';

  return `You are ${name}, the AI assistant for ${tenant.name}.
You are ${personality}.

RESTAURANT MENU:
${menuText}

GUIDELINES:
- Be warm and engaging but keep responses concise (10-20 words typically)
- Only mention prices when specifically asked
- Make personalized recommendations based on preferences
- Use emojis occasionally for warmth
- Always stay in character for ${tenant.name}
`;
}
