import { MAX_EXTRACTED_RECOMMENDATIONS } from '../../config/index.js';
import type { MenuItem } from '../../store/tenant.types.js';

/**
 * Menu items whose full name appears (case-insensitive, verbatim) in the text.
 * Menu order is preserved and scanning stops at the limit.
 */
export function extractRecommendations(
  text: string,
  menu: readonly MenuItem[],
  limit: number = MAX_EXTRACTED_RECOMMENDATIONS
): MenuItem[] {
  const haystack = text.toLowerCase();
  const found: MenuItem[] = [];

  for (const item of menu) {
    if (found.length >= limit) break;
    const needle = item.name.toLowerCase();
    if (needle && haystack.includes(needle)) {
      found.push(item);
    }
  }
  return found;
}
