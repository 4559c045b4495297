/**
 * Fixed operational constants. Deployment-specific values live in env.ts.
 */

// === Tenant routing ===

/** Leftmost host labels that never name a tenant. */
export const RESERVED_SUBDOMAINS: readonly string[] = ['www', 'app', 'api'];

/** Path prefix for slug routing, e.g. /r/luigi */
export const SLUG_PATH_PREFIX = '/r/';

// === Persona defaults ===

export const DEFAULT_ASSISTANT_NAME = 'Sophie';
export const DEFAULT_PERSONALITY = 'friendly and helpful';

// === Recommendations ===

/** Upper bound on items extracted from generated text. */
export const MAX_EXTRACTED_RECOMMENDATIONS = 2;

/** Items shown with a greeting. */
export const FEATURED_ITEM_COUNT = 3;

// === Dialogue sessions ===

export const DIALOGUE_SESSION_TTL_MS = 30 * 60 * 1000;
export const DIALOGUE_SESSION_MAX_ENTRIES = 10_000;

// === Stats ===

export const STATS_WINDOW_DAYS = 30;

// === Conversation log ===

/** Session id recorded when the client sends none. */
export const ANONYMOUS_SESSION_ID = 'anonymous';
