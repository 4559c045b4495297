import type { LLMProvider, Message } from '../../llm/types.js';
import type { Logger } from '../../lib/logger/structured-logger.js';
import type { MenuItem, Tenant } from '../../store/tenant.types.js';
import { buildSystemPrompt } from './prompt-builder.js';

export interface BackendRequest {
  tenant: Tenant;
  menu: readonly MenuItem[];
  message: string;
  signal?: AbortSignal;
}

export function buildMessages(tenant: Tenant, menu: readonly MenuItem[], message: string): Message[] {
  return [
    { role: 'system', content: buildSystemPrompt(tenant, menu) },
    { role: 'user', content: message }
  ];
}

/**
 * Thin adapter between the chat pipeline and the configured provider.
 * Failures propagate as BackendError; the pipeline decides the fallback.
 */
export class BackendClient {
  constructor(
    private readonly provider: LLMProvider,
    private readonly log: Logger
  ) {}

  get backendName(): string {
    return this.provider.name;
  }

  async generate(request: BackendRequest): Promise<string> {
    const startedAt = Date.now();
    const text = await this.provider.complete(
      buildMessages(request.tenant, request.menu, request.message),
      request.signal ? { signal: request.signal } : {}
    );

    this.log.debug(
      {
        event: 'backend_completion',
        backend: this.provider.name,
        model: this.provider.model,
        tenantId: request.tenant.id,
        durationMs: Date.now() - startedAt
      },
      '[Backend] Completion received'
    );
    return text;
  }
}
