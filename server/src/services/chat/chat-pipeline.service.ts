/**
 * Chat Pipeline
 *
 * Per-request flow for one chat turn:
 *   resolve tenant -> profile (cache-aside) -> menu (cache-aside)
 *   -> backend, or rule engine when no backend / backend failed
 *   -> recommendations -> conversation log (not awaited) -> result
 *
 * AppErrors (not found, empty input, store down, client gone) pass through unchanged.
 * Anything else is logged and rethrown as InternalPipelineError.
 */

import { ANONYMOUS_SESSION_ID } from '../../config/index.js';
import {
  BackendError,
  EmptyInputError,
  InternalPipelineError,
  RequestAbortedError,
  TenantNotFoundError,
  errorMessage,
  isAppError
} from '../../lib/errors/app-errors.js';
import type { Logger } from '../../lib/logger/structured-logger.js';
import type { MenuItem, Tenant } from '../../store/tenant.types.js';
import type { TenantStore } from '../../store/types.js';
import type { BackendClient } from '../assistant/backend-client.js';
import type { DialogueSessionStore } from '../assistant/dialogue-session.store.js';
import { assistantName } from '../assistant/prompt-builder.js';
import { extractRecommendations } from '../assistant/recommendation-extractor.js';
import type { RuleEngine } from '../assistant/rule-engine.js';
import type { TenantCacheService } from '../tenant/tenant-cache.service.js';
import { resolveTenant, type RequestAttributes } from '../tenant/tenant-resolver.js';

export const RULES_RESPONDER = 'rules';

export interface ChatTurnInput {
  message: string;
  sessionId?: string | undefined;
  request: RequestAttributes;
  signal?: AbortSignal | undefined;
}

export interface RecommendationView {
  id: string;
  name: string;
  price: number;
  description: string;
}

export interface ChatTurnResult {
  response: string;
  recommendations: RecommendationView[];
  tenant: { name: string; aiName: string };
  /** Backend name, or "rules" when the rule engine answered. */
  responder: string;
}

export interface ChatPipelineDeps {
  tenants: TenantCacheService;
  store: TenantStore;
  backend: BackendClient | null;
  rules: RuleEngine;
  sessions: DialogueSessionStore;
  logger: Logger;
  now?: () => number;
}

type Generated = { text: string; recommendations: MenuItem[]; responder: string };

function toView(item: MenuItem): RecommendationView {
  return { id: item.id, name: item.name, price: item.price, description: item.description };
}

export class ChatPipeline {
  private readonly now: () => number;

  constructor(private readonly deps: ChatPipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  get responderName(): string {
    return this.deps.backend?.backendName ?? 'fallback';
  }

  /**
   * Resolve the request to an active tenant profile. No cache or store access
   * happens when the request carries no routing hint.
   */
  async resolveProfile(request: RequestAttributes): Promise<Tenant> {
    const route = resolveTenant(request);
    if (route.scheme === 'none') {
      throw new TenantNotFoundError();
    }
    const tenant = await this.deps.tenants.getProfile(route.scheme, route.identifier);
    if (!tenant) {
      throw new TenantNotFoundError(route.identifier);
    }
    return tenant;
  }

  async handleTurn(input: ChatTurnInput): Promise<ChatTurnResult> {
    const message = input.message.trim();
    if (!message) {
      throw new EmptyInputError();
    }
    const sessionId = input.sessionId?.trim() || ANONYMOUS_SESSION_ID;
    const startedAt = this.now();

    try {
      const tenant = await this.resolveProfile(input.request);
      const menu = await this.deps.tenants.getMenu(tenant.id);
      const generated = await this.generate(tenant, menu, message, sessionId, input.signal);

      this.logConversation(tenant.id, sessionId, message, generated, this.now() - startedAt);

      return {
        response: generated.text,
        recommendations: generated.recommendations.map(toView),
        tenant: { name: tenant.name, aiName: assistantName(tenant) },
        responder: generated.responder
      };
    } catch (error) {
      if (isAppError(error)) throw error;

      this.deps.logger.error(
        { event: 'pipeline_failed', sessionId, error: errorMessage(error) },
        '[ChatPipeline] Unexpected failure'
      );
      throw new InternalPipelineError(error);
    }
  }

  private async generate(
    tenant: Tenant,
    menu: MenuItem[],
    message: string,
    sessionId: string,
    signal: AbortSignal | undefined
  ): Promise<Generated> {
    const backend = this.deps.backend;
    if (backend) {
      try {
        const text = await backend.generate({ tenant, menu, message, ...(signal ? { signal } : {}) });
        return { text, recommendations: extractRecommendations(text, menu), responder: backend.backendName };
      } catch (error) {
        if (!(error instanceof BackendError)) throw error;
        if (signal?.aborted) {
          this.deps.logger.debug(
            { event: 'turn_abandoned', backend: error.backend, tenantId: tenant.id, sessionId },
            '[ChatPipeline] Client went away, turn abandoned'
          );
          throw new RequestAbortedError(error);
        }
        this.deps.logger.warn(
          {
            event: 'backend_error',
            backend: error.backend,
            status: error.status,
            detail: error.detail,
            tenantId: tenant.id
          },
          '[ChatPipeline] Backend failed, falling back to rule engine'
        );
      }
    }
    return this.answerWithRules(tenant, menu, message, sessionId);
  }

  private answerWithRules(tenant: Tenant, menu: MenuItem[], message: string, sessionId: string): Generated {
    const session = this.deps.sessions.get(tenant.id, sessionId);
    const reply = this.deps.rules.respond({ message, tenant, menu, session });
    this.deps.sessions.save(tenant.id, sessionId, reply.session);

    this.deps.logger.debug(
      { event: 'rule_engine_fallback', intent: reply.intent, tenantId: tenant.id },
      '[ChatPipeline] Rule engine answered'
    );
    return { text: reply.message, recommendations: reply.recommendations, responder: RULES_RESPONDER };
  }

  /**
   * The insert is started before the response is returned but never awaited.
   */
  private logConversation(
    tenantId: string,
    sessionId: string,
    message: string,
    generated: Generated,
    responseTimeMs: number
  ): void {
    this.deps.store
      .appendConversation({
        tenantId,
        sessionId,
        message,
        response: generated.text,
        responder: generated.responder,
        responseTimeMs,
        timestamp: new Date(this.now())
      })
      .catch((error: unknown) => {
        this.deps.logger.error(
          { event: 'conversation_log_failed', tenantId, sessionId, error: errorMessage(error) },
          '[ChatPipeline] Failed to record conversation'
        );
      });
  }
}
