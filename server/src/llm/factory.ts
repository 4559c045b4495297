import OpenAI from "openai";
import type { LLMProvider } from "./types.js";
import { OpenAiChatProvider } from "./openai.provider.js";
import type { AppConfig } from "../config/env.js";
import type { Logger } from "../lib/logger/structured-logger.js";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

/** HTTP transport handed to the openai client; the global fetch when omitted. */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type BackendSelection =
    | { kind: "none"; reason: string }
    | { kind: "openai" | "groq"; apiKey: string; model: string };

/**
 * Decide which backend to use. Under "auto" the OpenAI key wins when both
 * are present; an explicitly named backend without a key disables generation.
 */
export function resolveBackendSelection(llm: AppConfig["llm"]): BackendSelection {
    const openai = llm.openaiApiKey
        ? { kind: "openai" as const, apiKey: llm.openaiApiKey, model: llm.openaiModel }
        : null;
    const groq = llm.groqApiKey
        ? { kind: "groq" as const, apiKey: llm.groqApiKey, model: llm.groqModel }
        : null;

    switch (llm.provider) {
        case "none":
            return { kind: "none", reason: "LLM_PROVIDER=none" };
        case "openai":
            return openai ?? { kind: "none", reason: "OPENAI_API_KEY not set" };
        case "groq":
            return groq ?? { kind: "none", reason: "GROQ_API_KEY not set" };
        case "auto":
            return openai ?? groq ?? { kind: "none", reason: "no backend API key set" };
    }
}

export function createLLMProvider(
    llm: AppConfig["llm"],
    log: Logger,
    fetchImpl?: FetchLike
): LLMProvider | null {
    const selection = resolveBackendSelection(llm);

    if (selection.kind === "none") {
        log.info({ event: "backend_disabled", reason: selection.reason }, "[LLM] Generative backend disabled, using rule engine");
        return null;
    }

    const client = new OpenAI({
        apiKey: selection.apiKey,
        maxRetries: 0,
        timeout: llm.timeoutMs,
        ...(selection.kind === "groq" ? { baseURL: GROQ_BASE_URL } : {}),
        ...(fetchImpl ? { fetch: fetchImpl } : {})
    });

    log.info({ event: "backend_selected", backend: selection.kind, model: selection.model }, "[LLM] Generative backend configured");

    return new OpenAiChatProvider(client, {
        name: selection.kind,
        model: selection.model,
        maxTokens: llm.maxTokens,
        temperature: llm.temperature,
        timeoutMs: llm.timeoutMs
    });
}
