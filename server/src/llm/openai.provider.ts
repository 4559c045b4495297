import OpenAI from "openai";
import { z } from "zod";
import type { BackendName, CompletionOptions, LLMProvider, Message } from "./types.js";
import { BackendError, errorMessage } from "../lib/errors/app-errors.js";

export type ChatProviderOptions = {
    name: BackendName;
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
};

const ChatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional()
                })
            })
        )
        .min(1)
});

/**
 * OpenAI-compatible chat completions. Serves both OpenAI and Groq; the
 * difference is the client's baseURL and the model name.
 */
export class OpenAiChatProvider implements LLMProvider {
    readonly name: BackendName;
    readonly model: string;

    constructor(private readonly client: OpenAI, private readonly options: ChatProviderOptions) {
        this.name = options.name;
        this.model = options.model;
    }

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        let response: unknown;
        try {
            response = await this.client.chat.completions.create(
                {
                    model: this.options.model,
                    messages: messages.map(m => ({ role: m.role, content: m.content })),
                    max_tokens: this.options.maxTokens,
                    temperature: this.options.temperature
                },
                { timeout: this.options.timeoutMs, maxRetries: 0, ...(opts?.signal ? { signal: opts.signal } : {}) }
            );
        } catch (e) {
            if (e instanceof OpenAI.APIError) {
                throw new BackendError(this.name, e.message, e.status, { cause: e });
            }
            throw new BackendError(this.name, errorMessage(e), undefined, { cause: e });
        }

        const parsed = ChatCompletionSchema.safeParse(response);
        if (!parsed.success) {
            throw new BackendError(this.name, "response has no choices[0].message");
        }
        const content = parsed.data.choices[0]?.message.content?.trim();
        if (!content) {
            throw new BackendError(this.name, "empty completion content");
        }
        return content;
    }
}
