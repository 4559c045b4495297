export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

export type BackendName = "openai" | "groq";

export type CompletionOptions = {
    /** Aborted when the client goes away; the in-flight request is cancelled. */
    signal?: AbortSignal;
};

export interface LLMProvider {
    readonly name: BackendName;
    readonly model: string;

    /**
     * Single chat completion. Resolves to the trimmed, non-empty reply text;
     * rejects with BackendError on any failure.
     */
    complete(messages: Message[], opts?: CompletionOptions): Promise<string>;
}
