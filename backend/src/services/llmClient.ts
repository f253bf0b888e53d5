/**
 * Completion-source contracts shared by the prompt layer and the generator.
 */

export interface LlmUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export interface LlmCompletion {
    text: string;
    usage: LlmUsage | null;
}

export interface LlmDispatchOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

/** Raw-text interface the prompt layer talks to. */
export interface LlmDispatcher {
    dispatch(prompt: string, options?: LlmDispatchOptions): Promise<string>;
}

/** Completion source that also reports token usage. */
export interface LlmCompletionClient {
    complete(prompt: string, options?: LlmDispatchOptions): Promise<LlmCompletion>;
}

/**
 * Accumulates token usage across the LLM calls of one generation run.
 */
export class LlmUsageTracker {
    private usage: LlmUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

    reset(): void {
        this.usage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    }

    record(usage: Partial<LlmUsage>): void {
        this.usage.promptTokens += Math.max(usage.promptTokens ?? 0, 0);
        this.usage.completionTokens += Math.max(usage.completionTokens ?? 0, 0);
        this.usage.totalTokens += Math.max(usage.totalTokens ?? 0, 0);
    }

    snapshot(): LlmUsage {
        return { ...this.usage };
    }
}

/**
 * Wrap a completion client so every call feeds `tracker`.
 */
export function trackUsage(
    client: LlmCompletionClient,
    tracker: LlmUsageTracker
): LlmDispatcher {
    return {
        async dispatch(prompt, options) {
            const completion = await client.complete(prompt, options);
            if (completion.usage) {
                tracker.record(completion.usage);
            }
            return completion.text;
        },
    };
}
