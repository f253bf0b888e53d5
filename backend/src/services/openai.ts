import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { logger } from "../utils/logger";
import { config } from "../config";
import type {
    LlmCompletion,
    LlmCompletionClient,
    LlmDispatcher,
    LlmDispatchOptions,
} from "./llmClient";

export interface OpenAISettings {
    apiKey: string;
    baseUrl: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

const chatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullish() }).passthrough(),
            }).passthrough()
        )
        .default([]),
    usage: z
        .object({
            prompt_tokens: z.number().nullish(),
            completion_tokens: z.number().nullish(),
            total_tokens: z.number().nullish(),
        })
        .passthrough()
        .nullish(),
});

const EMPTY_COMPLETION: LlmCompletion = { text: "", usage: null };

class OpenAIService implements LlmCompletionClient, LlmDispatcher {
    private client: AxiosInstance;
    private settings: OpenAISettings;

    constructor(settings: OpenAISettings = config.openai) {
        this.settings = settings;
        this.client = axios.create({
            baseURL: settings.baseUrl,
            timeout: settings.timeoutMs,
            headers: {
                Authorization: `Bearer ${settings.apiKey}`,
                "Content-Type": "application/json",
            },
        });
    }

    isConfigured(): boolean {
        return this.settings.apiKey.length > 0;
    }

    /**
     * Send one prompt and return the trimmed reply. Any failure yields an
     * empty completion, which callers treat as "model unavailable".
     */
    async complete(
        prompt: string,
        options: LlmDispatchOptions = {}
    ): Promise<LlmCompletion> {
        if (!this.isConfigured()) {
            logger.warn(
                "OpenAI API key is not configured. Set OPENAI_API_KEY to enable LLM features."
            );
            return EMPTY_COMPLETION;
        }

        try {
            const response = await this.client.post("/chat/completions", {
                model: options.model ?? this.settings.model,
                messages: [
                    {
                        role: "user",
                        content: prompt,
                    },
                ],
                temperature: options.temperature ?? this.settings.temperature,
                max_tokens: options.maxTokens ?? this.settings.maxTokens,
            });

            const parsed = chatCompletionSchema.safeParse(response.data);
            if (!parsed.success) {
                logger.error("OpenAI returned an unexpected response shape");
                return EMPTY_COMPLETION;
            }

            const text = parsed.data.choices[0]?.message.content?.trim() ?? "";
            const usage = parsed.data.usage;
            if (!usage) {
                return { text, usage: null };
            }

            const promptTokens = usage.prompt_tokens ?? 0;
            const completionTokens = usage.completion_tokens ?? 0;
            return {
                text,
                usage: {
                    promptTokens,
                    completionTokens,
                    totalTokens: usage.total_tokens ?? promptTokens + completionTokens,
                },
            };
        } catch (error) {
            const detail = axios.isAxiosError(error)
                ? error.response?.data ?? error.message
                : error;
            logger.error("OpenAI request failed:", detail);
            return EMPTY_COMPLETION;
        }
    }

    async dispatch(prompt: string, options?: LlmDispatchOptions): Promise<string> {
        const completion = await this.complete(prompt, options);
        return completion.text;
    }
}

export { OpenAIService };
export const openAIService = new OpenAIService();
