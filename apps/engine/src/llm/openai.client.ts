import OpenAI, { APIConnectionError, APIError, RateLimitError } from 'openai';
import type { CompletionResponse } from '@parley/sdk';
import {
    CompletionClient,
    CompletionRequest,
    CompletionValidationError,
    TransientCompletionError,
} from './completion-client';

const TAG = '[openai]';

export interface OpenAIClientConfig {
    apiKey: string;
    baseURL?: string;
    timeoutMs?: number;
}

/**
 * Chat-completions client. Tool and resource names are passed through as
 * function tools with an empty parameter schema; the dialog itself never
 * executes tool calls.
 */
export class OpenAICompletionClient implements CompletionClient {
    private client: OpenAI;

    constructor(config: OpenAIClientConfig, client?: OpenAI) {
        this.client = client ?? new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            timeout: config.timeoutMs ?? 60_000,
            maxRetries: 0,
        });
    }

    async complete(request: CompletionRequest): Promise<CompletionResponse> {
        const tools = request.tools.map((name) => ({
            type: 'function' as const,
            function: { name, parameters: { type: 'object', properties: {} } },
        }));

        try {
            const response = await this.client.chat.completions.create({
                model: request.model,
                messages: request.messages,
                temperature: request.temperature,
                max_tokens: request.max_tokens,
                tools: tools.length > 0 ? tools : undefined,
                stream: false,
            });

            const choice = response.choices[0];
            const text = choice?.message?.content;
            if (text === null || text === undefined) {
                throw new CompletionValidationError(`model ${request.model} returned no text content`);
            }

            return {
                text,
                model: response.model,
                finish_reason: choice.finish_reason ?? undefined,
                usage: response.usage
                    ? {
                        prompt_tokens: response.usage.prompt_tokens,
                        completion_tokens: response.usage.completion_tokens,
                        total_tokens: response.usage.total_tokens,
                    }
                    : undefined,
            };
        } catch (err) {
            throw classify(err);
        }
    }
}

function classify(err: unknown): Error {
    if (err instanceof CompletionValidationError) return err;
    if (err instanceof RateLimitError || err instanceof APIConnectionError) {
        return new TransientCompletionError(err.message, err);
    }
    if (err instanceof APIError) {
        if (err.status !== undefined && err.status >= 500) {
            return new TransientCompletionError(err.message, err);
        }
        return new CompletionValidationError(err.message, err);
    }
    console.error(`${TAG} unexpected completion failure:`, err);
    return err instanceof Error ? err : new Error(String(err));
}
