import type { CompletionResponse } from '@parley/sdk';
import { CompletionClient, CompletionRequest, CompletionValidationError } from './completion-client';

// Offline stand-in for a model: answers with the last user message.
export class EchoCompletionClient implements CompletionClient {
    constructor(private readonly prefix = '') { }

    async complete(request: CompletionRequest): Promise<CompletionResponse> {
        const lastUser = [...request.messages].reverse().find((m) => m.role === 'user');
        if (!lastUser) {
            throw new CompletionValidationError('echo completion needs at least one user message');
        }
        const text = `${this.prefix}${lastUser.content}`;
        return {
            text,
            model: request.model,
            finish_reason: 'stop',
            usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
        };
    }
}
