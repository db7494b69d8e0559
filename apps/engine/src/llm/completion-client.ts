import type { CompletionResponse, MessageRole } from '@parley/sdk';

export interface CompletionRequest {
    messages: Array<{ role: MessageRole; content: string }>;
    model: string;
    temperature?: number;
    max_tokens?: number;
    tools: string[];
    resources: string[];
}

export interface CompletionClient {
    complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/** Worth retrying: rate limits, timeouts, upstream 5xx. */
export class TransientCompletionError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'TransientCompletionError';
    }
}

/** The provider rejected the request or returned something unusable. */
export class CompletionValidationError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'CompletionValidationError';
    }
}

/**
 * Routes each request to a client by model name, falling back to a default.
 * `echo` is always served locally so templates can run without a provider.
 */
export class CompletionRouter implements CompletionClient {
    constructor(
        private readonly fallback: CompletionClient,
        private readonly routes: Record<string, CompletionClient> = {},
    ) { }

    complete(request: CompletionRequest): Promise<CompletionResponse> {
        const client = this.routes[request.model] ?? this.fallback;
        return client.complete(request);
    }
}
