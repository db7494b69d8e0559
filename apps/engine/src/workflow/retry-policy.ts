import type { DialogTemplate, ErrorHandling, StepDefinition } from '@parley/sdk';
import { calculateBackOff } from '../utils/backoff';

export const DEFAULT_MAX_RETRIES = 3;

export interface ResolvedErrorHandling {
    strategy: ErrorHandling['strategy'];
    maxRetries: number;
    fallbackStep?: string;
    /** true when the policy came from the template default rather than the step */
    inherited: boolean;
}

// Step-level policy wins over the template default; the global default is `fail`.
export function resolveErrorHandling(step: StepDefinition, template: DialogTemplate): ResolvedErrorHandling {
    const policy = step.error_handling ?? template.error_handling;
    if (!policy) {
        return { strategy: 'fail', maxRetries: 0, inherited: true };
    }
    return {
        strategy: policy.strategy,
        maxRetries: policy.strategy === 'retry' ? policy.max_retries ?? DEFAULT_MAX_RETRIES : 0,
        fallbackStep: policy.fallback_step,
        inherited: step.error_handling === undefined,
    };
}

export interface RetryDelayOptions {
    /** 0 disables backoff: retries run immediately */
    baseDelayMs: number;
    maxDelayMs?: number;
}

/** Delay before retry number `attempt` (1-indexed). */
export function retryDelay(attempt: number, options: RetryDelayOptions): number {
    if (options.baseDelayMs <= 0) return 0;
    return calculateBackOff(attempt, options.baseDelayMs, 2, options.maxDelayMs ?? 30_000);
}
