import { ConcurrentExecutionError } from './errors';

/**
 * At most one execution per dialog id inside this process. A second caller
 * is rejected immediately rather than queued, so it never sees or mutates
 * half-applied state.
 */
export class DialogLock {
    private held = new Set<string>();

    acquire(dialogId: string): void {
        if (this.held.has(dialogId)) {
            throw new ConcurrentExecutionError(dialogId);
        }
        this.held.add(dialogId);
    }

    release(dialogId: string): void {
        this.held.delete(dialogId);
    }

    isHeld(dialogId: string): boolean {
        return this.held.has(dialogId);
    }

    async run<T>(dialogId: string, fn: () => Promise<T>): Promise<T> {
        this.acquire(dialogId);
        try {
            return await fn();
        } finally {
            this.release(dialogId);
        }
    }
}
