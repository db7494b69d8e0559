import type { dialogStatus } from '@parley/sdk';
import type { TransitionResult, DialogRef } from '../workflow/engine';
import { ConcurrentExecutionError } from '../workflow/errors';
import type { DialogStore } from '../workflow/ports';

const TAG = '[recovery]';

export interface RecoveredDialog {
    id: string;
    status: dialogStatus;
}

export interface RecoveryOptions {
    staleThresholdSeconds?: number;
    intervalMs?: number;
    batchSize?: number;
}

interface Advancer {
    advance(ref: DialogRef): Promise<TransitionResult>;
}

// Re-drives dialogs left `running` by a process that died mid-step.
export class DialogRecovery {
    private readonly staleThresholdSeconds: number;
    private readonly intervalMs: number;
    private readonly batchSize: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isRecovering = false;

    constructor(
        private readonly store: DialogStore,
        private readonly engine: Advancer,
        options: RecoveryOptions = {},
    ) {
        this.staleThresholdSeconds = options.staleThresholdSeconds ?? 300;
        this.intervalMs = options.intervalMs ?? 30_000;
        this.batchSize = options.batchSize ?? 50;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);

        // Fire immediately, then on schedule
        void this.recover();
        this.intervalHandle = setInterval(() => void this.recover(), this.intervalMs);
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async recover(): Promise<RecoveredDialog[]> {
        if (this.isRecovering) return [];
        this.isRecovering = true;

        const recovered: RecoveredDialog[] = [];

        try {
            const ids = await this.store.findStalled(this.staleThresholdSeconds, this.batchSize);
            for (const id of ids) {
                try {
                    const result = await this.engine.advance(id);
                    recovered.push({ id, status: result.dialog.status });
                } catch (err) {
                    if (err instanceof ConcurrentExecutionError) {
                        console.log(`${TAG} dialog ${id} is being driven already, skipping`);
                        continue;
                    }
                    console.error(`${TAG} could not recover dialog ${id}:`, err);
                }
            }

            if (recovered.length > 0) {
                console.log(`${TAG} recovered ${recovered.length} dialogs: ${recovered.map((d) => `${d.id}(${d.status})`).join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during recovery cycle:`, err);
        } finally {
            this.isRecovering = false;
        }

        return recovered;
    }
}
