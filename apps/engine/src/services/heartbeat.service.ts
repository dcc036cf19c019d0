import { ExecutionRepository } from '../repositories/types';

const TAG = '[heartbeat]';

/**
 * Keeps heartbeat_at fresh for every execution whose control loop runs in
 * this process, so the reaper can tell live owners from dead ones.
 */
export class HeartbeatService {
    private readonly intervalMs: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private readonly executionIds = new Set<string>();

    constructor(
        private readonly repo: Pick<ExecutionRepository, 'updateHeartbeat'>,
        intervalMs: number = 5000
    ) {
        this.intervalMs = intervalMs;
    }

    start(executionId: string): void {
        if (this.executionIds.has(executionId)) {
            console.warn(`${TAG} already tracking execution ${executionId}`);
            return;
        }
        this.executionIds.add(executionId);
        void this.tick();

        if (!this.intervalHandle) {
            this.intervalHandle = setInterval(() => {
                void this.tick();
            }, this.intervalMs);
            this.intervalHandle.unref();
            console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);
        }
    }

    stop(executionId: string): void {
        this.executionIds.delete(executionId);
        if (this.executionIds.size === 0) this.clear();
    }

    stopAll(): void {
        this.executionIds.clear();
        this.clear();
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    tracked(): string[] {
        return [...this.executionIds];
    }

    private clear(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
            console.log(`${TAG} stopped`);
        }
    }

    private async tick(): Promise<void> {
        const ids = this.tracked();
        if (ids.length === 0) return;

        try {
            await this.repo.updateHeartbeat(ids);
        } catch (err) {
            console.error(`${TAG} failed to update ${ids.length} executions:`, err);
        }
    }
}
