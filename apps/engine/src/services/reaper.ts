import { executionStatus } from '../db/execution.entity';
import { ExecutionRepository, ReapedExecution, STEP_REAPED_MESSAGE } from '../repositories/types';
import { AuditRecorder } from './audit-recorder';
import { EventPublisher } from './event-publisher';

const TAG = '[reaper]';

// Fails executions left running by an orchestrator that stopped
// heartbeating. The conditional UPDATE only matches running rows, so
// several instances reaping at once cannot fail an execution twice.
export class Reaper {
    private readonly intervalMs: number;
    private readonly staleThresholdSeconds: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly repo: Pick<ExecutionRepository, 'failStale'>,
        private readonly recorder: Pick<AuditRecorder, 'record'>,
        private readonly publisher: EventPublisher,
        staleThresholdSeconds = 300,
        intervalMs = 10_000,
    ) {
        this.staleThresholdSeconds = staleThresholdSeconds;
        this.intervalMs = intervalMs;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);

        // Fire immediately, then on schedule
        void this.reap();
        this.intervalHandle = setInterval(() => {
            void this.reap();
        }, this.intervalMs);
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

    async reap(): Promise<ReapedExecution[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        let reaped: ReapedExecution[] = [];
        try {
            reaped = await this.repo.failStale(this.staleThresholdSeconds);
            for (const execution of reaped) this.report(execution);

            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} executions: ${reaped.map(e => `${e.id}(${e.worker_id ?? 'unowned'})`).join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }

        return reaped;
    }

    private report(execution: ReapedExecution): void {
        const message = `${STEP_REAPED_MESSAGE} (worker ${execution.worker_id ?? 'unknown'}): `
            + `${execution.failed_steps.length} steps failed, ${execution.skipped_steps.length} skipped`;
        this.recorder.record({
            executionId: execution.id,
            action: 'execution_reaped',
            status: executionStatus.FAILED,
            message,
        });
        this.publisher.publish(execution.id, 'execution_failed', {
            status: executionStatus.FAILED,
            reason: STEP_REAPED_MESSAGE,
            failedSteps: execution.failed_steps,
            skippedSteps: execution.skipped_steps,
            progress: execution.progress,
        });
    }
}
