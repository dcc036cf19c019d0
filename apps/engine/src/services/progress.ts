import { ExecutionStatus, ExecutionView, StepCounts, StepFailure } from '@ensemble/sdk';
import { ExecutionWithSteps, executionStatus } from '../db/execution.entity';
import { StepEntity, stepStatus } from '../db/step.entity';
import { resolveStages, stageIndex } from './dependency-resolver';

export interface Progress {
    percent: number;
    status: ExecutionStatus;
    counts: StepCounts;
}

export function countSteps(steps: readonly Pick<StepEntity, 'status'>[]): StepCounts {
    const counts: StepCounts = { pending: 0, blocked: 0, running: 0, completed: 0, failed: 0, skipped: 0, total: steps.length };
    for (const step of steps) counts[step.status] += 1;
    return counts;
}

function deriveStatus(counts: StepCounts, started: boolean): ExecutionStatus {
    if (counts.total > 0 && counts.completed === counts.total) return executionStatus.COMPLETED;
    const waiting = counts.pending + counts.blocked;
    if (counts.running > 0 || (waiting > 0 && started)) return executionStatus.RUNNING;
    if (waiting === counts.total) return executionStatus.PENDING;
    if (counts.failed > 0) return executionStatus.FAILED;
    return executionStatus.CANCELLED;
}

/**
 * Derived view of step state. Completed and skipped steps count towards
 * the percentage; failed steps do not.
 */
export function progress(steps: readonly Pick<StepEntity, 'status'>[]): Progress {
    const counts = countSteps(steps);
    const percent = counts.total === 0 ? 0 : Math.round((100 * (counts.completed + counts.skipped)) / counts.total);
    const started = counts.total - counts.pending - counts.blocked > 0;
    return { percent, status: deriveStatus(counts, started), counts };
}

/**
 * Read-only snapshot for callers. Status comes from the stored execution,
 * which records cancellation; progress and counts come from the steps.
 */
export function buildView(execution: ExecutionWithSteps): ExecutionView {
    const { percent, counts } = progress(execution.steps);
    const stages = resolveStages(execution.steps.map(s => ({ id: s.id, dependsOn: s.depends_on })));
    const stageOf = stageIndex(stages);

    const failures: StepFailure[] = execution.steps
        .filter(s => s.status === stepStatus.FAILED)
        .map(s => ({ stepId: s.id, agentId: s.agent_id, error: s.error ?? { name: 'Error', message: 'unknown error' } }));

    return {
        id: execution.id,
        templateId: execution.template_id,
        mode: execution.execution_mode,
        status: execution.status,
        progress: percent,
        counts,
        stages,
        steps: execution.steps.map(s => ({
            id: s.id,
            agentId: s.agent_id,
            task: s.task_text,
            dependsOn: [...s.depends_on],
            stage: stageOf.get(s.id) ?? 0,
            status: s.status,
            retryCount: s.retry_count,
            startedAt: s.started_at,
            completedAt: s.completed_at,
            output: s.result,
            error: s.error,
        })),
        failures,
        createdAt: execution.created_at,
        startedAt: execution.started_at,
        completedAt: execution.completed_at,
    };
}
