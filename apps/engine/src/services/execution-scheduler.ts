import { ExecutionEventType, ExecutionMode, ExecutionStatus, ExecutionView, StepStatus, isExecutionMode } from '@ensemble/sdk';
import { ExecutionWithSteps, executionStatus } from '../db/execution.entity';
import { StepEntity, stepStatus } from '../db/step.entity';
import { canTransitionStep, isTerminalExecution, isTerminalStep } from '../db/transitions';
import {
    AlreadyRunningError,
    ExecutionNotFoundError,
    PersistenceError,
    ValidationError,
    describeError,
} from '../errors';
import { ExecutionRepository, NewExecution, StepTransitionFields } from '../repositories/types';
import { AgentDirectory } from './agent-invoker';
import { AuditEvent } from './audit-recorder';
import { dependentsOf, resolveStages, transitiveDependents } from './dependency-resolver';
import { EventPublisher } from './event-publisher';
import { DispatchStep, Dispatcher, RetryInfo, StepContext, StepResult } from './step-dispatcher';
import { buildView, progress } from './progress';

const TAG = '[scheduler]';

export interface PlannedStep {
    id: string;
    agentId: string;
    task: string;
    dependsOn?: readonly string[];
    timeoutMs?: number;
}

export interface ExecutionPlan {
    id: string;
    templateId: string | null;
    mode: ExecutionMode;
    context: Record<string, unknown>;
    steps: readonly PlannedStep[];
}

export interface SchedulerOptions {
    workerId: string;
    maxInFlight: number;
}

export interface AuditSink {
    record(event: AuditEvent): void;
}

export interface Liveness {
    start(executionId: string): void;
    stop(executionId: string): void;
}

interface ActiveRun {
    execution: ExecutionWithSteps;
    stages: string[][];
    dependents: Map<string, string[]>;
    stageCursor: number;
    cancelled: boolean;
    cancelSignal: Promise<void>;
    wake: () => void;
    done: Promise<void>;
}

interface Settled {
    step: StepEntity;
    result: StepResult;
}

/**
 * Drives executions from pending to a terminal status. Each execution has
 * one control loop: it picks runnable steps for the mode, fans out
 * dispatches and fans their results back in with Promise.race. Step state
 * only changes inside that loop.
 */
export class ExecutionScheduler {
    private readonly runs = new Map<string, ActiveRun>();
    private readonly starting = new Set<string>();

    constructor(
        private readonly repo: ExecutionRepository,
        private readonly dispatcher: Dispatcher,
        private readonly recorder: AuditSink,
        private readonly publisher: EventPublisher,
        private readonly agents: AgentDirectory,
        private readonly options: SchedulerOptions,
        private readonly liveness: Liveness | null = null,
    ) { }

    /**
     * Validates and persists the execution, then launches its control loop
     * without waiting for it. Throws before persisting anything when the
     * plan is invalid or the id is already taken.
     */
    async start(plan: ExecutionPlan): Promise<void> {
        if (this.runs.has(plan.id) || this.starting.has(plan.id)) {
            throw new AlreadyRunningError(plan.id);
        }
        this.starting.add(plan.id);

        try {
            const existing = await this.repo.findById(plan.id);
            if (existing?.status === executionStatus.RUNNING) throw new AlreadyRunningError(plan.id);
            if (existing) throw new ValidationError(`Execution ${plan.id} already exists with status ${existing.status}`);

            const stages = this.validate(plan);
            const execution = await this.repo.create(this.toNewExecution(plan));

            const startedAt = new Date();
            const moved = await this.repo.transitionExecution(plan.id, executionStatus.RUNNING, {
                worker_id: this.options.workerId,
                started_at: startedAt,
            });
            if (!moved) throw new PersistenceError(`Execution ${plan.id} could not be moved to running`);
            execution.status = executionStatus.RUNNING;
            execution.worker_id = this.options.workerId;
            execution.started_at = startedAt;

            this.launch(execution, stages);
        } finally {
            this.starting.delete(plan.id);
        }
    }

    async cancel(executionId: string): Promise<ExecutionStatus> {
        const run = this.runs.get(executionId);
        if (run) {
            if (run.cancelled) return run.execution.status;
            run.cancelled = true;
            try {
                await this.persistCancel(run.execution);
            } finally {
                run.wake();
            }
            return run.execution.status;
        }

        const stored = await this.repo.findById(executionId);
        if (!stored) throw new ExecutionNotFoundError(executionId);
        if (isTerminalExecution(stored.status)) return stored.status;

        await this.persistCancel(stored);
        return stored.status;
    }

    async getStatus(executionId: string): Promise<ExecutionView> {
        const run = this.runs.get(executionId);
        if (run) return buildView(run.execution);

        const stored = await this.repo.findById(executionId);
        if (!stored) throw new ExecutionNotFoundError(executionId);
        return buildView(stored);
    }

    /** Resolves once the control loop has ended. */
    async waitFor(executionId: string): Promise<ExecutionView> {
        const run = this.runs.get(executionId);
        if (run) await run.done;
        return this.getStatus(executionId);
    }

    isActive(executionId: string): boolean {
        return this.runs.has(executionId);
    }

    activeIds(): string[] {
        return [...this.runs.keys()];
    }

    async shutdown(): Promise<void> {
        const runs = [...this.runs.values()];
        if (runs.length === 0) return;

        console.log(`${TAG} cancelling ${runs.length} active executions`);
        for (const run of runs) {
            try {
                await this.cancel(run.execution.id);
            } catch (err) {
                console.error(`${TAG} could not cancel ${run.execution.id} during shutdown:`, err);
            }
        }
        await Promise.all(runs.map(run => run.done));
    }

    private validate(plan: ExecutionPlan): string[][] {
        if (!isExecutionMode(plan.mode)) {
            throw new ValidationError(`Unknown execution mode "${plan.mode}"`);
        }
        if (plan.steps.length === 0) {
            throw new ValidationError('An execution needs at least one step');
        }
        const unknown = [...new Set(plan.steps.map(s => s.agentId).filter(id => !this.agents.has(id)))];
        if (unknown.length > 0) {
            throw new ValidationError(`Unknown agents: ${unknown.join(', ')}`);
        }
        return resolveStages(plan.steps.map(s => ({ id: s.id, dependsOn: s.dependsOn ?? [] })));
    }

    private toNewExecution(plan: ExecutionPlan): NewExecution {
        return {
            id: plan.id,
            template_id: plan.templateId,
            execution_mode: plan.mode,
            working_context: plan.context,
            steps: plan.steps.map((step, position) => {
                const dependsOn = [...new Set(step.dependsOn ?? [])];
                return {
                    id: step.id,
                    position,
                    agent_id: step.agentId,
                    task_text: step.task,
                    depends_on: dependsOn,
                    timeout_ms: step.timeoutMs ?? null,
                    status: dependsOn.length > 0 ? stepStatus.BLOCKED : stepStatus.PENDING,
                };
            }),
        };
    }

    private launch(execution: ExecutionWithSteps, stages: string[][]): void {
        let wake: () => void = () => undefined;
        const cancelSignal = new Promise<void>(resolve => {
            wake = resolve;
        });
        const run: ActiveRun = {
            execution,
            stages,
            dependents: dependentsOf(execution.steps.map(s => ({ id: s.id, dependsOn: s.depends_on }))),
            stageCursor: 0,
            cancelled: false,
            cancelSignal,
            wake,
            done: Promise.resolve(),
        };
        this.runs.set(execution.id, run);
        this.liveness?.start(execution.id);

        this.audit(run, {
            action: 'execution_started',
            status: executionStatus.RUNNING,
            message: `${execution.execution_mode} execution of ${execution.steps.length} steps in ${stages.length} stages`,
        });
        console.log(`${TAG} execution ${execution.id} started (${execution.execution_mode}, ${execution.steps.length} steps)`);

        run.done = this.drive(run)
            .catch((err: unknown) => this.abort(run, err))
            .finally(() => {
                this.runs.delete(execution.id);
                this.liveness?.stop(execution.id);
            });
    }

    private async drive(run: ActiveRun): Promise<void> {
        const inFlight = new Map<string, Promise<Settled>>();

        for (;;) {
            if (run.cancelled) {
                await this.skipWaiting(run, 'execution cancelled');
            } else {
                for (const step of this.nextBatch(run, inFlight.size)) {
                    if (run.cancelled) break;
                    await this.markRunning(run, step);
                    // cancel may land while the step is being marked running
                    if (run.cancelled) {
                        await this.skip(run, step, 'execution cancelled');
                        break;
                    }
                    inFlight.set(step.id, this.dispatch(run, step));
                }
                if (run.cancelled) continue;
            }

            if (inFlight.size === 0) break;

            const waiters: Promise<Settled | null>[] = [...inFlight.values()];
            if (!run.cancelled) waiters.push(run.cancelSignal.then(() => null));

            const settled = await Promise.race(waiters);
            if (settled === null) continue;

            inFlight.delete(settled.step.id);
            await this.settle(run, settled);
        }

        await this.finish(run);
    }

    private runnable(run: ActiveRun): StepEntity[] {
        const statusOf = new Map(run.execution.steps.map(s => [s.id, s.status]));
        return run.execution.steps.filter(s =>
            s.status === stepStatus.PENDING
            && s.depends_on.every(dep => statusOf.get(dep) === stepStatus.COMPLETED));
    }

    private nextBatch(run: ActiveRun, inFlight: number): StepEntity[] {
        const runnable = this.runnable(run);

        switch (run.execution.execution_mode) {
            case 'sequential':
                return inFlight === 0 ? runnable.slice(0, 1) : [];
            case 'parallel':
                return runnable.slice(0, Math.max(0, this.options.maxInFlight - inFlight));
            case 'staged': {
                // hard barrier: the next stage starts only when nothing is in flight
                if (inFlight > 0) return [];
                while (run.stageCursor < run.stages.length) {
                    const stage = new Set(run.stages[run.stageCursor]);
                    const batch = runnable.filter(s => stage.has(s.id));
                    if (batch.length > 0) return batch;
                    run.stageCursor += 1;
                }
                return [];
            }
        }
    }

    private async markRunning(run: ActiveRun, step: StepEntity): Promise<void> {
        const moved = await this.transitionStep(run, step, stepStatus.RUNNING, { started_at: new Date() });
        if (!moved) throw new PersistenceError(`Step ${step.id} of ${run.execution.id} could not be moved to running`);

        this.audit(run, { stepId: step.id, agentId: step.agent_id, action: 'step_started', status: stepStatus.RUNNING });
        this.emit(run, 'step_started', { stepId: step.id, agentId: step.agent_id });
    }

    private dispatch(run: ActiveRun, step: StepEntity): Promise<Settled> {
        const context: StepContext = {
            executionId: run.execution.id,
            stepId: step.id,
            working: run.execution.working_context,
            upstream: this.upstreamOutputs(run, step),
        };

        return this.dispatcher
            .dispatch(
                this.toDispatchStep(run, step),
                context,
                {
                    onRetry: (info) => this.onRetry(run, step, info),
                    shouldRetry: () => !run.cancelled,
                },
            )
            .then(
                (result): Settled => ({ step, result }),
                (err: unknown): Settled => ({
                    step,
                    result: { status: 'failed', error: describeError(err), attempts: 0, retryCount: step.retry_count },
                }),
            );
    }

    private toDispatchStep(run: ActiveRun, step: StepEntity): DispatchStep {
        return {
            executionId: run.execution.id,
            stepId: step.id,
            agentId: step.agent_id,
            task: step.task_text,
            timeoutMs: step.timeout_ms,
        };
    }

    private upstreamOutputs(run: ActiveRun, step: StepEntity): Record<string, string> {
        const upstream: Record<string, string> = {};
        for (const dep of step.depends_on) {
            const output = run.execution.steps.find(s => s.id === dep)?.result;
            if (output !== null && output !== undefined) upstream[dep] = output;
        }
        return upstream;
    }

    private async onRetry(run: ActiveRun, step: StepEntity, info: RetryInfo): Promise<void> {
        step.retry_count = info.retryCount;
        await this.repo.updateStep(run.execution.id, step.id, { retry_count: info.retryCount });

        this.audit(run, {
            stepId: step.id,
            agentId: step.agent_id,
            action: 'step_retry',
            status: stepStatus.RUNNING,
            message: `retry ${info.retryCount} in ${info.delayMs}ms after: ${info.error.message}`,
        });
        this.emit(run, 'step_progress', {
            stepId: step.id,
            agentId: step.agent_id,
            attempt: info.attempt,
            retryCount: info.retryCount,
            delayMs: info.delayMs,
            error: info.error,
        });
    }

    private async settle(run: ActiveRun, { step, result }: Settled): Promise<void> {
        const completedAt = new Date();

        if (run.cancelled) {
            await this.skip(run, step, 'result discarded after cancellation', { retry_count: result.retryCount });
            return;
        }

        if (result.status === 'completed') {
            const moved = await this.transitionStep(run, step, stepStatus.COMPLETED, {
                completed_at: completedAt,
                result: result.output,
                retry_count: result.retryCount,
            });
            if (!moved) return;
            this.audit(run, {
                stepId: step.id,
                agentId: step.agent_id,
                action: 'step_completed',
                status: stepStatus.COMPLETED,
                message: `completed after ${result.attempts} attempt(s)`,
            });
            this.emit(run, 'step_completed', {
                stepId: step.id,
                agentId: step.agent_id,
                retryCount: result.retryCount,
                output: result.output,
            });
            await this.dispatcher.openCommunications(this.toDispatchStep(run, step), result.output);
            await this.unblockDependents(run, step);
            return;
        }

        const moved = await this.transitionStep(run, step, stepStatus.FAILED, {
            completed_at: completedAt,
            error: result.error,
            retry_count: result.retryCount,
        });
        if (!moved) return;
        this.audit(run, {
            stepId: step.id,
            agentId: step.agent_id,
            action: 'step_failed',
            status: stepStatus.FAILED,
            message: result.error.message,
        });
        this.emit(run, 'step_failed', {
            stepId: step.id,
            agentId: step.agent_id,
            retryCount: result.retryCount,
            error: result.error,
        });
        console.warn(`${TAG} step ${step.id} of ${run.execution.id} failed: ${result.error.message}`);

        for (const id of transitiveDependents(step.id, run.dependents)) {
            const dependent = run.execution.steps.find(s => s.id === id);
            if (dependent && !isTerminalStep(dependent.status)) {
                await this.skip(run, dependent, `dependency ${step.id} failed`);
            }
        }
    }

    private async unblockDependents(run: ActiveRun, step: StepEntity): Promise<void> {
        const statusOf = new Map(run.execution.steps.map(s => [s.id, s.status]));
        for (const id of run.dependents.get(step.id) ?? []) {
            const dependent = run.execution.steps.find(s => s.id === id);
            if (!dependent || dependent.status !== stepStatus.BLOCKED) continue;
            if (!dependent.depends_on.every(dep => statusOf.get(dep) === stepStatus.COMPLETED)) continue;

            if (await this.transitionStep(run, dependent, stepStatus.PENDING)) {
                this.audit(run, {
                    stepId: dependent.id,
                    agentId: dependent.agent_id,
                    action: 'step_unblocked',
                    status: stepStatus.PENDING,
                });
            }
        }
    }

    private async skipWaiting(run: ActiveRun, reason: string): Promise<void> {
        for (const step of run.execution.steps) {
            if (step.status === stepStatus.PENDING || step.status === stepStatus.BLOCKED) {
                await this.skip(run, step, reason);
            }
        }
    }

    private async skip(run: ActiveRun, step: StepEntity, reason: string, fields: StepTransitionFields = {}): Promise<void> {
        const moved = await this.transitionStep(run, step, stepStatus.SKIPPED, { ...fields, completed_at: new Date() });
        if (!moved) return;

        this.audit(run, { stepId: step.id, agentId: step.agent_id, action: 'step_skipped', status: stepStatus.SKIPPED, message: reason });
        this.emit(run, 'step_skipped', { stepId: step.id, agentId: step.agent_id, reason });
    }

    private async finish(run: ActiveRun): Promise<void> {
        const { execution } = run;
        if (run.cancelled) {
            console.log(`${TAG} execution ${execution.id} cancelled`);
            return;
        }

        const failed = execution.steps.filter(s => s.status === stepStatus.FAILED);
        const outcome = execution.steps.every(s => s.status === stepStatus.COMPLETED)
            ? executionStatus.COMPLETED
            : executionStatus.FAILED;

        const completedAt = new Date();
        const moved = await this.repo.transitionExecution(execution.id, outcome, { completed_at: completedAt });
        if (!moved) {
            console.warn(`${TAG} rejected ${execution.status} -> ${outcome} for execution ${execution.id}`);
            return;
        }
        execution.status = outcome;
        execution.completed_at = completedAt;

        const { counts } = progress(execution.steps);
        const summary = `${counts.completed} completed, ${counts.failed} failed, ${counts.skipped} skipped`;
        this.audit(run, { action: `execution_${outcome}`, status: outcome, message: summary });
        this.emit(run, outcome === executionStatus.COMPLETED ? 'execution_completed' : 'execution_failed', {
            status: outcome,
            counts,
            failures: failed.map(s => ({ stepId: s.id, agentId: s.agent_id, error: s.error })),
        });
        console.log(`${TAG} execution ${execution.id} ${outcome} (${summary})`);
    }

    private async persistCancel(execution: ExecutionWithSteps): Promise<void> {
        const completedAt = new Date();
        const moved = await this.repo.transitionExecution(execution.id, executionStatus.CANCELLED, { completed_at: completedAt });
        if (!moved) {
            console.warn(`${TAG} rejected ${execution.status} -> cancelled for execution ${execution.id}`);
            return;
        }
        execution.status = executionStatus.CANCELLED;
        execution.completed_at = completedAt;

        this.recorder.record({
            executionId: execution.id,
            action: 'execution_cancelled',
            status: executionStatus.CANCELLED,
            message: 'cancelled by request',
        });
        this.publisher.publish(execution.id, 'execution_cancelled', {
            status: executionStatus.CANCELLED,
            progress: progress(execution.steps).percent,
        });
        console.log(`${TAG} execution ${execution.id} cancel requested`);
    }

    // A storage error inside the loop: the execution cannot be trusted to
    // progress, so it is failed and the remaining in-flight results dropped.
    private async abort(run: ActiveRun, err: unknown): Promise<void> {
        console.error(`${TAG} execution ${run.execution.id} aborted:`, err);
        run.cancelled = true;
        try {
            const moved = await this.repo.transitionExecution(run.execution.id, executionStatus.FAILED, { completed_at: new Date() });
            if (moved) run.execution.status = executionStatus.FAILED;
            this.audit(run, { action: 'execution_failed', status: executionStatus.FAILED, message: describeError(err).message });
            this.emit(run, 'execution_failed', { status: executionStatus.FAILED, error: describeError(err) });
        } catch (persistErr) {
            console.error(`${TAG} could not mark ${run.execution.id} failed:`, persistErr);
        }
    }

    private async transitionStep(
        run: ActiveRun,
        step: StepEntity,
        to: StepStatus,
        fields: StepTransitionFields = {},
    ): Promise<boolean> {
        if (!canTransitionStep(step.status, to)) {
            console.warn(`${TAG} rejected ${step.status} -> ${to} for step ${step.id} of ${run.execution.id}`);
            return false;
        }
        const moved = await this.repo.transitionStep(run.execution.id, step.id, to, fields);
        if (!moved) {
            console.warn(`${TAG} store rejected ${step.status} -> ${to} for step ${step.id} of ${run.execution.id}`);
            return false;
        }
        step.status = to;
        Object.assign(step, fields);
        return true;
    }

    private audit(run: ActiveRun, event: Omit<AuditEvent, 'executionId'>): void {
        this.recorder.record({ ...event, executionId: run.execution.id });
    }

    private emit(run: ActiveRun, type: ExecutionEventType, payload: Record<string, unknown>): void {
        this.publisher.publish(run.execution.id, type, { ...payload, progress: progress(run.execution.steps).percent });
    }
}
