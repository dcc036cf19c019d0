import { EXECUTION_STATUSES, ExecutionStatus, StepStatus } from '@ensemble/sdk';
import { executionStatus } from './execution.entity';
import { stepStatus } from './step.entity';

const EXECUTION_TRANSITIONS: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
    [executionStatus.PENDING]: [executionStatus.RUNNING, executionStatus.CANCELLED],
    [executionStatus.RUNNING]: [executionStatus.COMPLETED, executionStatus.FAILED, executionStatus.CANCELLED],
    [executionStatus.COMPLETED]: [],
    [executionStatus.FAILED]: [],
    [executionStatus.CANCELLED]: [],
};

const STEP_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
    [stepStatus.BLOCKED]: [stepStatus.PENDING, stepStatus.SKIPPED],
    [stepStatus.PENDING]: [stepStatus.RUNNING, stepStatus.SKIPPED],
    // running -> skipped only when a cancelled execution discards the result
    [stepStatus.RUNNING]: [stepStatus.COMPLETED, stepStatus.FAILED, stepStatus.SKIPPED],
    [stepStatus.COMPLETED]: [],
    [stepStatus.FAILED]: [],
    [stepStatus.SKIPPED]: [],
};

const TERMINAL_STEP: readonly StepStatus[] = [stepStatus.COMPLETED, stepStatus.FAILED, stepStatus.SKIPPED];

export function canTransitionExecution(from: ExecutionStatus, to: ExecutionStatus): boolean {
    return EXECUTION_TRANSITIONS[from].includes(to);
}

export function canTransitionStep(from: StepStatus, to: StepStatus): boolean {
    return STEP_TRANSITIONS[from].includes(to);
}

/** Statuses from which `to` may be entered; used in conditional UPDATEs. */
export function executionSourcesFor(to: ExecutionStatus): ExecutionStatus[] {
    return EXECUTION_STATUSES.filter(from => canTransitionExecution(from, to));
}

export function stepSourcesFor(to: StepStatus): StepStatus[] {
    return Object.values(stepStatus).filter(from => canTransitionStep(from, to));
}

export function isTerminalStep(status: StepStatus): boolean {
    return TERMINAL_STEP.includes(status);
}

export function isTerminalExecution(status: ExecutionStatus): boolean {
    return EXECUTION_TRANSITIONS[status].length === 0;
}
