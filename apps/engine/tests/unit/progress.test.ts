import { StepStatus } from '@ensemble/sdk';
import { ExecutionWithSteps } from '../../src/db/execution.entity';
import { StepEntity } from '../../src/db/step.entity';
import { buildView, progress } from '../../src/services/progress';

const steps = (...statuses: StepStatus[]) => statuses.map(status => ({ status }));

function step(id: string, status: StepStatus, dependsOn: string[] = [], extra: Partial<StepEntity> = {}): StepEntity {
    return {
        id,
        execution_id: 'exec-1',
        position: 0,
        agent_id: 'coder_01',
        task_text: `do ${id}`,
        depends_on: dependsOn,
        timeout_ms: null,
        status,
        started_at: null,
        completed_at: null,
        result: null,
        error: null,
        retry_count: 0,
        ...extra,
    };
}

describe('progress', () => {
    it('is 0 for no steps', () => {
        expect(progress([])).toMatchObject({ percent: 0, status: 'pending' });
    });

    it('counts completed and skipped but not failed', () => {
        expect(progress(steps('completed', 'skipped', 'failed')).percent).toBe(67);
        expect(progress(steps('completed', 'pending', 'pending')).percent).toBe(33);
    });

    it('derives status from step states', () => {
        expect(progress(steps('completed', 'completed')).status).toBe('completed');
        expect(progress(steps('pending', 'blocked')).status).toBe('pending');
        expect(progress(steps('running', 'blocked')).status).toBe('running');
        expect(progress(steps('completed', 'pending')).status).toBe('running');
        expect(progress(steps('completed', 'failed', 'skipped')).status).toBe('failed');
        expect(progress(steps('completed', 'skipped')).status).toBe('cancelled');
    });

    it('reports counts per status', () => {
        expect(progress(steps('completed', 'skipped', 'skipped', 'blocked')).counts).toEqual({
            pending: 0, blocked: 1, running: 0, completed: 1, failed: 0, skipped: 2, total: 4,
        });
    });
});

describe('buildView', () => {
    it('lists stages and the last error of each failed step', () => {
        const created = new Date('2026-01-01T00:00:00Z');
        const execution: ExecutionWithSteps = {
            id: 'exec-1',
            template_id: null,
            execution_mode: 'staged',
            working_context: {},
            status: 'failed',
            worker_id: 'w1',
            heartbeat_at: null,
            created_at: created,
            started_at: created,
            completed_at: created,
            steps: [
                step('a', 'failed', [], { error: { name: 'StepTimeoutError', message: 'Step a timed out after 50ms' }, retry_count: 2 }),
                step('b', 'completed', [], { result: 'b output' }),
                step('c', 'skipped', ['a', 'b']),
            ],
        };

        const view = buildView(execution);
        expect(view.status).toBe('failed');
        expect(view.progress).toBe(67);
        expect(view.stages).toEqual([['a', 'b'], ['c']]);
        expect(view.steps.map(s => s.stage)).toEqual([0, 0, 1]);
        expect(view.steps[1]?.output).toBe('b output');
        expect(view.failures).toEqual([{
            stepId: 'a',
            agentId: 'coder_01',
            error: { name: 'StepTimeoutError', message: 'Step a timed out after 50ms' },
        }]);
    });
});
