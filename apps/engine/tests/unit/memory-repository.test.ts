import { InMemoryExecutionRepository } from '../../src/repositories/memory.repository';
import { NewExecution } from '../../src/repositories/types';

const execution: NewExecution = {
    id: 'e1',
    template_id: 'review',
    execution_mode: 'parallel',
    working_context: { ticket: 'T-1' },
    steps: [
        { id: 'a', position: 0, agent_id: 'coder_01', task_text: 'build', depends_on: [], timeout_ms: null, status: 'pending' },
        { id: 'b', position: 1, agent_id: 'tester_01', task_text: 'test', depends_on: ['a'], timeout_ms: 500, status: 'blocked' },
    ],
};

describe('InMemoryExecutionRepository', () => {
    let now: Date;
    let repo: InMemoryExecutionRepository;

    beforeEach(() => {
        now = new Date('2026-01-01T00:00:00.000Z');
        repo = new InMemoryExecutionRepository(() => now);
    });

    it('stores a pending execution with fresh step fields', async () => {
        const created = await repo.create(execution);

        expect(created).toMatchObject({ id: 'e1', status: 'pending', worker_id: null, created_at: now });
        expect(created.steps[1]).toMatchObject({ id: 'b', execution_id: 'e1', status: 'blocked', retry_count: 0, result: null });
        await expect(repo.create(execution)).rejects.toThrow('Execution e1 already exists');
    });

    it('hands out copies', async () => {
        await repo.create(execution);
        const first = await repo.findById('e1');
        if (first) {
            first.status = 'failed';
            first.working_context.ticket = 'changed';
        }

        const second = await repo.findById('e1');
        expect(second?.status).toBe('pending');
        expect(second?.working_context).toEqual({ ticket: 'T-1' });
    });

    it('rejects illegal transitions', async () => {
        await repo.create(execution);

        expect(await repo.transitionExecution('e1', 'completed')).toBe(false);
        expect(await repo.transitionStep('e1', 'b', 'running')).toBe(false);
        expect(await repo.transitionStep('e1', 'a', 'completed')).toBe(false);
        expect(await repo.transitionStep('missing', 'a', 'running')).toBe(false);

        expect(await repo.transitionExecution('e1', 'running', { worker_id: 'w1' })).toBe(true);
        expect(await repo.transitionStep('e1', 'a', 'running')).toBe(true);
        expect(await repo.transitionStep('e1', 'a', 'completed', { result: 'built', retry_count: 1 })).toBe(true);
        expect(await repo.transitionStep('e1', 'a', 'failed')).toBe(false);

        const stored = await repo.findById('e1');
        expect(stored).toMatchObject({ status: 'running', worker_id: 'w1', heartbeat_at: now });
        expect(stored?.steps[0]).toMatchObject({ status: 'completed', result: 'built', retry_count: 1 });
    });

    it('refreshes heartbeats only for running executions', async () => {
        await repo.create(execution);
        await repo.updateHeartbeat(['e1']);
        expect((await repo.findById('e1'))?.heartbeat_at).toBeNull();

        await repo.transitionExecution('e1', 'running', { worker_id: 'w1' });
        now = new Date('2026-01-01T00:01:00.000Z');
        await repo.updateHeartbeat(['e1', 'unknown']);
        expect((await repo.findById('e1'))?.heartbeat_at).toEqual(now);
    });

    it('fails stale executions once their heartbeat is older than the threshold', async () => {
        await repo.create(execution);
        await repo.transitionExecution('e1', 'running', { worker_id: 'w1' });
        await repo.transitionStep('e1', 'a', 'running');

        now = new Date('2026-01-01T00:00:10.000Z');
        expect(await repo.failStale(30)).toEqual([]);

        now = new Date('2026-01-01T00:01:00.000Z');
        expect(await repo.failStale(30)).toEqual([
            { id: 'e1', worker_id: 'w1', failed_steps: ['a'], skipped_steps: ['b'], progress: 50 },
        ]);
        const stored = await repo.findById('e1');
        expect(stored).toMatchObject({ status: 'failed', completed_at: now });
        expect(stored?.steps.map(s => s.status)).toEqual(['failed', 'skipped']);
    });
});
