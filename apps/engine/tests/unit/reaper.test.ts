import { ExecutionEvent } from '@ensemble/sdk';
import { InMemoryExecutionRepository } from '../../src/repositories/memory.repository';
import { AuditEvent } from '../../src/services/audit-recorder';
import { LocalEventPublisher } from '../../src/services/event-publisher';
import { Reaper } from '../../src/services/reaper';

describe('Reaper', () => {
    let now: Date;
    let repo: InMemoryExecutionRepository;
    let recorded: AuditEvent[];
    let events: ExecutionEvent[];
    let reaper: Reaper;

    const seed = async (id: string, statuses: ('pending' | 'blocked')[]) => {
        await repo.create({
            id,
            template_id: null,
            execution_mode: 'staged',
            working_context: {},
            steps: statuses.map((status, position) => ({
                id: `s${position + 1}`,
                position,
                agent_id: 'coder_01',
                task_text: `task ${position + 1}`,
                depends_on: status === 'blocked' ? ['s1'] : [],
                timeout_ms: null,
                status,
            })),
        });
        await repo.transitionExecution(id, 'running', { worker_id: 'dead-worker', started_at: now });
    };

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        now = new Date('2026-01-01T00:00:00.000Z');
        repo = new InMemoryExecutionRepository(() => now);
        recorded = [];
        events = [];
        const publisher = new LocalEventPublisher();
        publisher.subscribe(event => events.push(event));
        reaper = new Reaper(repo, { record: event => recorded.push(event) }, publisher, 1, 100); // 1s stale threshold, 100ms interval
    });

    afterEach(() => {
        reaper.stop();
        jest.restoreAllMocks();
    });

    it('fails a stale execution with its unfinished steps', async () => {
        await seed('exec-1', ['pending', 'pending', 'blocked']);
        await repo.transitionStep('exec-1', 's1', 'running');
        await repo.transitionStep('exec-1', 's2', 'running');
        await repo.transitionStep('exec-1', 's2', 'completed', { result: 'done' });
        now = new Date('2026-01-01T00:00:02.000Z');

        const reaped = await reaper.reap();

        expect(reaped).toEqual([
            { id: 'exec-1', worker_id: 'dead-worker', failed_steps: ['s1'], skipped_steps: ['s3'], progress: 67 },
        ]);
        const stored = await repo.findById('exec-1');
        expect(stored?.status).toBe('failed');
        expect(stored?.steps.map(s => s.status)).toEqual(['failed', 'completed', 'skipped']);
        expect(stored?.steps[0]?.error).toEqual({ name: 'Error', message: 'orchestrator heartbeat lost' });

        expect(recorded).toEqual([{
            executionId: 'exec-1',
            action: 'execution_reaped',
            status: 'failed',
            message: 'orchestrator heartbeat lost (worker dead-worker): 1 steps failed, 1 skipped',
        }]);
        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({
            executionId: 'exec-1',
            type: 'execution_failed',
            payload: {
                status: 'failed',
                reason: 'orchestrator heartbeat lost',
                failedSteps: ['s1'],
                skippedSteps: ['s3'],
                progress: 67,
            },
        });
    });

    it('does not touch executions with a fresh heartbeat', async () => {
        await seed('exec-2', ['pending']);
        now = new Date('2026-01-01T00:00:00.500Z');

        expect(await reaper.reap()).toEqual([]);
        expect((await repo.findById('exec-2'))?.status).toBe('running');
        expect(recorded).toHaveLength(0);
    });

    it('reaps an execution only once', async () => {
        await seed('exec-3', ['pending']);
        now = new Date('2026-01-01T00:00:05.000Z');

        expect(await reaper.reap()).toHaveLength(1);
        expect(await reaper.reap()).toHaveLength(0);
        expect(events).toHaveLength(1);
    });

    it('logs a failing store and returns nothing', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const broken = new Reaper(
            { failStale: () => Promise.reject(new Error('connection refused')) },
            { record: () => undefined },
            new LocalEventPublisher(),
        );

        expect(await broken.reap()).toEqual([]);
        expect(error).toHaveBeenCalledWith('[reaper] error during reap cycle:', expect.any(Error));
    });

    it('runs a cycle as soon as it starts', async () => {
        await seed('exec-4', ['pending']);
        now = new Date('2026-01-01T00:00:05.000Z');

        reaper.start();
        expect(reaper.isRunning()).toBe(true);
        await new Promise(resolve => setTimeout(resolve, 20));

        expect((await repo.findById('exec-4'))?.status).toBe('failed');
        reaper.stop();
        expect(reaper.isRunning()).toBe(false);
    });
});
