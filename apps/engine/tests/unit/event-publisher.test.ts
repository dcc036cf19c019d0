import { ExecutionEvent, deserialize } from '@ensemble/sdk';
import { LocalEventPublisher, RedisEventPublisher, executionChannel } from '../../src/services/event-publisher';

describe('RedisEventPublisher', () => {
    it('publishes a serialized envelope on the execution channel', () => {
        const publish = jest.fn().mockResolvedValue(1);
        const publisher = new RedisEventPublisher({ publish });

        publisher.publish('e1', 'step_completed', { stepId: 's1', progress: 50 });

        expect(publish).toHaveBeenCalledTimes(1);
        const [channel, message] = publish.mock.calls[0];
        expect(channel).toBe('ensemble:execution:e1');

        const event = deserialize<ExecutionEvent>(message);
        expect(event).toMatchObject({ executionId: 'e1', type: 'step_completed', payload: { stepId: 's1', progress: 50 } });
        expect(event?.timestamp).toBeInstanceOf(Date);
    });

    it('logs a rejected publish instead of throwing', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const publish = jest.fn().mockRejectedValue(new Error('connection closed'));
        const publisher = new RedisEventPublisher({ publish });

        expect(() => publisher.publish('e1', 'execution_failed', {})).not.toThrow();
        await new Promise(resolve => setImmediate(resolve));

        expect(error).toHaveBeenCalledWith('[events] publish execution_failed for e1 failed:', expect.any(Error));
        error.mockRestore();
    });
});

describe('LocalEventPublisher', () => {
    it('delivers to per-execution and global subscribers', () => {
        const publisher = new LocalEventPublisher();
        const all: string[] = [];
        const one: string[] = [];
        publisher.subscribe(e => all.push(`${e.executionId}:${e.type}`));
        publisher.subscribe(e => one.push(e.type), 'e1');

        publisher.publish('e1', 'step_started', {});
        publisher.publish('e2', 'step_started', {});
        publisher.publish('e1', 'execution_completed', {});

        expect(all).toEqual(['e1:step_started', 'e2:step_started', 'e1:execution_completed']);
        expect(one).toEqual(['step_started', 'execution_completed']);
    });

    it('stops delivering after unsubscribe', () => {
        const publisher = new LocalEventPublisher();
        const seen: string[] = [];
        const unsubscribe = publisher.subscribe(e => seen.push(e.type));

        publisher.publish('e1', 'step_started', {});
        unsubscribe();
        publisher.publish('e1', 'step_completed', {});

        expect(seen).toEqual(['step_started']);
    });

    it('isolates a throwing listener', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const publisher = new LocalEventPublisher();
        const seen: string[] = [];
        publisher.subscribe(() => {
            throw new Error('boom');
        });
        publisher.subscribe(e => seen.push(e.type));

        expect(() => publisher.publish('e1', 'step_failed', {})).not.toThrow();
        expect(seen).toEqual(['step_failed']);
        expect(error).toHaveBeenCalledWith('[events] listener for step_failed threw:', expect.any(Error));
        error.mockRestore();
    });

    it('names channels per execution', () => {
        expect(executionChannel('abc')).toBe('ensemble:execution:abc');
    });
});
