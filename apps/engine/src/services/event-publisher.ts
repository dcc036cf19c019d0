import { EventEmitter } from 'events';
import Redis from 'ioredis';
import { ExecutionEvent, ExecutionEventType, serialize } from '@ensemble/sdk';

/**
 * Outbound execution events. `publish` never blocks the scheduler and
 * never throws into it.
 */
export interface EventPublisher {
    publish(executionId: string, type: ExecutionEventType, payload: Record<string, unknown>): void;
}

export type EventListener = (event: ExecutionEvent) => void;

export const executionChannel = (executionId: string) => `ensemble:execution:${executionId}`;

/** One channel per execution; envelopes are superjson strings. */
export class RedisEventPublisher implements EventPublisher {
    constructor(private readonly redis: Pick<Redis, 'publish'>) { }

    publish(executionId: string, type: ExecutionEventType, payload: Record<string, unknown>): void {
        const event: ExecutionEvent = { executionId, type, payload, timestamp: new Date() };
        let message: string;
        try {
            message = serialize(event);
        } catch (err) {
            console.error(`[events] could not serialize ${type} for ${executionId}:`, err);
            return;
        }
        this.redis.publish(executionChannel(executionId), message).catch((err: unknown) => {
            console.error(`[events] publish ${type} for ${executionId} failed:`, err);
        });
    }
}

export class LocalEventPublisher implements EventPublisher {
    private readonly emitter = new EventEmitter();
    private static readonly ALL = '*';

    publish(executionId: string, type: ExecutionEventType, payload: Record<string, unknown>): void {
        const event: ExecutionEvent = { executionId, type, payload, timestamp: new Date() };
        this.emitter.emit(executionChannel(executionId), event);
        this.emitter.emit(LocalEventPublisher.ALL, event);
    }

    /** Subscribes to one execution, or to all of them when no id is given. */
    subscribe(listener: EventListener, executionId?: string): () => void {
        const channel = executionId ? executionChannel(executionId) : LocalEventPublisher.ALL;
        const safe = (event: ExecutionEvent) => {
            try {
                listener(event);
            } catch (err) {
                console.error(`[events] listener for ${event.type} threw:`, err);
            }
        };
        this.emitter.on(channel, safe);
        return () => {
            this.emitter.off(channel, safe);
        };
    }
}
