import { ExecutionEvent } from '@ensemble/sdk';
import { AgentInfo, AgentInvoker, InvocationResult, StaticAgentDirectory } from '../../src/services/agent-invoker';
import { AuditRecorder } from '../../src/services/audit-recorder';
import { MentionExtractor } from '../../src/services/directed-references';
import { LocalEventPublisher } from '../../src/services/event-publisher';
import { ExecutionScheduler } from '../../src/services/execution-scheduler';
import { StepDispatcher } from '../../src/services/step-dispatcher';
import {
    InMemoryAuditRepository,
    InMemoryCommunicationRepository,
    InMemoryExecutionRepository,
} from '../../src/repositories/memory.repository';
import { ExecutionRepository } from '../../src/repositories/types';

export interface InvocationCall {
    agentId: string;
    task: string;
    context: Record<string, unknown>;
    timeoutMs: number;
    attempt: number;
}

export type Script = (call: InvocationCall) => Promise<InvocationResult> | InvocationResult;

export const ok = (output: string): InvocationResult => ({ success: true, output });

/** Never settles; used to force timeouts. */
export const hang = () => new Promise<never>(() => undefined);

export function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

/**
 * Agent service stand-in. Attempts are counted per task text, and the
 * number of concurrently open invocations is tracked.
 */
export class ScriptedInvoker implements AgentInvoker {
    readonly calls: InvocationCall[] = [];
    inFlight = 0;
    maxInFlight = 0;
    private readonly attempts = new Map<string, number>();

    constructor(private readonly script: Script = ({ task }) => ok(`${task} done`)) { }

    async invoke(agentId: string, task: string, context: Record<string, unknown>, timeoutMs: number): Promise<InvocationResult> {
        const attempt = (this.attempts.get(task) ?? 0) + 1;
        this.attempts.set(task, attempt);
        const call = { agentId, task, context, timeoutMs, attempt };
        this.calls.push(call);

        this.inFlight += 1;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            return await this.script(call);
        } finally {
            this.inFlight -= 1;
        }
    }

    tasks(): string[] {
        return this.calls.map(c => c.task);
    }
}

export const TEST_AGENTS: AgentInfo[] = [
    { id: 'planner_01', name: 'Planner', role: 'plans' },
    { id: 'coder_01', name: 'Coder', role: 'codes' },
    { id: 'tester_01', name: 'Tester', role: 'tests' },
    { id: 'reviewer_01', name: 'Code Reviewer', role: 'reviews' },
];

export interface EngineOptions {
    maxInFlight?: number;
    maxAttempts?: number;
    stepTimeoutMs?: number;
    relayMentions?: boolean;
    executions?: ExecutionRepository;
}

/** Scheduler wired to in-memory storage, a local publisher and instant backoff. */
export function buildEngine(invoker: AgentInvoker, options: EngineOptions = {}) {
    const executions = options.executions ?? new InMemoryExecutionRepository();
    const audit = new InMemoryAuditRepository();
    const communications = new InMemoryCommunicationRepository();
    const recorder = new AuditRecorder(audit, communications);
    const publisher = new LocalEventPublisher();
    const events: ExecutionEvent[] = [];
    publisher.subscribe(event => events.push(event));

    const agents = new StaticAgentDirectory(TEST_AGENTS);
    const dispatcher = new StepDispatcher(invoker, recorder, new MentionExtractor(TEST_AGENTS), {
        defaultTimeoutMs: options.stepTimeoutMs ?? 1000,
        maxAttempts: options.maxAttempts ?? 3,
        backoff: { initialIntervalMs: 1, multiplier: 1, maxIntervalMs: 1, jitter: 0 },
        relayMentions: options.relayMentions ?? false,
        sleep: async () => undefined,
    });
    const scheduler = new ExecutionScheduler(
        executions,
        dispatcher,
        recorder,
        publisher,
        agents,
        { workerId: 'test-worker', maxInFlight: options.maxInFlight ?? 4 },
    );

    return { executions, audit, communications, recorder, publisher, events, agents, dispatcher, scheduler };
}
