import { StepErrorInfo } from '@ensemble/sdk';
import { CommunicationEntity } from '../db/communication.entity';
import { StepInvocationError, StepTimeoutError, describeError } from '../errors';
import { BackoffPolicy, DEFAULT_BACKOFF, calculateBackOff } from '../utils/backoff';
import { AgentInvoker } from './agent-invoker';
import { AuditRecorder } from './audit-recorder';
import { DirectedReferenceExtractor } from './directed-references';

const TAG = '[dispatcher]';

export interface DispatchStep {
    executionId: string;
    stepId: string;
    agentId: string;
    task: string;
    timeoutMs: number | null;
}

// Passed to the agent with every attempt. A type alias so it stays a plain record.
export type StepContext = {
    executionId: string;
    stepId: string;
    working: Record<string, unknown>;
    upstream: Record<string, string>;
};

export type StepResult =
    | { status: 'completed'; output: string; attempts: number; retryCount: number }
    | { status: 'failed'; error: StepErrorInfo; attempts: number; retryCount: number };

export interface RetryInfo {
    attempt: number;  // the attempt about to run
    retryCount: number;
    delayMs: number;
    error: StepErrorInfo;
}

export interface DispatchHooks {
    onRetry?(info: RetryInfo): Promise<void>;
    /** Checked before each retry; false ends the step with its last error. */
    shouldRetry?(): boolean;
}

export interface Dispatcher {
    dispatch(step: DispatchStep, context: StepContext, hooks?: DispatchHooks): Promise<StepResult>;
    /** Called once the step's completion is persisted. Failures are logged per target. */
    openCommunications(step: DispatchStep, output: string): Promise<void>;
}

export interface DispatcherOptions {
    defaultTimeoutMs: number;
    maxAttempts: number;
    backoff: BackoffPolicy;
    relayMentions: boolean;
    sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_DISPATCHER_OPTIONS: DispatcherOptions = {
    defaultTimeoutMs: 60_000,
    maxAttempts: 3,
    backoff: DEFAULT_BACKOFF,
    relayMentions: true,
};

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Runs one step against the agent service with a per-attempt timeout and
 * bounded retries. Writes one `step_attempt` audit record per attempt.
 * Directed mentions in an output are opened separately, through
 * `openCommunications`, once the caller has accepted the result.
 */
export class StepDispatcher implements Dispatcher {
    private readonly options: DispatcherOptions;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly relays = new Set<Promise<void>>();

    constructor(
        private readonly invoker: AgentInvoker,
        private readonly recorder: AuditRecorder,
        private readonly extractor: DirectedReferenceExtractor,
        options: Partial<DispatcherOptions> = {},
    ) {
        this.options = { ...DEFAULT_DISPATCHER_OPTIONS, ...options };
        this.sleep = this.options.sleep ?? defaultSleep;
    }

    async dispatch(step: DispatchStep, context: StepContext, hooks: DispatchHooks = {}): Promise<StepResult> {
        const timeoutMs = step.timeoutMs ?? this.options.defaultTimeoutMs;
        const maxAttempts = Math.max(1, this.options.maxAttempts);
        let lastError: StepErrorInfo = { name: 'Error', message: 'step was never attempted' };
        let attempts = 0;

        while (attempts < maxAttempts) {
            attempts += 1;
            try {
                const output = await this.invokeWithTimeout(step.stepId, step.agentId, step.task, context, timeoutMs);
                this.recordAttempt(step, attempts, 'completed', 'succeeded');
                return { status: 'completed', output, attempts, retryCount: attempts - 1 };
            } catch (err) {
                lastError = describeError(err);
                const timedOut = err instanceof StepTimeoutError;
                this.recordAttempt(step, attempts, timedOut ? 'timeout' : 'failed', lastError.message);
                console.warn(`${TAG} ${step.executionId}/${step.stepId} attempt ${attempts}/${maxAttempts} failed: ${lastError.message}`);

                const retryable = !(err instanceof StepInvocationError) || err.retryable;
                if (!retryable || attempts >= maxAttempts) break;
                if (hooks.shouldRetry && !hooks.shouldRetry()) break;

                const { initialIntervalMs, multiplier, maxIntervalMs, jitter } = this.options.backoff;
                const delayMs = calculateBackOff(attempts, initialIntervalMs, multiplier, maxIntervalMs, jitter);
                await hooks.onRetry?.({ attempt: attempts + 1, retryCount: attempts, delayMs, error: lastError });
                await this.sleep(delayMs);
            }
        }

        return { status: 'failed', error: lastError, attempts, retryCount: attempts - 1 };
    }

    /** Waits for background relays started by earlier dispatches. */
    async drain(): Promise<void> {
        while (this.relays.size > 0) {
            await Promise.all([...this.relays]);
        }
    }

    private async invokeWithTimeout(
        stepId: string,
        agentId: string,
        task: string,
        context: Record<string, unknown>,
        timeoutMs: number,
    ): Promise<string> {
        let timer: NodeJS.Timeout | undefined;
        const invocation = Promise.resolve().then(() => this.invoker.invoke(agentId, task, context, timeoutMs));
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new StepTimeoutError(stepId, timeoutMs)), timeoutMs);
            timer.unref();
        });

        try {
            const result = await Promise.race([invocation, timeout]);
            if (!result.success) {
                throw new StepInvocationError(stepId, result.error, result.retryable ?? true);
            }
            return result.output;
        } catch (err) {
            if (err instanceof StepTimeoutError) {
                // the call keeps running; its late outcome is dropped
                invocation.catch((late: unknown) => console.warn(`${TAG} late failure from ${agentId} after timeout:`, late));
            }
            throw err;
        } finally {
            clearTimeout(timer);
        }
    }

    private recordAttempt(step: DispatchStep, attempt: number, status: 'completed' | 'failed' | 'timeout', message: string): void {
        this.recorder.record({
            executionId: step.executionId,
            stepId: step.stepId,
            agentId: step.agentId,
            action: 'step_attempt',
            status,
            message: attempt > 1 ? `[attempt ${attempt}] ${message}` : message,
        });
    }

    async openCommunications(step: DispatchStep, output: string): Promise<void> {
        const references = this.extractor.extract(output, step.agentId);
        for (const ref of references) {
            try {
                const record = await this.recorder.openCommunication({
                    executionId: step.executionId,
                    stepId: step.stepId,
                    fromAgent: step.agentId,
                    toAgent: ref.toAgent,
                    message: ref.message,
                });
                if (this.options.relayMentions && record.response === null) {
                    this.track(this.relay(step, record));
                }
            } catch (err) {
                console.error(`${TAG} could not open communication ${step.agentId} -> ${ref.toAgent}:`, err);
            }
        }
    }

    private async relay(step: DispatchStep, record: CommunicationEntity): Promise<void> {
        const context = { executionId: step.executionId, stepId: step.stepId, fromAgent: record.from_agent };
        const timeoutMs = step.timeoutMs ?? this.options.defaultTimeoutMs;
        const answer = await this.invokeWithTimeout(step.stepId, record.to_agent, record.message, context, timeoutMs);
        await this.recorder.attachResponse(record.id, answer);
    }

    private track(relay: Promise<void>): void {
        const tracked: Promise<void> = relay
            .catch((err: unknown) => console.warn(`${TAG} relay failed:`, err))
            .finally(() => this.relays.delete(tracked));
        this.relays.add(tracked);
    }
}
