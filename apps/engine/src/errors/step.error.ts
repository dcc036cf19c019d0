export class StepTimeoutError extends Error {
    constructor(
        public readonly stepId: string,
        public readonly timeoutMs: number,
    ) {
        super(`Step ${stepId} timed out after ${timeoutMs}ms`);
        this.name = 'StepTimeoutError';
    }
}

export class StepInvocationError extends Error {
    constructor(
        public readonly stepId: string,
        message: string,
        public readonly retryable: boolean = true,
    ) {
        super(message);
        this.name = 'StepInvocationError';
    }
}
