export class AlreadyRunningError extends Error {
    constructor(public readonly executionId: string) {
        super(`Execution ${executionId} is already running`);
        this.name = 'AlreadyRunningError';
    }
}

export class ExecutionNotFoundError extends Error {
    constructor(public readonly executionId: string) {
        super(`Execution ${executionId} not found`);
        this.name = 'ExecutionNotFoundError';
    }
}

export class TemplateNotFoundError extends Error {
    constructor(public readonly templateId: string) {
        super(`Template ${templateId} not found`);
        this.name = 'TemplateNotFoundError';
    }
}

// Storage write failed. The recorder logs these; the scheduler fails the run.
export class PersistenceError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'PersistenceError';
    }
}
