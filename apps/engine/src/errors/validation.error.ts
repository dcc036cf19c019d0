/** Bad template, step graph or start request. Rejected before anything is persisted. */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class CyclicDependencyError extends ValidationError {
    constructor(public readonly unplaced: string[]) {
        super(`Cyclic dependency among steps: ${unplaced.join(', ')}`);
        this.name = 'CyclicDependencyError';
    }
}
