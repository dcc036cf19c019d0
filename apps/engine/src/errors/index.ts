export { ValidationError, CyclicDependencyError } from './validation.error';
export { StepTimeoutError, StepInvocationError } from './step.error';
export {
    AlreadyRunningError,
    ExecutionNotFoundError,
    TemplateNotFoundError,
    PersistenceError,
} from './execution.error';

export function describeError(err: unknown): { name: string; message: string } {
    return err instanceof Error
        ? { name: err.name, message: err.message }
        : { name: 'Error', message: String(err) };
}
