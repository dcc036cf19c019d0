export { HeartbeatService } from './heartbeat.service';
export { Reaper } from './reaper';
export { TemplateStore } from './template-store';
export type { FrozenTemplate, FrozenStep } from './template-store';
export { resolveStages, dependentsOf, transitiveDependents } from './dependency-resolver';
export { StaticAgentDirectory, HttpAgentInvoker } from './agent-invoker';
export type { AgentInvoker, AgentDirectory, AgentInfo, InvocationResult } from './agent-invoker';
export { MentionExtractor } from './directed-references';
export type { DirectedReferenceExtractor, DirectedReference } from './directed-references';
export { StepDispatcher } from './step-dispatcher';
export type { Dispatcher, DispatchHooks, StepContext, StepResult } from './step-dispatcher';
export { AuditRecorder, communicationId } from './audit-recorder';
export { RedisEventPublisher, LocalEventPublisher, executionChannel } from './event-publisher';
export type { EventPublisher } from './event-publisher';
export { ExecutionScheduler } from './execution-scheduler';
export type { ExecutionPlan, PlannedStep } from './execution-scheduler';
export { progress, buildView } from './progress';
export { Orchestrator } from './orchestrator';
