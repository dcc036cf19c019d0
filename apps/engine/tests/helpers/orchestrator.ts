import { Orchestrator } from '../../src/services/orchestrator';
import { TemplateStore } from '../../src/services/template-store';
import { EngineOptions, ScriptedInvoker, buildEngine } from './agents';

export const REVIEW_TEMPLATE = {
    id: 'review',
    name: 'Review',
    steps: [
        { id: 'impl', agentId: 'coder_01', task: 'implement' },
        { id: 'check', agentId: 'tester_01', task: 'test', dependsOn: ['impl'] },
    ],
};

/** Orchestrator over an in-memory engine with one registered template and sequential ids. */
export function buildOrchestrator(invoker = new ScriptedInvoker(), options: EngineOptions = {}) {
    const engine = buildEngine(invoker, options);
    const templates = new TemplateStore();
    templates.register(REVIEW_TEMPLATE);

    let next = 0;
    const orchestrator = new Orchestrator(templates, engine.scheduler, engine.recorder, engine.executions, {
        newId: () => `exec-${++next}`,
    });
    return { ...engine, templates, orchestrator };
}
