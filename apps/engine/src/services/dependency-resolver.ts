import { CyclicDependencyError, ValidationError } from '../errors';

export interface StepNode {
    id: string;
    dependsOn: readonly string[];
}

/**
 * Checks ids and dependency references, then layers the graph with
 * Kahn's algorithm. Stage k only depends on stages 0..k-1; each stage
 * keeps definition order.
 */
export function resolveStages(steps: readonly StepNode[]): string[][] {
    const ids = new Set<string>();
    for (const step of steps) {
        if (ids.has(step.id)) throw new ValidationError(`Duplicate step id "${step.id}"`);
        ids.add(step.id);
    }
    for (const step of steps) {
        for (const dep of step.dependsOn) {
            if (dep === step.id) throw new ValidationError(`Step "${step.id}" depends on itself`);
            if (!ids.has(dep)) throw new ValidationError(`Step "${step.id}" depends on unknown step "${dep}"`);
        }
    }

    const remaining = new Map<string, number>();
    for (const step of steps) remaining.set(step.id, new Set(step.dependsOn).size);
    const dependents = dependentsOf(steps);

    const stages: string[][] = [];
    let placed = 0;
    while (placed < steps.length) {
        const stage = steps.filter(s => remaining.get(s.id) === 0).map(s => s.id);
        if (stage.length === 0) {
            throw new CyclicDependencyError(steps.filter(s => (remaining.get(s.id) ?? 0) > 0).map(s => s.id));
        }
        for (const id of stage) {
            remaining.set(id, -1);  // placed
            for (const dependent of dependents.get(id) ?? []) {
                remaining.set(dependent, (remaining.get(dependent) ?? 0) - 1);
            }
        }
        stages.push(stage);
        placed += stage.length;
    }
    return stages;
}

/** Reverse adjacency: step id -> ids that directly depend on it. */
export function dependentsOf(steps: readonly StepNode[]): Map<string, string[]> {
    const map = new Map<string, string[]>();
    for (const step of steps) map.set(step.id, []);
    for (const step of steps) {
        for (const dep of new Set(step.dependsOn)) {
            map.get(dep)?.push(step.id);
        }
    }
    return map;
}

export function transitiveDependents(stepId: string, dependents: Map<string, string[]>): Set<string> {
    const seen = new Set<string>();
    const queue = [...(dependents.get(stepId) ?? [])];
    while (queue.length > 0) {
        const next = queue.shift();
        if (next === undefined || seen.has(next)) continue;
        seen.add(next);
        queue.push(...(dependents.get(next) ?? []));
    }
    return seen;
}

export function stageIndex(stages: string[][]): Map<string, number> {
    const index = new Map<string, number>();
    stages.forEach((stage, i) => stage.forEach(id => index.set(id, i)));
    return index;
}
