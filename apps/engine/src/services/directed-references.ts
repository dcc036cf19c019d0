import { AgentInfo } from './agent-invoker';

export interface DirectedReference {
    toAgent: string;
    message: string;
}

/**
 * Strategy for finding messages one agent addresses to another in its
 * output. The dispatcher only depends on this interface.
 */
export interface DirectedReferenceExtractor {
    extract(text: string, fromAgent: string): DirectedReference[];
}

const MENTION_LINE = /^\s*@([A-Za-z0-9_ -]+?)\s*:\s*(.*)$/;

const normalize = (value: string) => value.trim().toLowerCase();

/**
 * Lines shaped like `@Name: message`. Name matches an agent's id, name or
 * name without spaces, ignoring case.
 */
export class MentionExtractor implements DirectedReferenceExtractor {
    private readonly aliases = new Map<string, string>();

    constructor(agents: AgentInfo[]) {
        for (const agent of agents) {
            this.aliases.set(normalize(agent.id), agent.id);
            this.aliases.set(normalize(agent.name), agent.id);
            this.aliases.set(normalize(agent.name.replace(/\s+/g, '')), agent.id);
        }
    }

    extract(text: string, fromAgent: string): DirectedReference[] {
        const found = new Map<string, string>();
        for (const line of text.split(/\r?\n/)) {
            const match = MENTION_LINE.exec(line);
            if (!match) continue;

            const target = this.aliases.get(normalize(match[1] ?? ''));
            const message = (match[2] ?? '').trim();
            if (!target || target === fromAgent || message === '' || found.has(target)) continue;
            found.set(target, message);
        }
        return [...found.entries()].map(([toAgent, message]) => ({ toAgent, message }));
    }
}
