import { readFile } from 'fs/promises';
import { AgentFileSchema, AgentResponseSchema, parseOrThrow } from './schemas';

export type InvocationResult =
    | { success: true; output: string }
    | { success: false; error: string; retryable?: boolean };

/** The external agent invocation service: one call per step attempt. */
export interface AgentInvoker {
    invoke(
        agentId: string,
        task: string,
        context: Record<string, unknown>,
        timeoutMs: number,
    ): Promise<InvocationResult>;
}

export interface AgentInfo {
    id: string;
    name: string;
    role: string;
}

export interface AgentDirectory {
    has(agentId: string): boolean;
    list(): AgentInfo[];
}

export class StaticAgentDirectory implements AgentDirectory {
    private readonly agents: Map<string, AgentInfo>;

    constructor(agents: AgentInfo[]) {
        this.agents = new Map(agents.map(a => [a.id, a]));
    }

    static async fromFile(path: string): Promise<StaticAgentDirectory> {
        const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
        return new StaticAgentDirectory(parseOrThrow(AgentFileSchema, raw, `agent file ${path}`).agents);
    }

    has(agentId: string): boolean {
        return this.agents.has(agentId);
    }

    list(): AgentInfo[] {
        return [...this.agents.values()];
    }
}

/**
 * POSTs `{ task, context }` to `<baseUrl>/agents/<id>/invoke` and expects
 * `{ output }` back. 5xx and 429 are retryable, other 4xx are not.
 */
export class HttpAgentInvoker implements AgentInvoker {
    constructor(private readonly baseUrl: string) { }

    async invoke(
        agentId: string,
        task: string,
        context: Record<string, unknown>,
        timeoutMs: number,
    ): Promise<InvocationResult> {
        const url = `${this.baseUrl.replace(/\/+$/, '')}/agents/${encodeURIComponent(agentId)}/invoke`;
        let res: Response;
        try {
            res = await fetch(url, {
                method: 'POST',
                headers: { 'content-type': 'application/json' },
                body: JSON.stringify({ task, context }),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (err) {
            return { success: false, error: err instanceof Error ? err.message : String(err), retryable: true };
        }

        if (!res.ok) {
            const detail = await res.text().catch(() => '');
            return {
                success: false,
                error: `Agent ${agentId} returned ${res.status}${detail ? `: ${detail}` : ''}`,
                retryable: res.status >= 500 || res.status === 429,
            };
        }

        const parsed = AgentResponseSchema.safeParse(await res.json().catch(() => null));
        if (!parsed.success) {
            return { success: false, error: `Agent ${agentId} sent a malformed response`, retryable: false };
        }
        return { success: true, output: parsed.data.output };
    }
}
