/**
 * Immutable audit log entry. Ordered by timestamp, ties broken by seq.
 */
export interface AuditRecordEntity {
    id: string;
    execution_id: string;
    step_id: string | null;
    agent_id: string | null;
    action: string;
    status: string;
    message: string;
    timestamp: Date;
    seq: number;
}

export type NewAuditRecord = Omit<AuditRecordEntity, 'id' | 'seq'>;

export interface AgentActionCount {
    agent_id: string;
    action_count: number;
}

export interface AuditStatistics {
    total_actions: number;
    failed_actions: number;
    success_rate: number;
    agents: AgentActionCount[];
    range: { from: Date | null; to: Date | null };
}
