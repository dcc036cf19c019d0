/**
 * A directed message from one agent to another, observed in a step's output.
 * The id is derived from (execution, step, target agent) so repeated
 * delivery maps onto the same row.
 */
export interface CommunicationEntity {
    id: string;
    execution_id: string;
    step_id: string;
    from_agent: string;
    to_agent: string;
    message: string;
    response: string | null;
    created_at: Date;
    responded_at: Date | null;
}

export type NewCommunication = Omit<CommunicationEntity, 'response' | 'created_at' | 'responded_at'>;
