// Wire shapes of ensemble.Orchestrator (keepCase: true, defaults: true).

export interface ExecutionIdMessage {
    execution_id: string;
}

export interface StartExecutionMessage {
    template_id: string;
    steps: Buffer;
    mode: string;
    context: Buffer;
}

export interface StartExecutionReply {
    execution_id: string;
}

export interface GetExecutionReply {
    execution: Buffer;
}

export interface CancelExecutionReply {
    status: string;
}

export interface ListAuditReply {
    records: Buffer;
}

export interface ExportAuditMessage {
    execution_id: string;
    format: string;
}

export interface ExportAuditReply {
    supported: boolean;
    content_type: string;
    filename: string;
    body: Buffer;
    message: string;
}

export type ListTemplatesMessage = Record<string, never>;

export interface ListTemplatesReply {
    templates: Buffer;
}
