import * as grpc from '@grpc/grpc-js';
import { sendUnaryData } from '@grpc/grpc-js';
import {
    CancelExecutionReply,
    ExecutionIdMessage,
    ExportAuditMessage,
    ExportAuditReply,
    GetExecutionReply,
    ListAuditReply,
    ListTemplatesMessage,
    ListTemplatesReply,
    SerializationError,
    StartExecutionMessage,
    StartExecutionReply,
    decode,
    encode,
} from '@ensemble/sdk';
import {
    AlreadyRunningError,
    ExecutionNotFoundError,
    TemplateNotFoundError,
    ValidationError,
} from '../errors';
import { Orchestrator } from '../services/orchestrator';

const TAG = '[grpc]';

// Only the request is read, so tests can pass plain objects.
interface Call<T> {
    request: T;
}

export function toGrpcStatus(err: unknown): grpc.status {
    if (err instanceof ValidationError || err instanceof SerializationError) return grpc.status.INVALID_ARGUMENT;
    if (err instanceof ExecutionNotFoundError || err instanceof TemplateNotFoundError) return grpc.status.NOT_FOUND;
    if (err instanceof AlreadyRunningError) return grpc.status.ALREADY_EXISTS;
    return grpc.status.INTERNAL;
}

/**
 * ensemble.Orchestrator. Structured payloads travel as superjson bytes.
 */
export class OrchestratorService {
    constructor(private readonly orchestrator: Orchestrator) { }

    async startExecution(call: Call<StartExecutionMessage>, callback: sendUnaryData<StartExecutionReply>) {
        await this.handle('startExecution', callback, async () => {
            const { template_id, steps, mode, context } = call.request;
            const executionId = await this.orchestrator.startExecution({
                templateId: template_id || undefined,
                steps: decode<unknown>(steps),
                mode: mode || undefined,
                context: decode<unknown>(context),
            });
            return { execution_id: executionId };
        });
    }

    async getExecution(call: Call<ExecutionIdMessage>, callback: sendUnaryData<GetExecutionReply>) {
        await this.handle('getExecution', callback, async () => {
            const view = await this.orchestrator.getExecution(call.request.execution_id);
            return { execution: encode(view) };
        });
    }

    async cancelExecution(call: Call<ExecutionIdMessage>, callback: sendUnaryData<CancelExecutionReply>) {
        await this.handle('cancelExecution', callback, async () => {
            const status = await this.orchestrator.cancelExecution(call.request.execution_id);
            return { status };
        });
    }

    async listAudit(call: Call<ExecutionIdMessage>, callback: sendUnaryData<ListAuditReply>) {
        await this.handle('listAudit', callback, async () => {
            const records = await this.orchestrator.listAudit(call.request.execution_id);
            return { records: encode(records) };
        });
    }

    async exportAudit(call: Call<ExportAuditMessage>, callback: sendUnaryData<ExportAuditReply>) {
        await this.handle('exportAudit', callback, async (): Promise<ExportAuditReply> => {
            const { execution_id, format } = call.request;
            const exported = await this.orchestrator.exportAudit(execution_id, format);
            return exported.ok
                ? { supported: true, content_type: exported.contentType, filename: exported.filename, body: exported.body, message: '' }
                : { supported: false, content_type: '', filename: '', body: Buffer.alloc(0), message: exported.message };
        });
    }

    async listTemplates(_call: Call<ListTemplatesMessage>, callback: sendUnaryData<ListTemplatesReply>) {
        await this.handle('listTemplates', callback, async () => ({
            templates: encode(this.orchestrator.listTemplates()),
        }));
    }

    private async handle<T>(method: string, callback: sendUnaryData<T>, fn: () => Promise<T>): Promise<void> {
        let reply: T;
        try {
            reply = await fn();
        } catch (error) {
            const code = toGrpcStatus(error);
            if (code === grpc.status.INTERNAL) console.error(`${TAG} ${method} error:`, error);
            callback({
                code,
                details: error instanceof Error ? error.message : 'Unknown error',
            });
            return;
        }
        callback(null, reply);
    }
}
