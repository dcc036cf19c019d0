import * as grpc from '@grpc/grpc-js';
import { decode, encode } from '../utils/serialization';
import {
    AuditEntry,
    AuditExport,
    ExecutionStatus,
    ExecutionView,
    StartExecutionRequest,
    TemplateSummary,
    isExecutionStatus,
} from '../types';
import {
    CancelExecutionReply,
    ExecutionIdMessage,
    ExportAuditMessage,
    ExportAuditReply,
    GetExecutionReply,
    ListAuditReply,
    ListTemplatesMessage,
    ListTemplatesReply,
    StartExecutionMessage,
    StartExecutionReply,
} from './messages';
import { loadService } from './proto';

type GrpcCallback<T> = (err: grpc.ServiceError | null, res?: T) => void;

/** Callback-style surface of a generated ensemble.Orchestrator client. */
export interface OrchestratorRpc {
    startExecution(req: StartExecutionMessage, cb: GrpcCallback<StartExecutionReply>): void;
    getExecution(req: ExecutionIdMessage, cb: GrpcCallback<GetExecutionReply>): void;
    cancelExecution(req: ExecutionIdMessage, cb: GrpcCallback<CancelExecutionReply>): void;
    listAudit(req: ExecutionIdMessage, cb: GrpcCallback<ListAuditReply>): void;
    exportAudit(req: ExportAuditMessage, cb: GrpcCallback<ExportAuditReply>): void;
    listTemplates(req: ListTemplatesMessage, cb: GrpcCallback<ListTemplatesReply>): void;
}

export interface ExecutionClient {
    startExecution(request: StartExecutionRequest): Promise<string>;
    getExecution(executionId: string): Promise<ExecutionView>;
    cancelExecution(executionId: string): Promise<ExecutionStatus>;
    listAudit(executionId: string): Promise<AuditEntry[]>;
    exportAudit(executionId: string, format: string): Promise<AuditExport>;
    listTemplates(): Promise<TemplateSummary[]>;
    close(): void;
}

function rpc<T>(fn: (cb: GrpcCallback<T>) => void): Promise<T> {
    return new Promise((resolve, reject) => {
        fn((err, res) => {
            if (err) reject(err);
            else if (res === undefined) reject(new Error('Empty gRPC response'));
            else resolve(res);
        });
    });
}

function required<T>(value: T | undefined, what: string): T {
    if (value === undefined) throw new Error(`Response carried no ${what}`);
    return value;
}

export function createExecutionClient(client: OrchestratorRpc, close: () => void = () => undefined): ExecutionClient {
    return {
        startExecution: (request) =>
            rpc<StartExecutionReply>(cb => client.startExecution({
                template_id: request.templateId ?? '',
                steps: request.steps ? encode(request.steps) : Buffer.alloc(0),
                mode: request.mode ?? '',
                context: request.context ? encode(request.context) : Buffer.alloc(0),
            }, cb)).then(r => r.execution_id),

        getExecution: (executionId) =>
            rpc<GetExecutionReply>(cb => client.getExecution({ execution_id: executionId }, cb))
                .then(r => required(decode<ExecutionView>(r.execution), 'execution')),

        cancelExecution: (executionId) =>
            rpc<CancelExecutionReply>(cb => client.cancelExecution({ execution_id: executionId }, cb))
                .then(r => {
                    if (!isExecutionStatus(r.status)) throw new Error(`Unknown execution status "${r.status}"`);
                    return r.status;
                }),

        listAudit: (executionId) =>
            rpc<ListAuditReply>(cb => client.listAudit({ execution_id: executionId }, cb))
                .then(r => decode<AuditEntry[]>(r.records) ?? []),

        exportAudit: (executionId, format) =>
            rpc<ExportAuditReply>(cb => client.exportAudit({ execution_id: executionId, format }, cb))
                .then((r): AuditExport => r.supported
                    ? { ok: true, format: 'csv', contentType: r.content_type, filename: r.filename, body: r.body }
                    : { ok: false, reason: 'unsupported_format', format, supported: ['csv'], message: r.message }),

        listTemplates: () =>
            rpc<ListTemplatesReply>(cb => client.listTemplates({}, cb))
                .then(r => decode<TemplateSummary[]>(r.templates) ?? []),

        close,
    };
}

export function connectExecutionClient(
    address: string,
    credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): ExecutionClient {
    const { client: Client } = loadService('orchestrator.proto', 'ensemble.Orchestrator');
    const client = new Client(address, credentials);

    const bind = <Req, Res>(method: string) => (req: Req, cb: GrpcCallback<Res>): void => {
        const fn = client[method];
        if (typeof fn !== 'function') throw new Error(`Method ${method} missing from generated client`);
        fn.call(client, req, cb);
    };

    return createExecutionClient({
        startExecution: bind<StartExecutionMessage, StartExecutionReply>('startExecution'),
        getExecution: bind<ExecutionIdMessage, GetExecutionReply>('getExecution'),
        cancelExecution: bind<ExecutionIdMessage, CancelExecutionReply>('cancelExecution'),
        listAudit: bind<ExecutionIdMessage, ListAuditReply>('listAudit'),
        exportAudit: bind<ExportAuditMessage, ExportAuditReply>('exportAudit'),
        listTemplates: bind<ListTemplatesMessage, ListTemplatesReply>('listTemplates'),
    }, () => client.close());
}
