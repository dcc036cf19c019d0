import * as grpc from '@grpc/grpc-js';
import { createExecutionClient, OrchestratorRpc } from '../src/grpc/execution-client';
import { decode, encode } from '../src/utils/serialization';
import { StartExecutionMessage } from '../src/grpc/messages';

function fakeRpc(overrides: Partial<OrchestratorRpc> = {}): OrchestratorRpc {
    const unexpected = () => {
        throw new Error('unexpected call');
    };
    return {
        startExecution: unexpected,
        getExecution: unexpected,
        cancelExecution: unexpected,
        listAudit: unexpected,
        exportAudit: unexpected,
        listTemplates: unexpected,
        ...overrides,
    };
}

describe('ExecutionClient', () => {
    it('encodes steps and context on start', async () => {
        let sent: StartExecutionMessage | undefined;
        const client = createExecutionClient(fakeRpc({
            startExecution: (req, cb) => {
                sent = req;
                cb(null, { execution_id: 'exec-42' });
            },
        }));

        const id = await client.startExecution({
            steps: [{ id: 'draft', agentId: 'writer', task: 'Draft the summary' }],
            mode: 'parallel',
            context: { topic: 'billing' },
        });

        expect(id).toBe('exec-42');
        expect(sent?.template_id).toBe('');
        expect(sent?.mode).toBe('parallel');
        expect(decode(sent?.steps)).toEqual([{ id: 'draft', agentId: 'writer', task: 'Draft the summary' }]);
        expect(decode(sent?.context)).toEqual({ topic: 'billing' });
    });

    it('sends empty bytes when starting from a template', async () => {
        let sent: StartExecutionMessage | undefined;
        const client = createExecutionClient(fakeRpc({
            startExecution: (req, cb) => {
                sent = req;
                cb(null, { execution_id: 'exec-1' });
            },
        }));

        await client.startExecution({ templateId: 'code-review' });

        expect(sent?.template_id).toBe('code-review');
        expect(sent?.steps.length).toBe(0);
        expect(sent?.context.length).toBe(0);
    });

    it('decodes execution views', async () => {
        const createdAt = new Date('2026-03-01T10:00:00.000Z');
        const client = createExecutionClient(fakeRpc({
            getExecution: (req, cb) => cb(null, { execution: encode({ id: req.execution_id, progress: 50, createdAt }) }),
        }));

        const view = await client.getExecution('exec-7');

        expect(view.id).toBe('exec-7');
        expect(view.progress).toBe(50);
        expect(view.createdAt).toEqual(createdAt);
    });

    it('rejects with the gRPC error', async () => {
        const failure: grpc.ServiceError = Object.assign(new Error('5 NOT_FOUND: Execution missing not found'), {
            code: grpc.status.NOT_FOUND,
            details: 'Execution missing not found',
            metadata: new grpc.Metadata(),
        });
        const client = createExecutionClient(fakeRpc({
            cancelExecution: (_req, cb) => cb(failure),
        }));

        await expect(client.cancelExecution('missing')).rejects.toThrow('NOT_FOUND');
    });

    it('rejects unknown statuses from the server', async () => {
        const client = createExecutionClient(fakeRpc({
            cancelExecution: (_req, cb) => cb(null, { status: 'exploded' }),
        }));

        await expect(client.cancelExecution('exec-1')).rejects.toThrow('Unknown execution status "exploded"');
    });

    it('maps unsupported export formats to a result', async () => {
        const client = createExecutionClient(fakeRpc({
            exportAudit: (_req, cb) => cb(null, {
                supported: false,
                content_type: '',
                filename: '',
                body: Buffer.alloc(0),
                message: 'PDF export is not implemented yet',
            }),
        }));

        const result = await client.exportAudit('exec-1', 'pdf');

        expect(result).toEqual({
            ok: false,
            reason: 'unsupported_format',
            format: 'pdf',
            supported: ['csv'],
            message: 'PDF export is not implemented yet',
        });
    });

    it('returns an empty list when no templates are encoded', async () => {
        const client = createExecutionClient(fakeRpc({
            listTemplates: (_req, cb) => cb(null, { templates: Buffer.alloc(0) }),
        }));

        await expect(client.listTemplates()).resolves.toEqual([]);
    });
});
