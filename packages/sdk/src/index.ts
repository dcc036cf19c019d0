// public api for @ensemble/sdk
// usage:
//   import { connectExecutionClient } from '@ensemble/sdk';
//   const client = connectExecutionClient('localhost:50051');
//   const id = await client.startExecution({ templateId: 'code-review', mode: 'staged' });

export * from './types';
export { serialize, deserialize, encode, decode, SerializationError } from './utils/serialization';
export { loadService, protoPath, PROTO_OPTIONS } from './grpc/proto';
export type { LoadedService } from './grpc/proto';
export { createExecutionClient, connectExecutionClient } from './grpc/execution-client';
export type { ExecutionClient, OrchestratorRpc } from './grpc/execution-client';
export * from './grpc/messages';
