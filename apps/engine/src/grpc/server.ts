import * as grpc from '@grpc/grpc-js';
import { loadService } from '@ensemble/sdk';
import { HealthService } from './health.service';
import { OrchestratorService } from './orchestrator.service';

export function createGrpcServer(orchestrator: OrchestratorService, health: HealthService): grpc.Server {
  const server = new grpc.Server({
    'grpc.max_receive_message_length': 4 * 1024 * 1024,
    'grpc.max_send_message_length': 4 * 1024 * 1024,
    'grpc.keepalive_time_ms': 30000,
    'grpc.keepalive_timeout_ms': 10000,
    'grpc.keepalive_permit_without_calls': 1,
  });

  const healthService = loadService('health.proto', 'grpc.health.v1.Health');
  server.addService(healthService.client.service, {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  const orchestratorService = loadService('orchestrator.proto', 'ensemble.Orchestrator');
  server.addService(orchestratorService.client.service, {
    startExecution: orchestrator.startExecution.bind(orchestrator),
    getExecution: orchestrator.getExecution.bind(orchestrator),
    cancelExecution: orchestrator.cancelExecution.bind(orchestrator),
    listAudit: orchestrator.listAudit.bind(orchestrator),
    exportAudit: orchestrator.exportAudit.bind(orchestrator),
    listTemplates: orchestrator.listTemplates.bind(orchestrator),
  });

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[ensemble] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown(() => resolve());
  });
}
