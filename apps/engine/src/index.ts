import 'dotenv/config';
import { Pool } from 'pg';
import Redis from 'ioredis';
import { loadConfig } from './config';
import { createPool, createRedis } from './db';
import { createGrpcServer, startGrpcServer, stopGrpcServer } from './grpc/server';
import { HealthProbe, HealthService } from './grpc/health.service';
import { OrchestratorService } from './grpc/orchestrator.service';
import { PgAuditRepository } from './repositories/audit.repository';
import { PgCommunicationRepository } from './repositories/communication.repository';
import { PgExecutionRepository } from './repositories/execution.repository';
import {
    InMemoryAuditRepository,
    InMemoryCommunicationRepository,
    InMemoryExecutionRepository,
} from './repositories/memory.repository';
import { AuditRepository, CommunicationRepository, ExecutionRepository } from './repositories/types';
import {
    AuditRecorder,
    EventPublisher,
    ExecutionScheduler,
    HeartbeatService,
    HttpAgentInvoker,
    LocalEventPublisher,
    MentionExtractor,
    Orchestrator,
    Reaper,
    RedisEventPublisher,
    StaticAgentDirectory,
    StepDispatcher,
    TemplateStore,
} from './services';

const TAG = '[ensemble]';

const config = loadConfig();

// Storage: Postgres when configured, otherwise process memory
let pool: Pool | null = null;
let redis: Redis | null = null;
let executions: ExecutionRepository;
let audit: AuditRepository;
let communications: CommunicationRepository;

if (config.databaseUrl) {
    const pg = createPool(config.databaseUrl);
    pg.on('error', (err) => console.error(`${TAG} idle client error:`, err));
    pool = pg;
    executions = new PgExecutionRepository(pg);
    audit = new PgAuditRepository(pg);
    communications = new PgCommunicationRepository(pg);
} else {
    console.warn(`${TAG} DATABASE_URL is not set, executions are kept in memory only`);
    executions = new InMemoryExecutionRepository();
    audit = new InMemoryAuditRepository();
    communications = new InMemoryCommunicationRepository();
}

let publisher: EventPublisher;
if (config.redisUrl) {
    const client = createRedis(config.redisUrl);
    client.on('error', (err) => console.error(`${TAG} redis error:`, err));
    redis = client;
    publisher = new RedisEventPublisher(client);
} else {
    console.warn(`${TAG} REDIS_URL is not set, events stay in process`);
    publisher = new LocalEventPublisher();
}

const recorder = new AuditRecorder(audit, communications);
const heartbeat = new HeartbeatService(executions, config.heartbeatInterval);
const templates = new TemplateStore();

let dispatcher: StepDispatcher | null = null;
let scheduler: ExecutionScheduler | null = null;
let reaper: Reaper | null = null;
let stopServer: (() => Promise<void>) | null = null;

async function main() {
    console.log(`${TAG} starting engine... (worker: ${config.workerId})`);

    // Health checks
    const probes: HealthProbe[] = [];
    if (pool) {
        const pg = pool;
        await pg.query('SELECT 1');
        console.log(`${TAG} postgres connected`);
        probes.push({ name: 'postgres', check: () => pg.query('SELECT 1') });
    }
    if (redis) {
        const client = redis;
        await client.ping();
        console.log(`${TAG} redis connected`);
        probes.push({ name: 'redis', check: () => client.ping() });
    }

    const agents = await StaticAgentDirectory.fromFile(config.agentsFile);
    console.log(`${TAG} ${agents.list().length} agents available`);
    await templates.loadFile(config.templatesFile);

    const activeDispatcher = new StepDispatcher(
        new HttpAgentInvoker(config.agentServiceUrl),
        recorder,
        new MentionExtractor(agents.list()),
        {
            defaultTimeoutMs: config.stepTimeoutMs,
            maxAttempts: config.maxAttempts,
            backoff: config.backoff,
            relayMentions: config.relayMentions,
        },
    );
    dispatcher = activeDispatcher;
    const activeScheduler = new ExecutionScheduler(
        executions,
        activeDispatcher,
        recorder,
        publisher,
        agents,
        { workerId: config.workerId, maxInFlight: config.maxInFlight },
        heartbeat,
    );
    scheduler = activeScheduler;
    const orchestrator = new Orchestrator(templates, activeScheduler, recorder, executions);

    // gRPC
    const grpcServer = createGrpcServer(new OrchestratorService(orchestrator), new HealthService(probes));
    await startGrpcServer(grpcServer, config.port);
    stopServer = () => stopGrpcServer(grpcServer);

    // Reaper
    reaper = new Reaper(executions, recorder, publisher, config.reaperStale, config.reaperInterval);
    reaper.start();

    console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
    console.log(`${TAG} ${signal} received, shutting down...`);

    if (stopServer) await stopServer();
    if (reaper) reaper.stop();
    if (scheduler) await scheduler.shutdown();
    if (dispatcher) await dispatcher.drain();
    heartbeat.stopAll();
    await recorder.flush();

    if (pool) await pool.end();
    if (redis) await redis.quit();
    console.log(`${TAG} shutdown complete`);
    process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT', 'SIGUSR2'] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((err) => {
            console.error(`${TAG} shutdown failed:`, err);
            process.exit(1);
        });
    });
}

main().catch((err) => {
    console.error(`${TAG} fatal:`, err);
    process.exit(1);
});
