import { ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';

export type ServingStatus = 'SERVING' | 'NOT_SERVING';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

export interface HealthProbe {
    name: string;
    check(): Promise<unknown>;
}

/**
 * Standard gRPC health check service implementation.
 * Serving while every configured backend (Postgres, Redis) answers.
 */
export class HealthService {
    constructor(private readonly probes: HealthProbe[] = []) { }

    async status(): Promise<ServingStatus> {
        try {
            for (const probe of this.probes) await probe.check();
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: { request: HealthCheckRequest },
        callback: sendUnaryData<HealthCheckResponse>
    ) {
        callback(null, { status: await this.status() });
    }

    async watch(call: Pick<ServerWritableStream<HealthCheckRequest, HealthCheckResponse>, 'write' | 'end'>) {
        call.write({ status: await this.status() });
        call.end();
    }
}
