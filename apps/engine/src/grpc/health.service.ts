import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';
import type { Redis } from 'ioredis';
import type { Pool } from 'pg';

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

/**
 * Standard gRPC health check service implementation.
 * Verifies Postgres and Redis connectivity.
 */
export class HealthService {
    constructor(
        private readonly pool: Pick<Pool, 'query'>,
        private readonly redis: Pick<Redis, 'ping'>,
    ) { }

    async status(): Promise<ServingStatus> {
        try {
            await this.pool.query('SELECT 1');
            await this.redis.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): Promise<void> {
        callback(null, { status: await this.status() });
    }

    async watch(call: Pick<ServerWritableStream<HealthCheckRequest, HealthCheckResponse>, 'write' | 'end'>): Promise<void> {
        call.write({ status: await this.status() });
        call.end();
    }
}
