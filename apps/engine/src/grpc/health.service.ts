import { sendUnaryData, ServerUnaryCall, ServerWritableStream } from '@grpc/grpc-js';

interface HealthCheckRequest {
    service: string;
}

type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

interface HealthCheckResponse {
    status: ServingStatus;
}

export interface Pingable {
    ping(): Promise<unknown>;
}

/**
 * Standard gRPC health check service implementation.
 * Verifies Redis connectivity.
 */
export class HealthService {
    constructor(private readonly redis: Pingable) { }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): Promise<void> {
        try {
            await this.redis.ping();
            callback(null, { status: 'SERVING' });
        } catch (error) {
            console.error('[health] check failed:', error);
            callback(null, { status: 'NOT_SERVING' });
        }
    }

    watch(call: Pick<ServerWritableStream<HealthCheckRequest, HealthCheckResponse>, 'write' | 'end'>): void {
        call.write({ status: 'SERVING' });
        call.end();
    }
}
