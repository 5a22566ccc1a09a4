import { monitorEventLoopDelay } from 'perf_hooks';

export interface LagSource {
    /** p99 event-loop delay in milliseconds. */
    readonly lag: number;
}

export class EventLoopMonitor implements LagSource {
    private monitor: ReturnType<typeof monitorEventLoopDelay>;

    constructor(resolution: number = 10) {
        this.monitor = monitorEventLoopDelay({ resolution });
        this.monitor.enable();
    }

    get lag(): number {
        return this.monitor.percentile(99) / 1000000;
    }

    disable(): void {
        this.monitor.disable();
    }
}

export interface BackpressureLimits {
    maxActiveRuns: number;
    maxEventLoopLag: number;
}

/**
 * Decides whether a new run may start. Returns the reason for refusing,
 * or null when there is room.
 */
export class BackpressureGuard {
    constructor(
        private readonly lagSource: LagSource,
        private readonly limits: BackpressureLimits,
    ) { }

    check(activeRuns: number): string | null {
        if (activeRuns >= this.limits.maxActiveRuns) {
            return `Active runs ${activeRuns} >= ${this.limits.maxActiveRuns}`;
        }
        const lag = this.lagSource.lag;
        if (lag >= this.limits.maxEventLoopLag) {
            return `Event loop lag ${lag.toFixed(2)}ms >= ${this.limits.maxEventLoopLag}ms`;
        }
        return null;
    }
}
