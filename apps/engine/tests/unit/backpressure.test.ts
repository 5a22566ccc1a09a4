import { BackpressureGuard, EventLoopMonitor } from '../../src/services/backpressure';
import { briefOutput } from '../../src/services/status-observer';

describe('BackpressureGuard', () => {
    const limits = { maxActiveRuns: 2, maxEventLoopLag: 100 };

    it('allows runs while under both limits', () => {
        expect(new BackpressureGuard({ lag: 5 }, limits).check(1)).toBeNull();
    });

    it('refuses at the active-run cap', () => {
        expect(new BackpressureGuard({ lag: 5 }, limits).check(2)).toBe('Active runs 2 >= 2');
    });

    it('refuses when the event loop lags', () => {
        expect(new BackpressureGuard({ lag: 150 }, limits).check(0)).toBe('Event loop lag 150.00ms >= 100ms');
    });
});

describe('EventLoopMonitor', () => {
    it('reports a non-negative lag', () => {
        const monitor = new EventLoopMonitor();
        expect(monitor.lag).toBeGreaterThanOrEqual(0);
        monitor.disable();
    });
});

describe('briefOutput', () => {
    it('picks out the well-known metrics', () => {
        expect(briefOutput('embed', {
            content_length: 120,
            total_chunks: 3,
            total_tokens: 40,
            embeddings: [[0.1], [0.2], [0.3]],
            other: 'ignored',
        })).toEqual({
            message: 'Module embed completed successfully',
            size: 120,
            chunks: 3,
            tokens: 40,
            embeddings_count: 3,
        });
    });

    it('falls back to a plain message', () => {
        expect(briefOutput('m', { anything: 1 })).toEqual({ message: 'Module m completed successfully' });
    });
});
