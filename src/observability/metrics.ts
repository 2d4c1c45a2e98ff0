/**
 * Prometheus metrics for the media pipeline
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// REQUEST METRICS
// ============================================================================

/**
 * Counter: Pipeline requests by outcome (video, audio or a failure reason)
 */
export const requestsTotal = new client.Counter({
    name: 'media_relay_requests_total',
    help: 'Total number of media requests processed',
    labelNames: ['outcome'] as const,
    registers: [registry],
});

/**
 * Histogram: Stage duration in seconds
 */
export const stageDuration = new client.Histogram({
    name: 'media_relay_stage_duration_seconds',
    help: 'Pipeline stage duration in seconds',
    labelNames: ['stage', 'status'] as const,
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300, 600],
    registers: [registry],
});

// ============================================================================
// TOOL METRICS
// ============================================================================

/**
 * Counter: External tool invocations
 */
export const toolInvocationsTotal = new client.Counter({
    name: 'media_relay_tool_invocations_total',
    help: 'External tool invocations (yt-dlp, ffprobe, ffmpeg)',
    labelNames: ['tool', 'status'] as const,
    registers: [registry],
});

/**
 * Gauge: Tasks currently running in the worker pool
 */
export const poolActiveTasks = new client.Gauge({
    name: 'media_relay_pool_active_tasks',
    help: 'Tool tasks currently running in the worker pool',
    registers: [registry],
});

/**
 * Gauge: Tasks waiting for a worker pool slot
 */
export const poolPendingTasks = new client.Gauge({
    name: 'media_relay_pool_pending_tasks',
    help: 'Tool tasks waiting for a worker pool slot',
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

/**
 * Get content type for Prometheus
 */
export function getContentType(): string {
    return registry.contentType;
}

/**
 * Record a finished stage
 */
export function recordStage(stage: string, durationSec: number, status: 'success' | 'failed'): void {
    stageDuration.observe({ stage, status }, durationSec);
}
