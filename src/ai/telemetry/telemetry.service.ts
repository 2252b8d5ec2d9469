import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/utils/errors';

export interface LatencyAggregate {
  count: number;
  totalMs: number;
  maxMs: number;
  avgMs: number;
}

export interface TelemetrySnapshot {
  since: string;
  latencies: Record<string, LatencyAggregate>;
  events: Record<string, number>;
}

/**
 * In-process counters and latency aggregates. Recording is synchronous and
 * never throws into the request path.
 */
@Injectable()
export class TelemetryService {
  private readonly logger = new Logger(TelemetryService.name);
  private readonly since = new Date();
  private readonly latencies = new Map<string, LatencyAggregate>();
  private readonly events = new Map<string, number>();

  recordEvent(name: string, attributes: Record<string, unknown> = {}): void {
    try {
      this.events.set(name, (this.events.get(name) ?? 0) + 1);
      this.logger.debug(`📈 ${name} ${JSON.stringify(attributes)}`);
    } catch (error) {
      this.logger.warn(`⚠️ Failed to record event ${name}: ${errorMessage(error)}`);
    }
  }

  recordLatency(stage: string, ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) return;

    const current = this.latencies.get(stage) ?? {
      count: 0,
      totalMs: 0,
      maxMs: 0,
      avgMs: 0,
    };
    const count = current.count + 1;
    const totalMs = current.totalMs + ms;
    this.latencies.set(stage, {
      count,
      totalMs,
      maxMs: Math.max(current.maxMs, ms),
      avgMs: Math.round((totalMs / count) * 100) / 100,
    });
  }

  snapshot(): TelemetrySnapshot {
    return {
      since: this.since.toISOString(),
      latencies: Object.fromEntries(
        [...this.latencies.entries()].map(([stage, agg]) => [stage, { ...agg }]),
      ),
      events: Object.fromEntries(this.events),
    };
  }
}
