import { performance } from 'node:perf_hooks';
import { Observable, ReplaySubject } from 'rxjs';

export type RequestEventType =
  | 'request_started'
  | 'intent_classified'
  | 'classification_degraded'
  | 'context_enriched'
  | 'retrieval_degraded'
  | 'tool_invoked'
  | 'tool_failed'
  | 'tool_skipped'
  | 'draft_generated'
  | 'generation_failed'
  | 'validation'
  | 'retry'
  | 'fallback'
  | 'stage_timeout'
  | 'cancelled'
  | 'completed';

export interface RequestEvent {
  readonly seq: number;
  readonly type: RequestEventType;
  /** Milliseconds since the request started; never decreases. */
  readonly timestamp: number;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Append-only progress log of a single request.
 *
 * One writer (the request's pipeline) and any number of readers. Entries are
 * frozen before they are published, so a reader that takes `snapshot()` or
 * subscribes to `observe()` while the pipeline appends only ever sees whole
 * entries in order.
 */
export class RequestEventLog {
  private readonly entries: RequestEvent[] = [];
  private readonly published = new ReplaySubject<RequestEvent>();
  private lastTimestamp = 0;
  private closed = false;

  constructor(
    private readonly startedAt: number,
    private readonly clock: () => number = () => performance.now(),
  ) {}

  append(
    type: RequestEventType,
    payload: Record<string, unknown> = {},
  ): RequestEvent | null {
    if (this.closed) return null;

    const elapsed = Math.max(
      this.lastTimestamp,
      Math.round((this.clock() - this.startedAt) * 1000) / 1000,
    );
    this.lastTimestamp = elapsed;

    const event: RequestEvent = Object.freeze({
      seq: this.entries.length,
      type,
      timestamp: elapsed,
      payload: Object.freeze({ ...payload }),
    });

    this.entries.push(event);
    this.published.next(event);
    return event;
  }

  snapshot(): readonly RequestEvent[] {
    return this.entries.slice();
  }

  get length(): number {
    return this.entries.length;
  }

  /** Replays what has been appended so far, then follows live appends until `close()`. */
  observe(): Observable<RequestEvent> {
    return this.published.asObservable();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.published.complete();
  }
}
