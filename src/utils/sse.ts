// src/utils/sse.ts
import type { ServerResponse } from 'http';
import { logger } from '@/services/logger';
import type { EventSink, WorkflowEvent } from '@/services/workflow-events';
import { errorMessage } from './errors';

/** Writes workflow events as server-sent events: `data: {"type": ..., ...}`. */
export class SseEventSink implements EventSink {
  private initialized = false;
  private closed = false;

  constructor(private readonly res: ServerResponse) {}

  /**
   * Initialize the SSE stream with headers.
   */
  init(): void {
    if (this.initialized) return;
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.flushHeaders();
    this.initialized = true;
  }

  write(event: WorkflowEvent): void {
    if (this.closed) return;
    if (!this.initialized) this.init();
    const payload = {
      type: event.type,
      requestId: event.requestId,
      sequence: event.sequence,
      timestamp: event.timestamp,
      ...event.data,
    };
    this.res.write(`data: ${JSON.stringify(payload)}\n\n`);
  }

  /**
   * Close the SSE stream connection.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.res.write('data: [DONE]\n\n');
      this.res.end();
    } catch (err) {
      logger.error('sse:close_failed', { error: errorMessage(err) });
    }
  }
}
