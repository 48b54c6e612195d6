/**
 * Run Events
 *
 * Emits progress events during agent loop execution via a callback.
 * Sends are serialized: the next event is not delivered until the previous
 * callback resolved.
 *
 * Events are summary-level only:
 *   - thinking: a model call is about to start
 *   - tool_start: tool name
 *   - tool_result: tool name + status (completed/failed) + optional error kind
 *   - completion: tools_executed count, total_duration, outcome
 *
 * No full tool arguments or outputs. No raw stack traces.
 */

import type { ObservationErrorKind } from '../types/agent-types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { errorMessageOf } from './errors.js';

// =============================================================================
// Run Event Types (discriminated union on eventType)
// =============================================================================

interface RunEventBase {
  runId: string;
  timestamp: number;
  sequenceNumber: number;
}

export interface ThinkingEvent extends RunEventBase {
  eventType: 'thinking';
  round: number;
}

export interface ToolStartEvent extends RunEventBase {
  eventType: 'tool_start';
  round: number;
  toolName: string;
}

export interface ToolResultEvent extends RunEventBase {
  eventType: 'tool_result';
  round: number;
  toolName: string;
  status: 'completed' | 'failed';
  errorKind?: ObservationErrorKind;
}

export type CompletionOutcome = 'done' | 'exhausted' | 'cancelled' | 'error';

export interface CompletionEvent extends RunEventBase {
  eventType: 'completion';
  toolsExecuted: number;
  totalDuration: number;
  outcome: CompletionOutcome;
}

export type RunEvent = ThinkingEvent | ToolStartEvent | ToolResultEvent | CompletionEvent;

export type RunEventListener = (event: RunEvent) => void | Promise<void>;

interface QueuedEvent {
  event: RunEvent;
  done: () => void;
}

// =============================================================================
// RunEventEmitter Class
// =============================================================================

export class RunEventEmitter {
  private sequenceNumber = 0;
  private queue: QueuedEvent[] = [];
  private processing = false;
  private logger: Logger;

  constructor(
    private readonly listener?: RunEventListener,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('RunEvents');
  }

  emitThinking(runId: string, round: number): Promise<void> {
    return this.enqueue({ eventType: 'thinking', ...this.base(runId), round });
  }

  emitToolStart(runId: string, round: number, toolName: string): Promise<void> {
    return this.enqueue({ eventType: 'tool_start', ...this.base(runId), round, toolName });
  }

  emitToolResult(runId: string, round: number, toolName: string, errorKind?: ObservationErrorKind): Promise<void> {
    return this.enqueue({
      eventType: 'tool_result',
      ...this.base(runId),
      round,
      toolName,
      status: errorKind === undefined ? 'completed' : 'failed',
      ...(errorKind !== undefined ? { errorKind } : {}),
    });
  }

  emitCompletion(runId: string, toolsExecuted: number, totalDuration: number, outcome: CompletionOutcome): Promise<void> {
    return this.enqueue({ eventType: 'completion', ...this.base(runId), toolsExecuted, totalDuration, outcome });
  }

  private base(runId: string): RunEventBase {
    return { runId, timestamp: Date.now(), sequenceNumber: this.sequenceNumber++ };
  }

  // ---------------------------------------------------------------------------
  // Sequential Queue
  // ---------------------------------------------------------------------------

  /**
   * Resolves once THIS event has been handed to the listener. Never rejects;
   * listener failures are logged.
   */
  private enqueue(event: RunEvent): Promise<void> {
    if (!this.listener) return Promise.resolve();

    return new Promise<void>((resolve) => {
      this.queue.push({ event, done: resolve });
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing || !this.listener) return;
    this.processing = true;
    try {
      let next = this.queue.shift();
      while (next) {
        try {
          await this.listener(next.event);
        } catch (err) {
          this.logger.error(`Failed to deliver ${next.event.eventType} event: ${errorMessageOf(err)}`);
        }
        next.done();
        next = this.queue.shift();
      }
    } finally {
      this.processing = false;
    }
  }
}
