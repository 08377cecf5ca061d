import type { Logger } from 'pino';
import type { JobMonitor, JobReportUpdate } from '../../domain/ports/JobMonitor.js';
import type { EventType } from '../../domain/events/DomainEvents.js';
import { EventBus } from '../../application/EventBus.js';
import type { EventHandler, WildcardHandler } from '../../application/EventBus.js';

/**
 * Default job monitor: republishes every report update as a typed event.
 *
 * @example
 * ```typescript
 * const monitor = new EventJobMonitor(logger);
 * monitor.on('job:status-changed', (event) => dashboard.update(event.report));
 * const job = new BatchJob({ ..., parameters: { monitoring: true }, monitor });
 * ```
 */
export class EventJobMonitor implements JobMonitor {
  private readonly eventBus: EventBus;

  constructor(logger: Logger) {
    this.eventBus = new EventBus((error, event) => {
      logger.warn({ event: 'monitor_handler_error', type: event.type, err: error }, 'Job monitor subscriber failed');
    });
  }

  notify(update: JobReportUpdate): void {
    const { report, timestamp } = update;
    if (update.reason === 'status-changed') {
      this.eventBus.emit({ type: 'job:status-changed', jobName: report.jobName, status: report.status, report, timestamp });
    } else {
      this.eventBus.emit({ type: 'job:record-processed', jobName: report.jobName, report, timestamp });
    }
  }

  /** Subscribe to an event type. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: WildcardHandler): this {
    this.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: WildcardHandler): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
