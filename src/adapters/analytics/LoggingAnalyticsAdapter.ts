import type { AnalyticsEvent, AnalyticsPort } from '../../ports/AnalyticsPort.js';
import { createLogger } from '../../utils/logger.js';
import { redactPii } from '../../utils/redact.js';

/** Writes analytics events as structured log lines. */
export class LoggingAnalyticsAdapter implements AnalyticsPort {
  private readonly logger = createLogger({ adapter: 'LoggingAnalyticsAdapter' });

  track(event: AnalyticsEvent): void {
    const payload = event.type === 'error_occurred' && event.detail ? { ...event, detail: redactPii(event.detail) } : event;
    this.logger.info({ event: payload }, `analytics:${event.type}`);
  }
}
