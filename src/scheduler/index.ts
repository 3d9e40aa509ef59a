import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import type { SessionRegistry } from '../core/assistant/SessionRegistry.js';

const logger = createLogger({ component: 'scheduler' });

/** Periodically closes sessions that have been idle for longer than `idleMinutes`. */
export function scheduleSessionSweep(
  sessions: SessionRegistry,
  cronExpression: string,
  idleMinutes: number,
  timezone: string
): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid SESSION_SWEEP_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, idleMinutes, timezone }, 'Scheduling idle session sweep');

  return cron.schedule(
    cronExpression,
    () => {
      try {
        const removed = sessions.sweepIdle(idleMinutes * 60_000);
        if (removed > 0) {
          logger.info({ removed, remaining: sessions.size }, 'Idle sessions closed');
        }
      } catch (error) {
        logger.error({ error }, 'Idle session sweep failed');
      }
    },
    { timezone }
  );
}
