import { randomUUID } from 'node:crypto';
import { createLogger } from '../../utils/logger.js';
import type { CaddieAssistant } from './CaddieAssistant.js';

export type AssistantFactory = (sessionId: string) => CaddieAssistant;

/** Live sessions by id. Each session owns its assistant and context store. */
export class SessionRegistry {
  private readonly logger = createLogger({ component: 'SessionRegistry' });
  private readonly sessions = new Map<string, CaddieAssistant>();

  constructor(
    private readonly factory: AssistantFactory,
    private readonly clock: () => number = Date.now
  ) {}

  create(): CaddieAssistant {
    const sessionId = randomUUID();
    const assistant = this.factory(sessionId);
    this.sessions.set(sessionId, assistant);
    this.logger.info({ sessionId }, 'Session created');
    return assistant;
  }

  get(sessionId: string): CaddieAssistant | undefined {
    return this.sessions.get(sessionId);
  }

  delete(sessionId: string): boolean {
    const assistant = this.sessions.get(sessionId);
    if (!assistant) {
      return false;
    }
    assistant.reset();
    this.sessions.delete(sessionId);
    this.logger.info({ sessionId }, 'Session closed');
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Drops sessions idle for longer than `maxIdleMs`; returns how many were dropped. */
  sweepIdle(maxIdleMs: number): number {
    const cutoff = this.clock() - maxIdleMs;
    let removed = 0;
    for (const [sessionId, assistant] of this.sessions) {
      if (assistant.lastActivity < cutoff) {
        this.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }
}
