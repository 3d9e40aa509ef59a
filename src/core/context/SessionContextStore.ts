import { NoActiveSessionError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type {
  ConversationRole,
  ConversationTurn,
  HolePosition,
  RoundInfo,
  SessionContext,
  Shot,
} from '../models/session.js';

export const MAX_HISTORY_TURNS = 10;

export interface RoundStart {
  roundId: string;
  courseName: string;
  startingHole?: number;
  startingPar?: number;
}

interface MutableSession {
  currentRound?: RoundInfo;
  currentHole?: HolePosition;
  conditions?: string;
  lastShot?: Shot;
  lastRecommendation?: string;
  history: ConversationTurn[];
}

function assertHole(holeNumber: number): void {
  if (!Number.isInteger(holeNumber) || holeNumber < 1 || holeNumber > 18) {
    throw new ValidationError(`Hole number must be 1-18, got ${holeNumber}`);
  }
}

function assertPar(par: number): void {
  if (!Number.isInteger(par) || par < 3 || par > 5) {
    throw new ValidationError(`Par must be 3-5, got ${par}`);
  }
}

/**
 * In-memory context for one player's round. One store per session, owned by
 * its orchestrator. Every mutation is synchronous, so two mutations never
 * interleave; readers get frozen snapshots.
 */
export class SessionContextStore {
  private readonly logger = createLogger({ component: 'SessionContextStore' });
  private state: MutableSession = { history: [] };

  constructor(private readonly clock: () => number = Date.now) {}

  snapshot(): SessionContext {
    const { history, ...rest } = this.state;
    return Object.freeze({
      ...rest,
      conversationHistory: Object.freeze([...history]),
    });
  }

  hasActiveRound(): boolean {
    return this.state.currentRound !== undefined;
  }

  /** Appends the user turn and the assistant reply, in that order. */
  appendTurn(userInput: string, assistantResponse: string): void {
    const timestamp = this.clock();
    this.pushTurn('USER', userInput, timestamp);
    this.pushTurn('ASSISTANT', assistantResponse, timestamp + 1);
  }

  addTurn(role: ConversationRole, content: string): void {
    this.pushTurn(role, content, this.clock());
  }

  updateRound({ roundId, courseName, startingHole = 1, startingPar = 4 }: RoundStart): void {
    if (!roundId.trim() || !courseName.trim()) {
      throw new ValidationError('Round id and course name are required');
    }
    assertHole(startingHole);
    assertPar(startingPar);

    this.state = {
      history: this.state.history,
      currentRound: Object.freeze({
        id: roundId,
        courseName: courseName.trim(),
        startingHole,
        startedAt: this.clock(),
      }),
      currentHole: Object.freeze({ number: startingHole, par: startingPar }),
    };
    this.logger.debug({ roundId, startingHole }, 'Round context set');
  }

  updateHole(holeNumber: number, par: number): void {
    this.requireRound('update hole');
    assertHole(holeNumber);
    assertPar(par);
    this.state.currentHole = Object.freeze({ number: holeNumber, par });
  }

  updateScore(strokes: number): void {
    const hole = this.state.currentHole;
    if (!this.state.currentRound || !hole) {
      throw new NoActiveSessionError('Cannot record a score without an active hole');
    }
    if (!Number.isInteger(strokes) || strokes < 1) {
      throw new ValidationError(`Strokes must be a positive whole number, got ${strokes}`);
    }
    this.state.currentHole = Object.freeze({ ...hole, strokes });
  }

  updateConditions(conditions: string): void {
    const trimmed = conditions.trim();
    this.state.conditions = trimmed || undefined;
  }

  recordShot(shot: Shot): void {
    this.state.lastShot = Object.freeze({ ...shot });
  }

  recordRecommendation(text: string): void {
    if (!text.trim()) {
      throw new ValidationError('Recommendation must not be blank');
    }
    this.state.lastRecommendation = text;
  }

  clearHistory(): void {
    this.state.history = [];
  }

  clear(): void {
    this.state = { history: [] };
    this.logger.debug('Session context cleared');
  }

  private pushTurn(role: ConversationRole, content: string, timestamp: number): void {
    this.state.history.push(Object.freeze({ role, content, timestamp }));
    if (this.state.history.length > MAX_HISTORY_TURNS) {
      this.state.history.splice(0, this.state.history.length - MAX_HISTORY_TURNS);
    }
  }

  private requireRound(action: string): RoundInfo {
    if (!this.state.currentRound) {
      throw new NoActiveSessionError(`Cannot ${action} without an active round`);
    }
    return this.state.currentRound;
  }
}
