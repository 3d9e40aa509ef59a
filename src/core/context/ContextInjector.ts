import { isUnderPressure } from '../models/session.js';
import type { ConversationTurn, SessionContext } from '../models/session.js';
import { MAX_HISTORY_TURNS } from './SessionContextStore.js';

const ROLE_LABELS: Record<ConversationTurn['role'], string> = {
  USER: 'User',
  ASSISTANT: 'Assistant',
};

function section(title: string, lines: string[]): string | undefined {
  return lines.length > 0 ? [`**${title}:**`, ...lines].join('\n') : undefined;
}

function renderTurn(turn: ConversationTurn): string {
  return `${ROLE_LABELS[turn.role]}: ${turn.content}`;
}

/**
 * Renders session context for model requests. Sections with no data are
 * omitted and an empty context renders as an empty string.
 */
export class ContextInjector {
  buildPrompt(context: SessionContext): string {
    const sections = [
      this.roundSection(context),
      this.positionSection(context),
      this.lastShotSection(context),
      context.lastRecommendation
        ? section('Last Recommendation', [context.lastRecommendation])
        : undefined,
      section(
        'Recent Conversation',
        context.conversationHistory.slice(-MAX_HISTORY_TURNS).map(renderTurn)
      ),
    ].filter((block): block is string => block !== undefined);

    if (sections.length === 0) {
      return '';
    }
    return ['## Current Context', ...sections].join('\n\n').trim();
  }

  buildSummary(context: SessionContext): string {
    const parts: string[] = [];
    if (context.currentRound) parts.push(context.currentRound.courseName);
    if (context.currentHole) parts.push(`Hole ${context.currentHole.number} (Par ${context.currentHole.par})`);
    if (context.lastShot) parts.push(`Last: ${context.lastShot.club.name}`);
    return parts.length > 0 ? parts.join(' • ') : 'no active session';
  }

  /** The latest assistant reply and the user turn before it, or "" when either is missing. */
  buildFollowUpContext(context: SessionContext): string {
    const history = context.conversationHistory;
    let assistantIndex = -1;
    for (let i = history.length - 1; i >= 0; i--) {
      if (history[i]?.role === 'ASSISTANT') {
        assistantIndex = i;
        break;
      }
    }
    if (assistantIndex < 0) {
      return '';
    }
    let user: ConversationTurn | undefined;
    for (let i = assistantIndex - 1; i >= 0; i--) {
      const turn = history[i];
      if (turn?.role === 'USER') {
        user = turn;
        break;
      }
    }
    const assistant = history[assistantIndex];
    if (!user || !assistant) {
      return '';
    }
    return `Last exchange:\n${renderTurn(user)}\n${renderTurn(assistant)}`;
  }

  private roundSection(context: SessionContext): string | undefined {
    const round = context.currentRound;
    if (!round) return undefined;
    return section('Round Information', [`- Course: ${round.courseName}`, `- Round ID: ${round.id}`]);
  }

  private positionSection(context: SessionContext): string | undefined {
    const lines: string[] = [];
    const hole = context.currentHole;
    if (hole) {
      lines.push(`- Hole: ${hole.number} (Par ${hole.par})`);
      if (hole.strokes !== undefined) lines.push(`- Strokes: ${hole.strokes}`);
    }
    if (context.conditions) lines.push(`- Conditions: ${context.conditions}`);
    return section('Current Position', lines);
  }

  private lastShotSection(context: SessionContext): string | undefined {
    const shot = context.lastShot;
    if (!shot) return undefined;
    const lines = [`- Club: ${shot.club.name}`, `- Lie: ${shot.lie.toLowerCase()}`];
    if (shot.missDirection) lines.push(`- Miss: ${shot.missDirection.toLowerCase()}`);
    if (isUnderPressure(shot.pressure)) {
      const scoring = shot.pressure?.scoringContext;
      lines.push(scoring ? `- Pressure: yes (${scoring})` : '- Pressure: yes');
    }
    if (shot.notes) lines.push(`- Notes: ${shot.notes}`);
    return section('Last Shot', lines);
  }
}
