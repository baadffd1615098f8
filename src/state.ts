/**
 * Session State Machine
 *
 * Tracks one generation session from planning to a terminal phase.
 * Enforces valid phase transitions and keeps the transition history and
 * the per-attempt records.
 */

import type { AttemptRecord, Session, SessionPhase, TargetLanguage } from './types.js';

// ============================================================================
// Valid Phase Transitions
// ============================================================================

const VALID_TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  planning: ['generating', 'aborted'],
  generating: ['validating', 'aborted'],
  validating: ['generating', 'succeeded', 'failed', 'aborted'], // can loop back
  succeeded: [], // terminal
  failed: [], // terminal
  aborted: [], // terminal
};

export function isTerminalPhase(phase: SessionPhase): boolean {
  return VALID_TRANSITIONS[phase].length === 0;
}

// ============================================================================
// Session Manager
// ============================================================================

export class SessionManager {
  private sessions: Map<string, Session> = new Map();

  createSession(request: string, language: TargetLanguage, maxAttempts: number): Session {
    const now = new Date();
    const session: Session = {
      id: crypto.randomUUID(),
      request,
      language,
      maxAttempts,
      phase: 'planning',
      attempts: [],
      history: [],
      success: false,
      created: now,
      updated: now,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /**
   * Move a session to a new phase
   */
  transition(
    sessionId: string,
    next: SessionPhase,
    reason?: string
  ): { success: boolean; error?: string } {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { success: false, error: 'Session not found' };
    }

    const validNext = VALID_TRANSITIONS[session.phase];
    if (!validNext.includes(next)) {
      return {
        success: false,
        error: `Invalid transition: ${session.phase} → ${next}. Valid: ${validNext.join(', ') || 'none'}`,
      };
    }

    session.history.push({
      from: session.phase,
      to: next,
      timestamp: new Date(),
      reason,
    });

    session.phase = next;
    session.success = next === 'succeeded';
    session.updated = new Date();

    return { success: true };
  }

  setPlan(sessionId: string, plan: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.plan = plan;
    session.updated = new Date();
    return true;
  }

  recordAttempt(sessionId: string, record: AttemptRecord): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.attempts.push(record);
    session.updated = new Date();
    return true;
  }

  /**
   * Session summary for logging/display
   */
  getSessionSummary(sessionId: string): string {
    const session = this.sessions.get(sessionId);
    if (!session) return 'Session not found';

    const lines = [
      `Session: ${session.id}`,
      `Phase: ${session.phase}`,
      `Language: ${session.language}`,
      `Attempts: ${session.attempts.length}/${session.maxAttempts}`,
    ];

    for (const attempt of session.attempts) {
      const files = attempt.artifactNames.length;
      lines.push(`  #${attempt.attempt}: ${attempt.category} (${files} file(s), ${attempt.durationMs}ms)`);
    }

    return lines.join('\n');
  }
}
