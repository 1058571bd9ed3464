import {
  QuizSession,
  ReviewRecord,
  RoundEndReason,
  RoundSummary,
  SessionState,
  Verdict,
  VocabularyItem
} from '../types';
import { InvalidTransitionError, NoActiveSessionError, SessionTimeoutError } from '../utils/errors';
import { isCorrectAnswer, primaryForm } from './answer-matcher';

/**
 * Session State Machine
 *
 *   idle -> presenting -> awaitingAnswer -> presenting (next item)
 *                                        -> summarizing -> idle
 *
 * presenting / awaitingAnswer may also be forced to summarizing by
 * inactivity or by the learner abandoning the round.
 */

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  idle: ['presenting'],
  presenting: ['awaitingAnswer', 'summarizing'],
  awaitingAnswer: ['presenting', 'summarizing'],
  summarizing: ['idle']
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

function transition(session: QuizSession, to: SessionState, action: string): void {
  if (!canTransition(session.state, to)) {
    throw new InvalidTransitionError(session.state, action);
  }
  session.state = to;
}

function dedupe(queue: VocabularyItem[]): VocabularyItem[] {
  const seen = new Set<string>();
  return queue.filter(item => {
    if (seen.has(item.key)) return false;
    seen.add(item.key);
    return true;
  });
}

export function createIdleSession(learnerId: string, now: Date): QuizSession {
  return {
    learnerId,
    state: 'idle',
    queue: [],
    index: 0,
    options: [],
    correct: 0,
    incorrect: 0,
    missed: [],
    records: new Map<string, ReviewRecord>(),
    startedAt: now,
    lastActivityAt: now,
    degraded: false
  };
}

export function isActive(session: QuizSession | undefined): session is QuizSession {
  return session !== undefined && session.state !== 'idle';
}

export function currentItem(session: QuizSession): VocabularyItem | undefined {
  return session.queue[session.index];
}

/**
 * Begin a round with the given queue. Duplicate items are dropped.
 */
export function startRound(
  session: QuizSession,
  queue: VocabularyItem[],
  records: Map<string, ReviewRecord>,
  now: Date
): QuizSession {
  const items = dedupe(queue);
  if (items.length === 0) {
    throw new InvalidTransitionError(session.state, 'start an empty round');
  }
  transition(session, 'presenting', 'start a round');

  session.queue = items;
  session.index = 0;
  session.options = [];
  session.correct = 0;
  session.incorrect = 0;
  session.missed = [];
  session.records = records;
  session.startedAt = now;
  session.lastActivityAt = now;
  session.degraded = false;
  session.endReason = undefined;
  return session;
}

/**
 * The prompt for the current item has been sent
 */
export function markPresented(session: QuizSession, options: string[], now: Date): void {
  transition(session, 'awaitingAnswer', 'await an answer');
  session.options = options;
  session.lastActivityAt = now;
}

/**
 * Grade one answer and advance. Moves to presenting when items remain,
 * otherwise to summarizing.
 */
export function submitAnswer(session: QuizSession, text: string, now: Date): Verdict {
  if (session.state === 'idle') {
    throw new NoActiveSessionError(session.learnerId);
  }
  if (session.state !== 'awaitingAnswer') {
    throw new InvalidTransitionError(session.state, 'accept an answer');
  }

  const item = currentItem(session);
  if (!item) {
    throw new InvalidTransitionError(session.state, 'accept an answer past the end of the queue');
  }

  const correct = isCorrectAnswer(item, text);
  if (correct) {
    session.correct++;
  } else {
    session.incorrect++;
    session.missed.push(item.key);
  }

  session.index++;
  session.options = [];
  session.lastActivityAt = now;
  if (session.index < session.queue.length) {
    transition(session, 'presenting', 'present the next item');
  } else {
    session.endReason = 'completed';
    transition(session, 'summarizing', 'summarize');
  }

  return { item, correct, given: text, expected: primaryForm(item) };
}

/**
 * Resolve a multiple-choice index to its label
 */
export function optionLabel(session: QuizSession, index: number): string | undefined {
  if (session.state !== 'awaitingAnswer') {
    return undefined;
  }
  return Number.isInteger(index) && index >= 0 ? session.options[index] : undefined;
}

export function isExpired(session: QuizSession, now: Date, windowMs: number): boolean {
  return isActive(session) && now.getTime() - session.lastActivityAt.getTime() > windowMs;
}

/**
 * Force an inactive round to summarizing. Returns the timeout when the
 * window was exceeded, null otherwise.
 */
export function expire(session: QuizSession, now: Date, windowMs: number): SessionTimeoutError | null {
  if (!isExpired(session, now, windowMs) || session.state === 'summarizing') {
    return null;
  }
  const idleMs = now.getTime() - session.lastActivityAt.getTime();
  session.endReason = 'timed_out';
  transition(session, 'summarizing', 'time out');
  return new SessionTimeoutError(session.learnerId, idleMs);
}

export function abandon(session: QuizSession): void {
  if (session.state === 'idle') {
    throw new NoActiveSessionError(session.learnerId);
  }
  if (session.state === 'summarizing') {
    return;
  }
  session.endReason = 'abandoned';
  transition(session, 'summarizing', 'abandon');
}

/**
 * Emit the aggregate result and return to idle
 */
export function summarize(session: QuizSession): RoundSummary {
  if (session.state !== 'summarizing') {
    throw new InvalidTransitionError(session.state, 'summarize');
  }

  const reason: RoundEndReason = session.endReason ?? 'completed';
  const summary: RoundSummary = {
    learnerId: session.learnerId,
    correct: session.correct,
    incorrect: session.incorrect,
    answered: session.correct + session.incorrect,
    total: session.queue.length,
    missed: [...session.missed],
    degraded: session.degraded,
    reason
  };

  transition(session, 'idle', 'return to idle');
  session.queue = [];
  session.index = 0;
  session.options = [];
  return summary;
}
