/**
 * Domain types shared by the store adapter, scheduler, session machine and engine.
 */

export interface VocabularyItem {
  key: string;            // German term, unique
  translation: string;    // Ukrainian; may list alternates separated by ; / |
  english?: string;
  example?: string;
  mnemonic?: string;
  tags: string[];
}

export interface ReviewRecord {
  learnerId: string;
  itemKey: string;

  lastReviewedAt: Date;
  nextDueAt: Date;
  intervalMs: number;     // last scheduled interval

  consecutiveCorrect: number;
  easeFactor: number;
  totalAttempts: number;
  totalCorrect: number;
}

export type SessionState = 'idle' | 'presenting' | 'awaitingAnswer' | 'summarizing';

export type RoundEndReason = 'completed' | 'abandoned' | 'timed_out';

export interface QuizSession {
  learnerId: string;
  state: SessionState;

  queue: VocabularyItem[];
  index: number;
  options: string[];      // multiple-choice labels for the current prompt

  correct: number;
  incorrect: number;
  missed: string[];       // item keys to revisit

  records: Map<string, ReviewRecord>;

  startedAt: Date;
  lastActivityAt: Date;
  degraded: boolean;
  endReason?: RoundEndReason;
}

export interface Verdict {
  item: VocabularyItem;
  correct: boolean;
  given: string;
  expected: string;
}

export interface RoundSummary {
  learnerId: string;
  correct: number;
  incorrect: number;
  answered: number;
  total: number;
  missed: string[];
  degraded: boolean;
  reason: RoundEndReason;
}

export type MenuAction = 'quiz' | 'word';

/**
 * Outbound message produced by the engine. The gateway decides how options
 * and menu entries are rendered (inline keyboards for Telegram).
 */
export interface QuizReply {
  learnerId: string;
  text: string;
  options?: string[];
  menu?: MenuAction[];
}

export interface InboundMessage {
  learnerId: string;
  text: string;
}
