import { RetryConfig } from '../config/environment';
import { MenuAction, QuizReply, QuizSession, ReviewRecord, VocabularyItem } from '../types';
import {
  InvalidTransitionError,
  NoActiveSessionError,
  StoreConflictError,
  StoreError,
  errorMessage
} from '../utils/errors';
import { logger } from '../utils/logger';
import { answersTotal, roundsTotal } from '../utils/metrics';
import { Sleep, backoffDelay, sleep, withStoreRetry } from '../utils/retry';
import { RandomSource, buildOptions } from './answer-matcher';
import * as reply from './reply-formatter';
import * as machine from './session-machine';
import { SessionRegistry } from './session-registry';
import {
  DEFAULT_POLICY,
  SchedulerPolicy,
  countDue,
  createReviewRecord,
  nextDueAt,
  recordOutcome,
  selectDue
} from './spaced-repetition';
import { FlushReport, VocabularyStore, WriteFailure } from './vocabulary-store';

export interface QuizEngineOptions {
  roundSize: number;
  inactivityWindowMs: number;
  retry: RetryConfig;
  policy?: SchedulerPolicy;
  clock?: () => Date;
  random?: RandomSource;
  sleep?: Sleep;
}

const MAIN_MENU: MenuAction[] = ['quiz', 'word'];

/**
 * Quiz Engine
 *
 * Runs quiz rounds for many learners. Each inbound message is applied as one
 * transition on the learner's session while holding that learner's lock;
 * answers are persisted immediately, and a store outage degrades the round
 * instead of ending it.
 */
export class QuizEngine {
  private store: VocabularyStore;
  private sessions: SessionRegistry;
  private options: Required<Omit<QuizEngineOptions, 'policy'>> & { policy: SchedulerPolicy };
  private vocabulary: VocabularyItem[] = [];

  constructor(store: VocabularyStore, sessions: SessionRegistry, options: QuizEngineOptions) {
    this.store = store;
    this.sessions = sessions;
    this.options = {
      roundSize: options.roundSize,
      inactivityWindowMs: options.inactivityWindowMs,
      retry: options.retry,
      policy: options.policy ?? DEFAULT_POLICY,
      clock: options.clock ?? (() => new Date()),
      random: options.random ?? Math.random,
      sleep: options.sleep ?? sleep
    };
  }

  /**
   * Initial vocabulary load. Errors propagate: a bot with no words cannot start.
   */
  async loadVocabulary(): Promise<number> {
    this.vocabulary = await withStoreRetry(
      'loadVocabulary',
      () => this.store.loadVocabulary(),
      this.options.retry,
      this.options.sleep
    );
    return this.vocabulary.length;
  }

  /**
   * Pick up out-of-band edits to the word list. Keeps the current list on failure.
   */
  async reloadVocabulary(): Promise<boolean> {
    try {
      const count = await this.loadVocabulary();
      logger.info(`Vocabulary refreshed (${count} items)`);
      return true;
    } catch (error) {
      if (!(error instanceof StoreError)) {
        throw error;
      }
      logger.warn('Vocabulary refresh failed, keeping previous list', { error: error.message });
      return false;
    }
  }

  isReady(): boolean {
    return this.vocabulary.length > 0;
  }

  vocabularySize(): number {
    return this.vocabulary.length;
  }

  pendingWrites(): number {
    return this.store.pendingCount();
  }

  activeRounds(): number {
    return this.sessions.size();
  }

  async startRound(learnerId: string): Promise<QuizReply> {
    return this.sessions.withLearner(learnerId, async () => {
      const now = this.options.clock();
      const parts: string[] = [];

      const existing = this.sessions.get(learnerId);
      if (machine.isActive(existing)) {
        machine.abandon(existing);
        parts.push(this.finish(existing));
      }

      if (this.vocabulary.length === 0) {
        return this.menuReply(learnerId, [...parts, reply.noWordsText()]);
      }

      await this.reconcile();

      let records: Map<string, ReviewRecord>;
      try {
        records = await withStoreRetry(
          'loadReviewRecords',
          () => this.store.loadReviewRecords(learnerId),
          this.options.retry,
          this.options.sleep
        );
      } catch (error) {
        if (!(error instanceof StoreError)) {
          throw error;
        }
        logger.warn(`Cannot start round for ${learnerId}: review records unavailable`, { error: error.message });
        return this.menuReply(learnerId, [...parts, reply.storeUnavailableText()]);
      }

      const queue = selectDue(this.vocabulary, records, now, this.options.roundSize);
      if (queue.length === 0) {
        return this.menuReply(learnerId, [...parts, reply.nothingDueText(nextDueAt(this.vocabulary, records))]);
      }

      const session = machine.startRound(machine.createIdleSession(learnerId, now), queue, records, now);
      this.sessions.set(session);
      logger.info(`Round started for ${learnerId}`, { items: queue.length });

      return this.present(session, parts, now);
    });
  }

  async submitAnswer(learnerId: string, text: string): Promise<QuizReply> {
    return this.sessions.withLearner(learnerId, () => this.answer(learnerId, () => text));
  }

  /**
   * Answer by multiple-choice index (an inline button)
   */
  async submitOption(learnerId: string, index: number): Promise<QuizReply> {
    return this.sessions.withLearner(learnerId, () => this.answer(learnerId, session => machine.optionLabel(session, index)));
  }

  async abandonRound(learnerId: string): Promise<QuizReply> {
    return this.sessions.withLearner(learnerId, async () => {
      const session = this.sessions.get(learnerId);
      if (!machine.isActive(session)) {
        return this.menuReply(learnerId, [reply.noActiveSessionText()]);
      }
      machine.abandon(session);
      return this.menuReply(learnerId, [this.finish(session)]);
    });
  }

  /**
   * Close every round idle for longer than the inactivity window.
   * Returns the partial summaries to push to those learners.
   */
  async expireInactive(): Promise<QuizReply[]> {
    const replies: QuizReply[] = [];

    for (const learnerId of this.sessions.learnerIds()) {
      const expired = await this.sessions.withLearner(learnerId, async () => {
        const session = this.sessions.get(learnerId);
        if (!session) {
          return null;
        }
        const timeout = machine.expire(session, this.options.clock(), this.options.inactivityWindowMs);
        if (!timeout) {
          return null;
        }
        logger.info(timeout.message);
        return this.menuReply(learnerId, [this.finish(session)]);
      });
      if (expired) {
        replies.push(expired);
      }
    }

    return replies;
  }

  randomWord(learnerId: string): QuizReply {
    if (this.vocabulary.length === 0) {
      return this.menuReply(learnerId, [reply.noWordsText()]);
    }
    const index = Math.min(
      this.vocabulary.length - 1,
      Math.floor(this.options.random() * this.vocabulary.length)
    );
    return this.menuReply(learnerId, [reply.wordCardText(this.vocabulary[index])]);
  }

  async stats(learnerId: string): Promise<QuizReply> {
    let records: Map<string, ReviewRecord>;
    try {
      records = await withStoreRetry(
        'loadReviewRecords',
        () => this.store.loadReviewRecords(learnerId),
        this.options.retry,
        this.options.sleep
      );
    } catch (error) {
      if (!(error instanceof StoreError)) {
        throw error;
      }
      return this.menuReply(learnerId, [reply.storeUnavailableText()]);
    }

    const known = new Set(this.vocabulary.map(item => item.key));
    let attempts = 0;
    let correct = 0;
    let itemsSeen = 0;
    for (const record of records.values()) {
      if (!known.has(record.itemKey)) continue;
      itemsSeen++;
      attempts += record.totalAttempts;
      correct += record.totalCorrect;
    }

    return this.menuReply(learnerId, [reply.statsText({
      itemsSeen,
      totalItems: known.size,
      attempts,
      correct,
      dueNow: countDue(this.vocabulary, records, this.options.clock()),
      nextDueAt: nextDueAt(this.vocabulary, records)
    })]);
  }

  /**
   * Write out records left buffered by degraded rounds
   */
  async reconcile(): Promise<FlushReport> {
    if (this.store.pendingCount() === 0) {
      return { written: [], failed: [] };
    }
    const report = await this.store.flush();

    for (const failure of report.failed) {
      if (failure.error instanceof StoreConflictError) {
        await this.requeueConflicted(failure);
      }
    }

    logger.info('Reconciliation pass finished', {
      written: report.written.length,
      failed: report.failed.length
    });
    return report;
  }

  /**
   * A buffered record met an external edit. The outcome that produced it is
   * gone, so the record is kept as is and written over the edited row.
   */
  private async requeueConflicted(failure: WriteFailure): Promise<void> {
    const { learnerId, itemKey, record } = failure;
    try {
      await this.store.loadReviewRecords(learnerId);
    } catch (error) {
      if (!(error instanceof StoreError)) {
        throw error;
      }
      logger.warn(`Reload after conflict failed for ${learnerId}`, { error: error.message });
    }
    if (!this.store.hasPending(learnerId, itemKey)) {
      await this.store.saveReviewRecord(learnerId, record);
    }
  }

  private async answer(
    learnerId: string,
    resolveText: (session: QuizSession) => string | undefined
  ): Promise<QuizReply> {
    const now = this.options.clock();
    const session = this.sessions.get(learnerId);

    try {
      if (!machine.isActive(session)) {
        throw new NoActiveSessionError(learnerId);
      }

      const timeout = machine.expire(session, now, this.options.inactivityWindowMs);
      if (timeout) {
        logger.info(timeout.message);
        return this.menuReply(learnerId, [this.finish(session)]);
      }

      const text = resolveText(session);
      if (text === undefined) {
        return { learnerId, text: reply.staleOptionText(), options: [...session.options] };
      }

      const verdict = machine.submitAnswer(session, text, now);
      answersTotal.inc({ verdict: verdict.correct ? 'correct' : 'incorrect' });

      const itemKey = verdict.item.key;
      const base = session.records.get(itemKey) ?? createReviewRecord(learnerId, itemKey, now, this.options.policy);
      const updated = recordOutcome(base, verdict.correct, now, this.options.policy);
      session.records.set(itemKey, updated);

      const saved = await this.persist(session, updated, verdict.correct, now);
      if (!saved) {
        session.degraded = true;
      }

      const parts = [reply.verdictText(verdict)];
      if (session.state === 'summarizing') {
        parts.push(this.finish(session));
        return this.menuReply(learnerId, parts);
      }
      return this.present(session, parts, now);
    } catch (error) {
      if (error instanceof NoActiveSessionError || error instanceof InvalidTransitionError) {
        logger.debug(`Rejected message from ${learnerId}: ${error.message}`);
        return this.menuReply(learnerId, [reply.noActiveSessionText()]);
      }
      throw error;
    }
  }

  /**
   * Save one record, retrying outages with backoff and recomputing on
   * conflicts. No write follows a conflict until a reload has succeeded.
   * Returns false once attempts are exhausted, leaving the record buffered.
   */
  private async persist(session: QuizSession, record: ReviewRecord, wasCorrect: boolean, now: Date): Promise<boolean> {
    const { learnerId } = session;
    const { itemKey } = record;
    const { retry, policy } = this.options;
    let candidate = record;
    let stale = false;

    for (let attempt = 0; attempt < retry.attempts; attempt++) {
      let failure: StoreError | undefined;

      if (stale) {
        try {
          const fresh = await this.store.loadReviewRecords(learnerId);
          const base = fresh.get(itemKey) ?? createReviewRecord(learnerId, itemKey, now, policy);
          candidate = recordOutcome(base, wasCorrect, now, policy);
          session.records.set(itemKey, candidate);
          stale = false;
        } catch (error) {
          if (!(error instanceof StoreError)) {
            throw error;
          }
          failure = error;
        }
      }

      if (!failure) {
        try {
          await this.store.saveReviewRecord(learnerId, candidate);
          const report = await this.store.flush();
          failure = report.failed.find(f => f.learnerId === learnerId && f.itemKey === itemKey)?.error;
        } catch (error) {
          if (!(error instanceof StoreError)) {
            throw error;
          }
          failure = error;
        }

        if (!failure) {
          return true;
        }
        if (failure instanceof StoreConflictError) {
          logger.warn(`Conflict saving ${learnerId}/${itemKey}, reloading`);
          stale = true;
          continue;
        }
      }

      if (attempt < retry.attempts - 1) {
        const delay = backoffDelay(attempt, retry);
        logger.warn(`Saving ${learnerId}/${itemKey} failed, retrying in ${delay}ms`, {
          attempt: attempt + 1,
          error: errorMessage(failure)
        });
        await this.options.sleep(delay);
      }
    }

    // Conflicted writes are not kept by the store, so buffer the latest value for reconcile()
    await this.store.saveReviewRecord(learnerId, candidate);
    logger.warn(`Saving ${learnerId}/${itemKey} failed after ${retry.attempts} attempts, round continues degraded`);
    return false;
  }

  private present(session: QuizSession, parts: string[], now: Date): QuizReply {
    const item = machine.currentItem(session);
    if (!item) {
      throw new InvalidTransitionError(session.state, 'present past the end of the queue');
    }

    if (!session.records.has(item.key)) {
      session.records.set(item.key, createReviewRecord(session.learnerId, item.key, now, this.options.policy));
    }

    const options = buildOptions(item, this.vocabulary, this.options.random);
    machine.markPresented(session, options, now);

    return {
      learnerId: session.learnerId,
      text: [...parts, reply.promptText(item, session.index + 1, session.queue.length)].join('\n\n'),
      options
    };
  }

  private finish(session: QuizSession): string {
    const summary = machine.summarize(session);
    roundsTotal.inc({ outcome: summary.reason });
    this.sessions.delete(session.learnerId);
    logger.info(`Round ${summary.reason} for ${session.learnerId}`, {
      correct: summary.correct,
      incorrect: summary.incorrect,
      degraded: summary.degraded
    });
    return reply.summaryText(summary);
  }

  private menuReply(learnerId: string, parts: string[]): QuizReply {
    return { learnerId, text: parts.join('\n\n'), menu: [...MAIN_MENU] };
  }
}
