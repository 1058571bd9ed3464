import { QuizSession } from '../types';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { activeSessions } from '../utils/metrics';

/**
 * In-memory map of learner -> quiz session, plus the per-learner lock that
 * serialises every message from one learner. Sessions are ephemeral and are
 * not persisted across restarts.
 */
export class SessionRegistry {
  private sessions = new Map<string, QuizSession>();
  private lock = new KeyedLock();

  get(learnerId: string): QuizSession | undefined {
    return this.sessions.get(learnerId);
  }

  set(session: QuizSession): void {
    this.sessions.set(session.learnerId, session);
    activeSessions.set(this.sessions.size);
    logger.debug(`Session for ${session.learnerId} stored`, { state: session.state });
  }

  delete(learnerId: string): void {
    if (this.sessions.delete(learnerId)) {
      activeSessions.set(this.sessions.size);
      logger.debug(`Session for ${learnerId} removed`);
    }
  }

  learnerIds(): string[] {
    return [...this.sessions.keys()];
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Run `task` with exclusive access to one learner's session
   */
  withLearner<T>(learnerId: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(learnerId, task);
  }
}
