import cron from 'node-cron';
import { QuizReply } from '../types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { pendingWrites } from '../utils/metrics';
import { QuizEngine } from './quiz-engine';

export interface MaintenanceSchedule {
  reconcileIntervalMinutes: number;
  vocabularyRefreshMinutes: number;
}

export type Notify = (reply: QuizReply) => Promise<void>;

/**
 * Background jobs: inactivity sweep, write reconciliation and vocabulary
 * refresh. Each job is skipped while its previous run is still going.
 */
export class MaintenanceScheduler {
  private engine: QuizEngine;
  private notify: Notify;
  private schedule: MaintenanceSchedule;
  private running = new Set<string>();
  private tasks: cron.ScheduledTask[] = [];

  constructor(engine: QuizEngine, notify: Notify, schedule: MaintenanceSchedule) {
    this.engine = engine;
    this.notify = notify;
    this.schedule = schedule;
  }

  start(): void {
    this.tasks = [
      cron.schedule('* * * * *', () => this.runExclusive('sweep', () => this.sweep())),
      cron.schedule(`*/${this.schedule.reconcileIntervalMinutes} * * * *`, () =>
        this.runExclusive('reconcile', () => this.reconcile())),
      cron.schedule(`*/${this.schedule.vocabularyRefreshMinutes} * * * *`, () =>
        this.runExclusive('refresh', () => this.refresh()))
    ];

    logger.info('Maintenance jobs scheduled', {
      reconcileEveryMinutes: this.schedule.reconcileIntervalMinutes,
      refreshEveryMinutes: this.schedule.vocabularyRefreshMinutes
    });
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    logger.info('Maintenance jobs stopped');
  }

  /**
   * Close idle rounds and tell the learners. Returns how many were closed.
   */
  async sweep(): Promise<number> {
    const replies = await this.engine.expireInactive();
    for (const reply of replies) {
      await this.notify(reply);
    }
    if (replies.length > 0) {
      logger.info(`Closed ${replies.length} inactive rounds`);
    }
    return replies.length;
  }

  async reconcile(): Promise<void> {
    const report = await this.engine.reconcile();
    if (report.failed.length > 0) {
      logger.warn(`${report.failed.length} review records still unsaved after reconciliation`);
    }
  }

  async refresh(): Promise<void> {
    await this.engine.reloadVocabulary();
  }

  async runExclusive(name: string, job: () => Promise<unknown>): Promise<void> {
    if (this.running.has(name)) {
      logger.warn(`Job ${name} already in progress, skipping`);
      return;
    }

    this.running.add(name);
    try {
      await job();
    } catch (error) {
      logger.error(`Job ${name} failed`, { error: errorMessage(error) });
    } finally {
      this.running.delete(name);
      pendingWrites.set(this.engine.pendingWrites());
    }
  }
}
