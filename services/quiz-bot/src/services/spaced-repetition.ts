import { ReviewRecord, VocabularyItem } from '../types';

/**
 * Scheduling constants. Intervals are in milliseconds.
 */
export interface SchedulerPolicy {
  minIntervalMs: number;
  maxIntervalMs: number;
  initialEase: number;
  minEase: number;
  maxEase: number;
  easeBonus: number;      // added after a correct answer
  easePenalty: number;    // subtracted after a wrong answer
}

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

export const DEFAULT_POLICY: SchedulerPolicy = {
  minIntervalMs: 10 * MINUTE,
  maxIntervalMs: 180 * DAY,
  initialEase: 2.5,
  minEase: 1.3,
  maxEase: 3.0,
  easeBonus: 0.1,
  easePenalty: 0.2
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// Ease is kept to 2 decimals so repeated +/- steps do not accumulate float drift
function roundEase(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Fresh record for an item presented to a learner for the first time
 */
export function createReviewRecord(
  learnerId: string,
  itemKey: string,
  now: Date,
  policy: SchedulerPolicy = DEFAULT_POLICY
): ReviewRecord {
  return {
    learnerId,
    itemKey,
    lastReviewedAt: new Date(now.getTime()),
    nextDueAt: new Date(now.getTime()),
    intervalMs: 0,
    consecutiveCorrect: 0,
    easeFactor: policy.initialEase,
    totalAttempts: 0,
    totalCorrect: 0
  };
}

/**
 * Apply one answer to a record. Pure: the input record is not modified.
 */
export function recordOutcome(
  record: ReviewRecord,
  wasCorrect: boolean,
  now: Date,
  policy: SchedulerPolicy = DEFAULT_POLICY
): ReviewRecord {
  const currentEase = clamp(
    Number.isFinite(record.easeFactor) ? record.easeFactor : policy.initialEase,
    policy.minEase,
    policy.maxEase
  );
  const previousInterval = Number.isFinite(record.intervalMs) ? Math.max(0, record.intervalMs) : 0;

  let easeFactor: number;
  let intervalMs: number;
  let consecutiveCorrect: number;

  if (wasCorrect) {
    easeFactor = clamp(roundEase(currentEase + policy.easeBonus), policy.minEase, policy.maxEase);
    intervalMs = Math.max(policy.minIntervalMs, Math.round(previousInterval * easeFactor));
    intervalMs = Math.min(intervalMs, policy.maxIntervalMs);
    consecutiveCorrect = record.consecutiveCorrect + 1;
  } else {
    easeFactor = clamp(roundEase(currentEase - policy.easePenalty), policy.minEase, policy.maxEase);
    intervalMs = policy.minIntervalMs;
    consecutiveCorrect = 0;
  }

  return {
    learnerId: record.learnerId,
    itemKey: record.itemKey,
    lastReviewedAt: new Date(now.getTime()),
    nextDueAt: new Date(now.getTime() + intervalMs),
    intervalMs,
    consecutiveCorrect,
    easeFactor,
    totalAttempts: record.totalAttempts + 1,
    totalCorrect: record.totalCorrect + (wasCorrect ? 1 : 0)
  };
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isDue(record: ReviewRecord | undefined, now: Date): boolean {
  return !record || record.nextDueAt.getTime() <= now.getTime();
}

/**
 * Items due for review: never-reviewed items first (by key), then by
 * ascending next-due time with key as tie-break, capped at `limit`
 */
export function selectDue(
  allItems: VocabularyItem[],
  records: Map<string, ReviewRecord>,
  now: Date,
  limit: number
): VocabularyItem[] {
  if (limit <= 0) {
    return [];
  }

  const seen = new Set<string>();
  const fresh: VocabularyItem[] = [];
  const due: Array<{ item: VocabularyItem; dueAt: number }> = [];

  for (const item of allItems) {
    if (seen.has(item.key)) {
      continue;
    }
    seen.add(item.key);

    const record = records.get(item.key);
    if (!record) {
      fresh.push(item);
    } else if (isDue(record, now)) {
      due.push({ item, dueAt: record.nextDueAt.getTime() });
    }
  }

  fresh.sort((a, b) => compareKeys(a.key, b.key));
  due.sort((a, b) => a.dueAt - b.dueAt || compareKeys(a.item.key, b.item.key));

  return [...fresh, ...due.map(entry => entry.item)].slice(0, limit);
}

export function countDue(allItems: VocabularyItem[], records: Map<string, ReviewRecord>, now: Date): number {
  const keys = new Set(allItems.map(item => item.key));
  let count = 0;
  for (const key of keys) {
    if (isDue(records.get(key), now)) {
      count++;
    }
  }
  return count;
}

/**
 * Earliest upcoming due time among reviewed items, if any
 */
export function nextDueAt(allItems: VocabularyItem[], records: Map<string, ReviewRecord>): Date | null {
  let earliest: number | null = null;
  for (const item of allItems) {
    const record = records.get(item.key);
    if (record && (earliest === null || record.nextDueAt.getTime() < earliest)) {
      earliest = record.nextDueAt.getTime();
    }
  }
  return earliest === null ? null : new Date(earliest);
}
