import {
  SheetsVocabularyStore,
  formatProgressRow,
  parseProgressRow,
  parseVocabularyRow
} from '../../src/services/vocabulary-store';
import { ReviewRecord } from '../../src/types';
import { StoreConflictError, StoreFormatError, StoreUnavailableError } from '../../src/utils/errors';
import { PROGRESS_HEADER, SHEETS, WORDS_HEADER, WORD_ROWS } from '../helpers/fixtures';
import { InMemorySheetsClient } from '../helpers/in-memory-sheets';

const now = new Date('2026-03-01T10:00:00.000Z');

function review(learnerId: string, itemKey: string, overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return {
    learnerId,
    itemKey,
    lastReviewedAt: new Date('2026-03-01T09:00:00.000Z'),
    nextDueAt: new Date('2026-03-01T09:10:00.000Z'),
    intervalMs: 600000,
    consecutiveCorrect: 1,
    easeFactor: 2.6,
    totalAttempts: 1,
    totalCorrect: 1,
    ...overrides
  };
}

describe('SheetsVocabularyStore', () => {
  let sheets: InMemorySheetsClient;
  let store: SheetsVocabularyStore;

  beforeEach(() => {
    sheets = new InMemorySheetsClient();
    sheets.setSheet('Words', [WORDS_HEADER, ...WORD_ROWS]);
    sheets.setSheet('Progress', [PROGRESS_HEADER]);
    store = new SheetsVocabularyStore(sheets, SHEETS, () => now);
  });

  describe('loadVocabulary', () => {
    it('maps rows to vocabulary items', async () => {
      const items = await store.loadVocabulary();

      expect(items).toHaveLength(5);
      expect(items[0]).toEqual({
        key: 'der Apfel',
        translation: 'яблуко',
        english: 'apple',
        example: 'Der Apfel ist rot.',
        mnemonic: 'Apfel sounds like apple',
        tags: ['food']
      });
      expect(items[3]).toEqual({
        key: 'der Hund',
        translation: 'собака',
        english: 'dog',
        example: undefined,
        mnemonic: undefined,
        tags: ['animals']
      });
      expect(store.lastLoadWarnings).toEqual([]);
    });

    it('skips malformed and duplicate rows with warnings', async () => {
      sheets.setSheet('Words', [
        WORDS_HEADER,
        ['der Tisch', 'стіл'],
        ['', 'порожньо'],
        ['der Stuhl', ''],
        [],
        ['der Tisch', 'стіл ще раз']
      ]);

      const items = await store.loadVocabulary();

      expect(items.map(i => i.key)).toEqual(['der Tisch']);
      expect(store.lastLoadWarnings.map(w => w.row)).toEqual([3, 4, 6]);
      expect(store.lastLoadWarnings.every(w => w instanceof StoreFormatError)).toBe(true);
    });

    it('fails when no usable rows remain', async () => {
      sheets.setSheet('Words', [WORDS_HEADER, ['', 'без ключа']]);

      await expect(store.loadVocabulary()).rejects.toThrow(StoreFormatError);
    });

    it('reports an unreachable spreadsheet as StoreUnavailableError', async () => {
      sheets.failNext('readRange');

      await expect(store.loadVocabulary()).rejects.toThrow(StoreUnavailableError);
    });
  });

  describe('loadReviewRecords', () => {
    it('returns only the requested learner, skipping malformed rows', async () => {
      sheets.setSheet('Progress', [
        PROGRESS_HEADER,
        formatProgressRow(review('learner-1', 'das Buch'), 2, now),
        formatProgressRow(review('learner-2', 'das Buch'), 1, now),
        ['learner-1', 'der Hund', 'not a date'],
        formatProgressRow(review('learner-1', 'der Apfel', { totalAttempts: 4 }), 1, now)
      ]);

      const records = await store.loadReviewRecords('learner-1');

      expect([...records.keys()]).toEqual(['das Buch', 'der Apfel']);
      expect(records.get('der Apfel')?.totalAttempts).toBe(4);
      expect(records.get('das Buch')?.nextDueAt).toEqual(new Date('2026-03-01T09:10:00.000Z'));
    });

    it('keeps the highest version when a key appears twice', async () => {
      sheets.setSheet('Progress', [
        PROGRESS_HEADER,
        formatProgressRow(review('learner-1', 'das Buch', { totalAttempts: 7 }), 3, now),
        formatProgressRow(review('learner-1', 'das Buch', { totalAttempts: 2 }), 1, now)
      ]);

      const records = await store.loadReviewRecords('learner-1');

      expect(records.get('das Buch')?.totalAttempts).toBe(7);
    });

    it('treats a learner without rows as never reviewed', async () => {
      const records = await store.loadReviewRecords('nobody');

      expect(records.size).toBe(0);
    });
  });

  describe('saveReviewRecord and flush', () => {
    it('appends new records in one call and updates them in place afterwards', async () => {
      await store.loadReviewRecords('learner-1');
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch'));
      await store.saveReviewRecord('learner-1', review('learner-1', 'der Hund'));

      const first = await store.flush();
      expect(first.written).toHaveLength(2);
      expect(first.failed).toEqual([]);
      expect(sheets.calls.filter(c => c === 'append')).toHaveLength(1);

      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch', { totalAttempts: 2 }));
      const second = await store.flush();
      expect(second.failed).toEqual([]);

      const rows = sheets.rows('Progress');
      expect(rows).toHaveLength(3);
      expect(rows[1]).toEqual(formatProgressRow(review('learner-1', 'das Buch', { totalAttempts: 2 }), 2, now));
      expect(rows[2][1]).toBe('der Hund');
    });

    it('yields the same state when the same record is saved twice', async () => {
      const record = review('learner-1', 'das Buch');
      await store.saveReviewRecord('learner-1', record);
      await store.saveReviewRecord('learner-1', record);
      await store.flush();

      const records = await store.loadReviewRecords('learner-1');
      expect(records.get('das Buch')).toEqual(record);
      expect(sheets.rows('Progress')).toHaveLength(2);
    });

    it('detects a row version changed by someone else', async () => {
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch'));
      await store.flush();

      // Version column (J) bumped by a manual edit
      sheets.setCell('Progress', 2, 9, '7');

      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch', { totalAttempts: 2 }));
      const report = await store.flush();

      expect(report.written).toEqual([]);
      expect(report.failed).toHaveLength(1);
      expect(report.failed[0].error).toBeInstanceOf(StoreConflictError);
      expect(sheets.rows('Progress')[1][7]).toBe('1');
      expect(store.pendingCount()).toBe(0);
    });

    it('keeps conflicting instead of appending until the rows are reloaded', async () => {
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch'));
      await store.flush();
      sheets.setCell('Progress', 2, 9, '7');

      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch', { totalAttempts: 2 }));
      await store.flush();
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch', { totalAttempts: 2 }));
      const retried = await store.flush();

      expect(retried.failed[0].error).toBeInstanceOf(StoreConflictError);
      expect(retried.failed[0].record.totalAttempts).toBe(2);
      expect(sheets.rows('Progress')).toHaveLength(2);
      expect(sheets.calls.filter(c => c === 'append')).toHaveLength(1);

      await store.loadReviewRecords('learner-1');
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch', { totalAttempts: 2 }));
      const reloaded = await store.flush();

      expect(reloaded.failed).toEqual([]);
      expect(sheets.rows('Progress')[1][9]).toBe('8');
    });

    it('detects a row that now holds a different item', async () => {
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch'));
      await store.flush();

      sheets.setCell('Progress', 2, 1, 'der Apfel');

      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch'));
      const report = await store.flush();

      expect(report.failed[0].error).toBeInstanceOf(StoreConflictError);
    });

    it('keeps failed writes buffered until a later flush succeeds', async () => {
      sheets.failNext('append');
      await store.saveReviewRecord('learner-1', review('learner-1', 'das Buch'));

      const failed = await store.flush();
      expect(failed.failed).toHaveLength(1);
      expect(failed.failed[0].error).toBeInstanceOf(StoreUnavailableError);
      expect(store.pendingCount()).toBe(1);

      const retried = await store.flush();
      expect(retried.written).toEqual([{ learnerId: 'learner-1', itemKey: 'das Buch' }]);
      expect(store.pendingCount()).toBe(0);
      expect(sheets.rows('Progress')).toHaveLength(2);
    });

    it('includes buffered records when loading a learner', async () => {
      sheets.failAlways('append');
      const buffered = review('learner-1', 'das Buch', { totalAttempts: 3 });
      await store.saveReviewRecord('learner-1', buffered);
      await store.saveReviewRecord('learner-2', review('learner-2', 'der Hund'));
      await store.flush();

      const records = await store.loadReviewRecords('learner-1');

      expect(store.hasPending('learner-1', 'das Buch')).toBe(true);
      expect([...records.keys()]).toEqual(['das Buch']);
      expect(records.get('das Buch')).toEqual(buffered);
    });

    it('refuses a record saved under another learner', async () => {
      await expect(store.saveReviewRecord('learner-2', review('learner-1', 'das Buch')))
        .rejects.toThrow(StoreFormatError);
    });
  });

  describe('row parsing', () => {
    it('requires a key and a translation', () => {
      expect(() => parseVocabularyRow(['', 'x'], 2)).toThrow('Row 2: missing German term');
      expect(() => parseVocabularyRow(['das Buch'], 3)).toThrow('Row 3: missing translation for "das Buch"');
    });

    it('round-trips a progress row', () => {
      const record = review('learner-1', 'das Buch');
      const parsed = parseProgressRow(formatProgressRow(record, 4, now), 2);

      expect(parsed).toEqual({ record, version: 4 });
    });

    it('lifts a hand-edited next-due that precedes the last review', () => {
      const row = formatProgressRow(review('learner-1', 'das Buch', {
        nextDueAt: new Date('2026-03-01T08:00:00.000Z')
      }), 1, now);

      const { record } = parseProgressRow(row, 2);

      expect(record.nextDueAt).toEqual(record.lastReviewedAt);
    });
  });
});
