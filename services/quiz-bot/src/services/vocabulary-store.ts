import { Cells, SheetsClient } from '../clients/sheets';
import { ReviewRecord, VocabularyItem } from '../types';
import {
  StoreConflictError,
  StoreError,
  StoreFormatError,
  StoreUnavailableError,
  errorMessage
} from '../utils/errors';
import { rowRange, rowsRange } from '../utils/a1-notation';
import { logger } from '../utils/logger';
import { pendingWrites, storeOperationsTotal } from '../utils/metrics';

/**
 * Persistence contract the quiz engine depends on
 */
export interface VocabularyStore {
  loadVocabulary(): Promise<VocabularyItem[]>;
  loadReviewRecords(learnerId: string): Promise<Map<string, ReviewRecord>>;
  saveReviewRecord(learnerId: string, record: ReviewRecord): Promise<void>;
  flush(): Promise<FlushReport>;
  pendingCount(): number;
  hasPending(learnerId: string, itemKey: string): boolean;
}

export interface WriteFailure {
  learnerId: string;
  itemKey: string;
  record: ReviewRecord;
  error: StoreError;
}

export interface FlushReport {
  written: Array<{ learnerId: string; itemKey: string }>;
  failed: WriteFailure[];
}

export interface SheetNames {
  vocabulary: string;
  progress: string;
}

// Words: German | Ukrainian | English | Example | Mnemonic | Tags
const VOCABULARY_WIDTH = 6;
// Progress: Learner | Item | LastReviewed | NextDue | IntervalMs | Streak | Ease | Attempts | Correct | Version | UpdatedAt
const PROGRESS_WIDTH = 11;
const FIRST_DATA_ROW = 2;

interface RowLocation {
  row: number;
  version: number;
}

interface PendingWrite {
  key: string;
  learnerId: string;
  record: ReviewRecord;
}

type WriteOutcome =
  | { key: string; learnerId: string; record: ReviewRecord; ok: true }
  | { key: string; learnerId: string; record: ReviewRecord; ok: false; error: StoreError };

interface InFlightWrite {
  record: ReviewRecord;
  outcome: Promise<WriteOutcome>;
}

function recordKey(learnerId: string, itemKey: string): string {
  return `${learnerId}\u0000${itemKey}`;
}

function cell(row: string[], index: number): string {
  return (row[index] ?? '').toString().trim();
}

function optional(value: string): string | undefined {
  return value.length > 0 ? value : undefined;
}

function parseNumber(value: string): number | null {
  if (value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function parseDate(value: string): Date | null {
  if (value === '') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Turn a Words row into an item. `rowNumber` is the sheet row (1-based).
 */
export function parseVocabularyRow(row: string[], rowNumber: number): VocabularyItem {
  const key = cell(row, 0);
  const translation = cell(row, 1);
  if (!key) {
    throw new StoreFormatError(`Row ${rowNumber}: missing German term`, rowNumber);
  }
  if (!translation) {
    throw new StoreFormatError(`Row ${rowNumber}: missing translation for "${key}"`, rowNumber);
  }

  return {
    key,
    translation,
    english: optional(cell(row, 2)),
    example: optional(cell(row, 3)),
    mnemonic: optional(cell(row, 4)),
    tags: cell(row, 5)
      .split(',')
      .map(tag => tag.trim())
      .filter(tag => tag.length > 0)
  };
}

export function parseProgressRow(row: string[], rowNumber: number): { record: ReviewRecord; version: number } {
  const learnerId = cell(row, 0);
  const itemKey = cell(row, 1);
  if (!learnerId || !itemKey) {
    throw new StoreFormatError(`Progress row ${rowNumber}: missing learner or item`, rowNumber);
  }

  const lastReviewedAt = parseDate(cell(row, 2));
  const nextDueAt = parseDate(cell(row, 3));
  const intervalMs = parseNumber(cell(row, 4));
  const consecutiveCorrect = parseNumber(cell(row, 5));
  const easeFactor = parseNumber(cell(row, 6));
  const totalAttempts = parseNumber(cell(row, 7));
  const totalCorrect = parseNumber(cell(row, 8));
  const version = parseNumber(cell(row, 9)) ?? 0;

  if (
    !lastReviewedAt || !nextDueAt || intervalMs === null || consecutiveCorrect === null ||
    easeFactor === null || totalAttempts === null || totalCorrect === null
  ) {
    throw new StoreFormatError(`Progress row ${rowNumber}: malformed values for ${learnerId}/${itemKey}`, rowNumber);
  }

  return {
    record: {
      learnerId,
      itemKey,
      lastReviewedAt,
      // A hand-edited row may put next-due before last-reviewed
      nextDueAt: nextDueAt.getTime() < lastReviewedAt.getTime() ? lastReviewedAt : nextDueAt,
      intervalMs,
      consecutiveCorrect,
      easeFactor,
      totalAttempts,
      totalCorrect
    },
    version
  };
}

export function formatProgressRow(record: ReviewRecord, version: number, updatedAt: Date): string[] {
  return [
    record.learnerId,
    record.itemKey,
    record.lastReviewedAt.toISOString(),
    record.nextDueAt.toISOString(),
    String(record.intervalMs),
    String(record.consecutiveCorrect),
    String(record.easeFactor),
    String(record.totalAttempts),
    String(record.totalCorrect),
    String(version),
    updatedAt.toISOString()
  ];
}

/**
 * Vocabulary Store Adapter backed by two sheets of one spreadsheet.
 *
 * Review records are upserted through an in-memory buffer that flush()
 * applies in as few API calls as possible: one batched read to check row
 * versions, one batched write for existing rows and one append for new rows.
 */
export class SheetsVocabularyStore implements VocabularyStore {
  private client: SheetsClient;
  private sheets: SheetNames;
  private clock: () => Date;

  private rowIndex = new Map<string, RowLocation>();
  private pending = new Map<string, PendingWrite>();
  private inFlight = new Map<string, InFlightWrite>();

  /** Rows skipped by the last loadVocabulary() call */
  lastLoadWarnings: StoreFormatError[] = [];

  constructor(client: SheetsClient, sheets: SheetNames, clock: () => Date = () => new Date()) {
    this.client = client;
    this.sheets = sheets;
    this.clock = clock;
  }

  async loadVocabulary(): Promise<VocabularyItem[]> {
    const rows = await this.read('loadVocabulary', rowsRange(this.sheets.vocabulary, VOCABULARY_WIDTH, FIRST_DATA_ROW));

    const items: VocabularyItem[] = [];
    const seen = new Set<string>();
    const warnings: StoreFormatError[] = [];

    rows.forEach((row, i) => {
      const rowNumber = FIRST_DATA_ROW + i;
      if (row.every(value => value.trim() === '')) {
        return;
      }
      try {
        const item = parseVocabularyRow(row, rowNumber);
        if (seen.has(item.key)) {
          throw new StoreFormatError(`Row ${rowNumber}: duplicate term "${item.key}"`, rowNumber);
        }
        seen.add(item.key);
        items.push(item);
      } catch (error) {
        if (!(error instanceof StoreFormatError)) {
          throw error;
        }
        warnings.push(error);
        logger.warn(`Skipping vocabulary row: ${error.message}`);
      }
    });

    this.lastLoadWarnings = warnings;

    if (items.length === 0) {
      throw new StoreFormatError(
        `Sheet "${this.sheets.vocabulary}" has no usable vocabulary rows (${warnings.length} skipped)`
      );
    }

    logger.info(`Loaded ${items.length} vocabulary items`, { skipped: warnings.length });
    return items;
  }

  async loadReviewRecords(learnerId: string): Promise<Map<string, ReviewRecord>> {
    const rows = await this.read('loadReviewRecords', rowsRange(this.sheets.progress, PROGRESS_WIDTH, FIRST_DATA_ROW));

    const index = new Map<string, RowLocation>();
    const records = new Map<string, ReviewRecord>();

    rows.forEach((row, i) => {
      const rowNumber = FIRST_DATA_ROW + i;
      if (row.every(value => value.trim() === '')) {
        return;
      }

      let parsed: { record: ReviewRecord; version: number };
      try {
        parsed = parseProgressRow(row, rowNumber);
      } catch (error) {
        if (!(error instanceof StoreFormatError)) {
          throw error;
        }
        logger.warn(`Skipping progress row: ${error.message}`);
        return;
      }

      const { record, version } = parsed;
      const key = recordKey(record.learnerId, record.itemKey);
      const existing = index.get(key);
      // Duplicate rows: highest version wins, later row on a tie
      if (existing && existing.version > version) {
        logger.warn(`Duplicate progress row ${rowNumber} for ${record.learnerId}/${record.itemKey} ignored`);
        return;
      }
      if (existing) {
        logger.warn(`Duplicate progress row ${existing.row} for ${record.learnerId}/${record.itemKey} superseded`);
      }

      index.set(key, { row: rowNumber, version });
      if (record.learnerId === learnerId) {
        records.set(record.itemKey, record);
      }
    });

    this.rowIndex = index;

    // Writes not yet on the sheet are newer than what it holds
    for (const write of this.inFlight.values()) {
      if (write.record.learnerId === learnerId) {
        records.set(write.record.itemKey, write.record);
      }
    }
    for (const entry of this.pending.values()) {
      if (entry.learnerId === learnerId) {
        records.set(entry.record.itemKey, entry.record);
      }
    }
    return records;
  }

  async saveReviewRecord(learnerId: string, record: ReviewRecord): Promise<void> {
    if (record.learnerId !== learnerId) {
      throw new StoreFormatError(`Record belongs to ${record.learnerId}, not ${learnerId}`);
    }
    const key = recordKey(learnerId, record.itemKey);
    this.pending.set(key, { key, learnerId, record });
    pendingWrites.set(this.pending.size);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  hasPending(learnerId: string, itemKey: string): boolean {
    return this.pending.has(recordKey(learnerId, itemKey));
  }

  /**
   * Apply every buffered write. The report also includes writes another
   * flush() already had in flight, so callers always learn the fate of
   * the records they saved.
   */
  async flush(): Promise<FlushReport> {
    const batch = [...this.pending.values()];
    this.pending.clear();
    pendingWrites.set(0);

    const batchKeys = new Set(batch.map(entry => entry.key));
    const others = [...this.inFlight.entries()]
      .filter(([key]) => !batchKeys.has(key))
      .map(([, write]) => write.outcome);

    const own = this.writeBatch(batch);
    const claimed = new Map<string, Promise<WriteOutcome>>();
    for (const entry of batch) {
      const outcome = own.then(outcomes => {
        const found = outcomes.find(o => o.key === entry.key);
        if (!found) {
          throw new Error(`No outcome recorded for ${entry.key}`);
        }
        return found;
      });
      // A rejection here is reported through `own` below
      outcome.catch(() => undefined);
      claimed.set(entry.key, outcome);
      this.inFlight.set(entry.key, { record: entry.record, outcome });
    }

    let ownOutcomes: WriteOutcome[];
    try {
      ownOutcomes = await own;
    } finally {
      for (const [key, outcome] of claimed) {
        if (this.inFlight.get(key)?.outcome === outcome) {
          this.inFlight.delete(key);
        }
      }
    }

    const outcomes = [...ownOutcomes, ...(await Promise.all(others))];

    const report: FlushReport = { written: [], failed: [] };
    for (const outcome of outcomes) {
      const itemKey = outcome.record.itemKey;
      if (outcome.ok) {
        report.written.push({ learnerId: outcome.learnerId, itemKey });
      } else {
        report.failed.push({ learnerId: outcome.learnerId, itemKey, record: outcome.record, error: outcome.error });
      }
    }
    return report;
  }

  private async writeBatch(batch: PendingWrite[]): Promise<WriteOutcome[]> {
    if (batch.length === 0) {
      return [];
    }

    const known = batch.filter(entry => this.rowIndex.has(entry.key));
    const fresh = batch.filter(entry => !this.rowIndex.has(entry.key));

    const outcomes = [
      ...(await this.updateExisting(known)),
      ...(await this.appendNew(fresh))
    ];

    logger.debug(`Flushed ${batch.length} review records`, {
      failed: outcomes.filter(o => !o.ok).length
    });
    return outcomes;
  }

  private async updateExisting(entries: PendingWrite[]): Promise<WriteOutcome[]> {
    if (entries.length === 0) {
      return [];
    }

    const locations = new Map<string, RowLocation>();
    for (const entry of entries) {
      const location = this.rowIndex.get(entry.key);
      if (location) {
        locations.set(entry.key, location);
      }
    }

    let current: Cells[];
    try {
      current = await this.client.batchRead(
        entries.map(entry => rowRange(this.sheets.progress, PROGRESS_WIDTH, this.locationOf(locations, entry).row))
      );
      storeOperationsTotal.inc({ operation: 'verify', status: 'success' });
    } catch (error) {
      storeOperationsTotal.inc({ operation: 'verify', status: 'error' });
      return entries.map(entry => this.unavailable(entry, error));
    }

    const outcomes: WriteOutcome[] = [];
    const writable: PendingWrite[] = [];

    entries.forEach((entry, i) => {
      const location = this.locationOf(locations, entry);
      const row = current[i]?.[0] ?? [];
      const sameRow = cell(row, 0) === entry.learnerId && cell(row, 1) === entry.record.itemKey;
      const version = parseNumber(cell(row, 9)) ?? 0;

      if (!sameRow || version !== location.version) {
        // The location stays indexed: until a reload refreshes it, retries
        // conflict again rather than appending a second row for the key
        const error = new StoreConflictError(entry.learnerId, entry.record.itemKey);
        logger.warn(error.message, { row: location.row, expectedVersion: location.version, foundVersion: version });
        outcomes.push({ key: entry.key, learnerId: entry.learnerId, record: entry.record, ok: false, error });
      } else {
        writable.push(entry);
      }
    });

    if (writable.length === 0) {
      return outcomes;
    }

    const now = this.clock();
    try {
      await this.client.batchWrite(writable.map(entry => {
        const location = this.locationOf(locations, entry);
        return {
          range: rowRange(this.sheets.progress, PROGRESS_WIDTH, location.row),
          values: [formatProgressRow(entry.record, location.version + 1, now)]
        };
      }));
      storeOperationsTotal.inc({ operation: 'update', status: 'success' });
    } catch (error) {
      storeOperationsTotal.inc({ operation: 'update', status: 'error' });
      return [...outcomes, ...writable.map(entry => this.unavailable(entry, error))];
    }

    for (const entry of writable) {
      const location = this.locationOf(locations, entry);
      this.rowIndex.set(entry.key, { row: location.row, version: location.version + 1 });
      outcomes.push({ key: entry.key, learnerId: entry.learnerId, record: entry.record, ok: true });
    }
    return outcomes;
  }

  private async appendNew(entries: PendingWrite[]): Promise<WriteOutcome[]> {
    if (entries.length === 0) {
      return [];
    }

    const now = this.clock();
    let firstRow: number;
    try {
      firstRow = await this.client.append(
        rowsRange(this.sheets.progress, PROGRESS_WIDTH),
        entries.map(entry => formatProgressRow(entry.record, 1, now))
      );
      storeOperationsTotal.inc({ operation: 'append', status: 'success' });
    } catch (error) {
      storeOperationsTotal.inc({ operation: 'append', status: 'error' });
      return entries.map(entry => this.unavailable(entry, error));
    }

    return entries.map((entry, i) => {
      this.rowIndex.set(entry.key, { row: firstRow + i, version: 1 });
      return { key: entry.key, learnerId: entry.learnerId, record: entry.record, ok: true };
    });
  }

  private locationOf(locations: Map<string, RowLocation>, entry: PendingWrite): RowLocation {
    const location = locations.get(entry.key);
    if (!location) {
      throw new Error(`No row location for ${entry.key}`);
    }
    return location;
  }

  /**
   * Put a failed write back in the buffer unless a newer value was saved meanwhile
   */
  private unavailable(entry: PendingWrite, error: unknown): WriteOutcome {
    if (!this.pending.has(entry.key)) {
      this.pending.set(entry.key, entry);
      pendingWrites.set(this.pending.size);
    }
    const storeError = error instanceof StoreError
      ? error
      : new StoreUnavailableError(`Write failed: ${errorMessage(error)}`, { cause: error });
    return { key: entry.key, learnerId: entry.learnerId, record: entry.record, ok: false, error: storeError };
  }

  private async read(operation: string, range: string): Promise<Cells> {
    try {
      const rows = await this.client.readRange(range);
      storeOperationsTotal.inc({ operation, status: 'success' });
      return rows;
    } catch (error) {
      storeOperationsTotal.inc({ operation, status: 'error' });
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreUnavailableError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
