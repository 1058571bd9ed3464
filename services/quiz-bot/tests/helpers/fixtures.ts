import { RetryConfig } from '../../src/config/environment';
import { VocabularyItem } from '../../src/types';

export const WORDS_HEADER = ['Німецькою', 'Українською', 'Англійською', 'Приклад', 'Мнемотехніка', 'Tags'];
export const PROGRESS_HEADER = [
  'Learner', 'Item', 'LastReviewed', 'NextDue', 'IntervalMs',
  'ConsecutiveCorrect', 'EaseFactor', 'TotalAttempts', 'TotalCorrect', 'Version', 'UpdatedAt'
];

export const WORD_ROWS: string[][] = [
  ['der Apfel', 'яблуко', 'apple', 'Der Apfel ist rot.', 'Apfel sounds like apple', 'food'],
  ['das Buch', 'книга', 'book', 'Ich lese ein Buch.', '', 'school'],
  ['die Katze', 'кішка; кіт', 'cat', 'Die Katze schläft.', '', 'animals'],
  ['der Hund', 'собака', 'dog', '', '', 'animals'],
  ['das Haus', 'будинок / дім', 'house', 'Das Haus ist groß.', '', '']
];

export const SHEETS = { vocabulary: 'Words', progress: 'Progress' };

export const NO_WAIT_RETRY: RetryConfig = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

export function item(key: string, translation: string, extra: Partial<VocabularyItem> = {}): VocabularyItem {
  return { key, translation, tags: [], ...extra };
}

/** Deterministic pseudo-random source (LCG) */
export function seededRandom(seed = 42): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

export const noSleep = async (): Promise<void> => undefined;
