import { VocabularyItem } from '../types';

const ALTERNATE_SEPARATORS = /[;/|]/;
const QUOTES = /^["'«»„“”‘’`]+|["'«»„“”‘’`]+$/g;
const TRAILING_PUNCTUATION = /[.!?…]+$/;

export function normalizeAnswer(text: string): string {
  return text
    .normalize('NFC')
    .toLowerCase()
    .trim()
    .replace(QUOTES, '')
    .replace(TRAILING_PUNCTUATION, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Every form accepted for an item, as written in the sheet (not normalized).
 * `"будинок; дім"` accepts both words.
 */
export function acceptedForms(item: VocabularyItem): string[] {
  const forms = item.translation
    .split(ALTERNATE_SEPARATORS)
    .map(form => form.trim())
    .filter(form => form.length > 0);
  return forms.length > 0 ? forms : [item.translation.trim()];
}

/** The first accepted form, shown to the learner as the expected answer */
export function primaryForm(item: VocabularyItem): string {
  return acceptedForms(item)[0];
}

export function isCorrectAnswer(item: VocabularyItem, given: string): boolean {
  const answer = normalizeAnswer(given);
  if (answer.length === 0) {
    return false;
  }
  if (answer === normalizeAnswer(item.translation)) {
    return true;
  }
  return acceptedForms(item).some(form => normalizeAnswer(form) === answer);
}

export type RandomSource = () => number;

function shuffle<T>(values: T[], random: RandomSource): T[] {
  const copy = [...values];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/**
 * Multiple-choice labels: the item's primary form plus up to `wrongCount`
 * distinct translations of other items, shuffled
 */
export function buildOptions(
  item: VocabularyItem,
  catalog: VocabularyItem[],
  random: RandomSource,
  wrongCount = 3
): string[] {
  const correct = primaryForm(item);
  const taken = new Set<string>([normalizeAnswer(correct)]);
  for (const form of acceptedForms(item)) {
    taken.add(normalizeAnswer(form));
  }

  const candidates: string[] = [];
  for (const other of catalog) {
    if (other.key === item.key) continue;
    const label = primaryForm(other);
    const normalized = normalizeAnswer(label);
    if (normalized.length === 0 || taken.has(normalized)) continue;
    taken.add(normalized);
    candidates.push(label);
  }

  const wrong = shuffle(candidates, random).slice(0, wrongCount);
  return shuffle([correct, ...wrong], random);
}
