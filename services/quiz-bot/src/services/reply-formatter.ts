import { RoundSummary, Verdict, VocabularyItem } from '../types';

export interface LearnerStats {
  itemsSeen: number;
  totalItems: number;
  attempts: number;
  correct: number;
  dueNow: number;
  nextDueAt: Date | null;
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function welcomeText(): string {
  return [
    'Welcome to the German Learning Bot! 🇩🇪🤖',
    'Use the buttons below to learn new words or test yourself.',
    '',
    '/quiz - start a quiz round',
    '/word - show a random word',
    '/stop - end the current round',
    '/stats - your progress'
  ].join('\n');
}

export function noActiveSessionText(): string {
  return 'There is no quiz in progress. Send /quiz to start one.';
}

export function staleOptionText(): string {
  return 'That button belongs to an earlier question. Please pick one of these:';
}

export function storeUnavailableText(): string {
  return '⚠️ Progress storage is unavailable right now. Please try again in a few minutes.';
}

export function noWordsText(): string {
  return 'Sorry, no words are available right now.';
}

export function nothingDueText(next: Date | null): string {
  const base = '🎉 Nothing to review right now.';
  return next ? `${base} Next review: ${formatTimestamp(next)}.` : base;
}

export function promptText(item: VocabularyItem, position: number, total: number): string {
  return `🇩🇪➡️🇺🇦 (${position}/${total}) What's the Ukrainian translation of '${item.key}'?`;
}

export function verdictText(verdict: Verdict): string {
  if (verdict.correct) {
    return '✅ Correct! Well done!';
  }
  const lines = [`❌ Sorry, that's incorrect. The correct answer is '${verdict.expected}'.`];
  if (verdict.item.mnemonic) {
    lines.push(`🧠 ${verdict.item.mnemonic}`);
  }
  return lines.join('\n');
}

const SUMMARY_HEADINGS: Record<RoundSummary['reason'], string> = {
  completed: '🏁 Round finished',
  abandoned: '⏹ Round stopped',
  timed_out: '⏰ Round timed out'
};

export function summaryText(summary: RoundSummary): string {
  const lines = [`${SUMMARY_HEADINGS[summary.reason]}: ${summary.correct}/${summary.answered} correct.`];

  if (summary.answered < summary.total) {
    lines.push(`Answered ${summary.answered} of ${summary.total} words.`);
  }
  if (summary.missed.length > 0) {
    lines.push(`📌 To revisit: ${summary.missed.join(', ')}`);
  }
  if (summary.degraded) {
    lines.push('⚠️ Some answers could not be saved yet. They will be synced automatically.');
  }
  return lines.join('\n');
}

/**
 * Word card in the same layout as the "random word" button
 */
export function wordCardText(item: VocabularyItem): string {
  const lines = [
    `🇩🇪 German: ${item.key}`,
    `🇺🇦 Ukrainian: ${item.translation}`
  ];
  if (item.english) lines.push(`🇬🇧 English: ${item.english}`);
  if (item.example) lines.push(`📚 Example: ${item.example}`);
  if (item.mnemonic) lines.push(`🧠 Mnemonic: ${item.mnemonic}`);
  return lines.join('\n');
}

export function statsText(stats: LearnerStats): string {
  const accuracy = stats.attempts > 0 ? Math.round((stats.correct / stats.attempts) * 100) : 0;
  const lines = [
    '📊 Your progress',
    `Words practised: ${stats.itemsSeen} of ${stats.totalItems}`,
    `Answers: ${stats.attempts} (${accuracy}% correct)`,
    `Due now: ${stats.dueNow}`
  ];
  if (stats.dueNow === 0 && stats.nextDueAt) {
    lines.push(`Next review: ${formatTimestamp(stats.nextDueAt)}`);
  }
  return lines.join('\n');
}
