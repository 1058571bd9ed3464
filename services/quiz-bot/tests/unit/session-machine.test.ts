import * as machine from '../../src/services/session-machine';
import { SessionState } from '../../src/types';
import { InvalidTransitionError, NoActiveSessionError } from '../../src/utils/errors';
import { item } from '../helpers/fixtures';

const t0 = new Date('2026-03-01T10:00:00.000Z');
const WINDOW = 15 * 60 * 1000;

const queue = [
  item('das Buch', 'книга'),
  item('der Hund', 'собака'),
  item('das Buch', 'книга')
];

function started() {
  const session = machine.startRound(machine.createIdleSession('learner-1', t0), queue, new Map(), t0);
  machine.markPresented(session, ['книга', 'собака'], t0);
  return session;
}

describe('Session state machine', () => {
  it('only allows the documented transitions', () => {
    const allowed: Array<[SessionState, SessionState]> = [
      ['idle', 'presenting'],
      ['presenting', 'awaitingAnswer'],
      ['presenting', 'summarizing'],
      ['awaitingAnswer', 'presenting'],
      ['awaitingAnswer', 'summarizing'],
      ['summarizing', 'idle']
    ];
    const states: SessionState[] = ['idle', 'presenting', 'awaitingAnswer', 'summarizing'];

    for (const from of states) {
      for (const to of states) {
        const expected = allowed.some(([a, b]) => a === from && b === to);
        expect(machine.canTransition(from, to)).toBe(expected);
      }
    }
  });

  it('starts a round with duplicates removed', () => {
    const session = machine.startRound(machine.createIdleSession('learner-1', t0), queue, new Map(), t0);

    expect(session.state).toBe('presenting');
    expect(session.queue.map(i => i.key)).toEqual(['das Buch', 'der Hund']);
  });

  it('refuses to start an empty round', () => {
    expect(() => machine.startRound(machine.createIdleSession('learner-1', t0), [], new Map(), t0))
      .toThrow(InvalidTransitionError);
  });

  it('grades answers and walks through to summarizing then idle', () => {
    const session = started();

    const first = machine.submitAnswer(session, 'Книга', new Date(t0.getTime() + 1000));
    expect(first.correct).toBe(true);
    expect(session.state).toBe('presenting');
    expect(session.index).toBe(1);

    machine.markPresented(session, ['собака', 'книга'], t0);
    const second = machine.submitAnswer(session, 'кіт', t0);
    expect(second.correct).toBe(false);
    expect(second.expected).toBe('собака');
    expect(session.state).toBe('summarizing');

    const summary = machine.summarize(session);
    expect(summary).toEqual({
      learnerId: 'learner-1',
      correct: 1,
      incorrect: 1,
      answered: 2,
      total: 2,
      missed: ['der Hund'],
      degraded: false,
      reason: 'completed'
    });
    expect(session.state).toBe('idle');
  });

  it('rejects an answer while idle with NoActiveSessionError', () => {
    const session = machine.createIdleSession('learner-1', t0);

    expect(() => machine.submitAnswer(session, 'книга', t0)).toThrow(NoActiveSessionError);
  });

  it('rejects an answer before the prompt was presented', () => {
    const session = machine.startRound(machine.createIdleSession('learner-1', t0), queue, new Map(), t0);

    expect(() => machine.submitAnswer(session, 'книга', t0)).toThrow(InvalidTransitionError);
    expect(session.state).toBe('presenting');
  });

  it('rejects summarizing an active round', () => {
    const session = started();

    expect(() => machine.summarize(session)).toThrow(InvalidTransitionError);
  });

  it('resolves option indexes only while awaiting an answer', () => {
    const session = started();

    expect(machine.optionLabel(session, 1)).toBe('собака');
    expect(machine.optionLabel(session, 5)).toBeUndefined();
    expect(machine.optionLabel(session, -1)).toBeUndefined();
  });

  it('forces an idle round to summarizing with partial counts after the window', () => {
    const session = started();
    machine.submitAnswer(session, 'книга', t0);
    machine.markPresented(session, [], t0);

    expect(machine.expire(session, new Date(t0.getTime() + WINDOW), WINDOW)).toBeNull();

    const timeout = machine.expire(session, new Date(t0.getTime() + WINDOW + 1), WINDOW);
    expect(timeout?.idleMs).toBe(WINDOW + 1);
    expect(session.state).toBe('summarizing');

    const summary = machine.summarize(session);
    expect(summary.reason).toBe('timed_out');
    expect(summary.answered).toBe(1);
    expect(summary.total).toBe(2);
    expect(session.state).toBe('idle');
  });

  it('abandons an active round and refuses to abandon an idle one', () => {
    const session = started();
    machine.abandon(session);
    expect(session.state).toBe('summarizing');
    expect(machine.summarize(session).reason).toBe('abandoned');

    expect(() => machine.abandon(session)).toThrow(NoActiveSessionError);
  });
});
