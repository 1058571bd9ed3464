import { InboundMessage, QuizReply } from '../types';
import { logger } from '../utils/logger';
import { welcomeText } from '../services/reply-formatter';
import { QuizEngine } from '../services/quiz-engine';

export const COMMANDS = ['start', 'help', 'quiz', 'word', 'stop', 'stats'] as const;
export type Command = typeof COMMANDS[number];

const ANSWER_ACTION = /^answer:(\d+)$/;

/**
 * `/quiz`, `/quiz@SomeBot` and `/quiz extra` all map to "quiz".
 * Returns null for text that is not a command at all.
 */
export function parseCommand(text: string): string | null {
  const match = /^\/([A-Za-z_]+)(?:@\S+)?(?:\s|$)/.exec(text.trim());
  return match ? match[1].toLowerCase() : null;
}

function isCommand(name: string): name is Command {
  return (COMMANDS as readonly string[]).includes(name);
}

export function answerAction(index: number): string {
  return `answer:${index}`;
}

/**
 * Maps transport-level input (text messages and button presses) onto quiz
 * engine operations. Knows nothing about the chat protocol itself.
 */
export class CommandRouter {
  private engine: QuizEngine;

  constructor(engine: QuizEngine) {
    this.engine = engine;
  }

  async handleText(message: InboundMessage): Promise<QuizReply> {
    const { learnerId } = message;
    const name = parseCommand(message.text);

    if (name === null) {
      return this.engine.submitAnswer(learnerId, message.text);
    }

    if (!isCommand(name)) {
      logger.debug(`Unknown command /${name} from ${learnerId}`);
      return this.help(learnerId);
    }

    return this.dispatch(name, learnerId);
  }

  async handleAction(learnerId: string, data: string): Promise<QuizReply> {
    const answer = ANSWER_ACTION.exec(data);
    if (answer) {
      return this.engine.submitOption(learnerId, parseInt(answer[1], 10));
    }

    switch (data) {
      case 'quiz':
        return this.engine.startRound(learnerId);
      case 'word':
        return this.engine.randomWord(learnerId);
      default:
        logger.debug(`Unknown action "${data}" from ${learnerId}`);
        return this.help(learnerId);
    }
  }

  private async dispatch(command: Command, learnerId: string): Promise<QuizReply> {
    switch (command) {
      case 'start':
      case 'help':
        return this.help(learnerId);
      case 'quiz':
        return this.engine.startRound(learnerId);
      case 'word':
        return this.engine.randomWord(learnerId);
      case 'stop':
        return this.engine.abandonRound(learnerId);
      case 'stats':
        return this.engine.stats(learnerId);
    }
  }

  private help(learnerId: string): QuizReply {
    return { learnerId, text: welcomeText(), menu: ['quiz', 'word'] };
  }
}
