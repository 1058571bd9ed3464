import { Markup, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { MenuAction, QuizReply } from '../types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { CommandRouter, answerAction } from './command-router';

const MENU_LABELS: Record<MenuAction, string> = {
  word: '🎲 Get a random word',
  quiz: '📝 Test me'
};

type KeyboardButton = ReturnType<typeof Markup.button.callback>;

/**
 * Inline keyboard for a reply: one row per answer option, then the menu
 */
export function buildKeyboard(reply: QuizReply): ReturnType<typeof Markup.inlineKeyboard> | undefined {
  const rows: KeyboardButton[][] = [];
  (reply.options ?? []).forEach((label, index) => {
    rows.push([Markup.button.callback(label, answerAction(index))]);
  });
  (reply.menu ?? []).forEach(action => {
    rows.push([Markup.button.callback(MENU_LABELS[action], action)]);
  });
  return rows.length > 0 ? Markup.inlineKeyboard(rows) : undefined;
}

/**
 * Learners are keyed by chat, so a timed-out round is pushed back to the
 * chat it was played in. In a private chat this is the user's own id.
 */
export function learnerIdOf(ctx: { chat?: { id: number }; from?: { id: number } }): string | undefined {
  const id = ctx.chat?.id ?? ctx.from?.id;
  return id === undefined ? undefined : String(id);
}

/**
 * Telegram transport. Long-polls the Bot API and hands text messages and
 * button presses to the command router.
 */
export class TelegramGateway {
  private bot: Telegraf;
  private router: CommandRouter;

  constructor(token: string, router: CommandRouter) {
    this.bot = new Telegraf(token);
    this.router = router;
    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.bot.on(message('text'), async ctx => {
      const learnerId = learnerIdOf(ctx);
      if (!learnerId) return;

      const reply = await this.router.handleText({ learnerId, text: ctx.message.text });
      await ctx.reply(reply.text, buildKeyboard(reply));
    });

    this.bot.action(/^.+$/, async ctx => {
      await ctx.answerCbQuery();
      const learnerId = learnerIdOf(ctx);
      if (!learnerId) return;

      const reply = await this.router.handleAction(learnerId, ctx.match[0]);
      await ctx.reply(reply.text, buildKeyboard(reply));
    });

    this.bot.catch((error, ctx) => {
      logger.error(`Exception while handling update ${ctx.update.update_id}`, { error: errorMessage(error) });
    });
  }

  start(): void {
    this.bot.launch().catch(error => {
      logger.error('Telegram polling stopped with an error', { error: errorMessage(error) });
    });
    logger.info('Telegram gateway polling for updates');
  }

  stop(reason: string): void {
    this.bot.stop(reason);
  }

  /**
   * Push a reply outside of a request/response exchange (e.g. a timed-out round)
   */
  async send(reply: QuizReply): Promise<void> {
    try {
      await this.bot.telegram.sendMessage(reply.learnerId, reply.text, buildKeyboard(reply));
    } catch (error) {
      logger.error(`Failed to send message to ${reply.learnerId}`, { error: errorMessage(error) });
    }
  }
}
