/** Command access middleware */

import type { Context, MiddlewareFn } from 'telegraf';
import { isPlatformAdmin } from '../utils/roles';

/**
 * Middleware that only lets commands through inside group chats.
 *
 * @example
 * bot.command('top', groupOnly, (ctx) => {
 *   // ctx.chat is a group or supergroup here
 * });
 */
export const groupOnly: MiddlewareFn<Context> = (ctx, next) => {
  if (ctx.chat?.type !== 'group' && ctx.chat?.type !== 'supergroup') {
    return ctx.reply('This command only works in groups.');
  }
  return next();
};

/**
 * Creates middleware restricting a command to platform administrators:
 * anyone listed in ADMIN_IDS, plus the creator and administrators of the
 * chat the command was sent in.
 *
 * @param adminIds - Telegram user IDs allowed everywhere
 *
 * @example
 * const chatAdmin = requireChatAdmin(config.adminIds);
 * bot.command('pardon', groupOnly, chatAdmin, (ctx) => {
 *   // Only admins reach this handler
 * });
 */
export const requireChatAdmin = (adminIds: readonly number[]): MiddlewareFn<Context> =>
  async (ctx, next) => {
    const userId = ctx.from?.id;
    const chatId = ctx.chat?.id;
    if (userId === undefined || chatId === undefined) {
      return;
    }

    const admin = await isPlatformAdmin(
      (chat, user) => ctx.telegram.getChatMember(chat, user),
      chatId,
      userId,
      adminIds,
    );
    if (!admin) {
      await ctx.reply('You do not have permission to use this command.');
      return;
    }
    return next();
  };
