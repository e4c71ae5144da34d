/**
 * Callback handlers for the buttons under restriction announcements.
 * Every button is limited to platform administrators and edits the message
 * it sits on with the result.
 *
 * @module handlers/moderationActions
 */

import type { Context, Telegraf } from "telegraf";
import type { ModerationEngine } from "../services/moderationEngine";
import { type ChatGateway, restoreMember } from "../services/verdictEnforcer";
import {
	liftedMessage,
	memberInfoMessage,
	nothingToLiftMessage,
	nothingToPardonMessage,
	pardonedMessage,
} from "../utils/format";
import { MODERATION_ACTION, memberActions } from "../utils/keyboards";
import { StructuredLogger } from "../utils/logger";
import { isPlatformAdmin } from "../utils/roles";

export interface ModerationActionDeps {
	engine: ModerationEngine;
	gateway: ChatGateway;
	adminIds: readonly number[];
}

/**
 * Registers the Unban, Pardon, Info, Trust and Untrust buttons.
 *
 * @example
 * ```typescript
 * registerModerationActions(bot, { engine, gateway, adminIds: config.adminIds });
 * ```
 */
export function registerModerationActions(
	bot: Telegraf<Context>,
	deps: ModerationActionDeps,
): void {
	const { engine, gateway, adminIds } = deps;

	const showMemberInfo = async (
		ctx: Context,
		userId: number,
		chatId: number,
	): Promise<void> => {
		const status = await engine.getStatus(userId, chatId);
		const history = await engine.restrictionHistory(userId, chatId);
		await ctx.editMessageText(memberInfoMessage(userId, status, history), {
			reply_markup: memberActions(userId, status.isExempt),
		});
	};

	bot.action(MODERATION_ACTION, async (ctx) => {
		const [, action, rawUserId] = ctx.match;
		const userId = parseInt(rawUserId, 10);
		const adminId = ctx.callbackQuery.from.id;
		const chatId = ctx.chat?.id;
		if (chatId === undefined) {
			await ctx.answerCbQuery();
			return;
		}

		const admin = await isPlatformAdmin(
			(chat, user) => ctx.telegram.getChatMember(chat, user),
			chatId,
			adminId,
			adminIds,
		);
		if (!admin) {
			await ctx.answerCbQuery("Only chat admins can use these buttons.", {
				show_alert: true,
			});
			return;
		}

		await ctx.answerCbQuery();
		StructuredLogger.logUserAction("Moderation button pressed", {
			userId: adminId,
			chatId,
			operation: action,
			targetUserId: userId,
		});

		switch (action) {
			case "unban": {
				const lifted = await engine.liftRestriction(userId, chatId);
				if (lifted) {
					await restoreMember(gateway, chatId, userId);
				}
				await ctx.editMessageText(
					lifted ? liftedMessage(userId) : nothingToLiftMessage(userId),
				);
				return;
			}

			case "pardon": {
				const pardoned = await engine.pardon(userId, chatId);
				if (pardoned) {
					await restoreMember(gateway, chatId, userId);
				}
				await ctx.editMessageText(
					pardoned ? pardonedMessage(userId) : nothingToPardonMessage(userId),
				);
				return;
			}

			case "trust":
				await engine.grantExemption(userId, chatId, adminId);
				await showMemberInfo(ctx, userId, chatId);
				return;

			case "untrust":
				await engine.revokeExemption(userId, chatId);
				await showMemberInfo(ctx, userId, chatId);
				return;

			default:
				await showMemberInfo(ctx, userId, chatId);
		}
	});
}
