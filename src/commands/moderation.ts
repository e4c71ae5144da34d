/**
 * Moderation command handlers.
 * Commands over the flood warden's per-member state. Trust, restrictions and
 * pardons are for admins; records and statistics are open to members.
 *
 * @module commands/moderation
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt } from "telegraf/format";
import { groupOnly, requireChatAdmin } from "../middleware/index";
import type { ModerationEngine } from "../services/moderationEngine";
import { type ChatGateway, restoreMember } from "../services/verdictEnforcer";
import { getCommandArgs, resolveTarget } from "../utils/commandHelper";
import {
	exemptionsMessage,
	liftedMessage,
	nothingToLiftMessage,
	nothingToPardonMessage,
	pardonedMessage,
	statsMessage,
	statusMessage,
	topOffendersMessage,
} from "../utils/format";
import { isPlatformAdmin } from "../utils/roles";

export interface ModerationCommandDeps {
	engine: ModerationEngine;
	gateway: ChatGateway;
	adminIds: readonly number[];
}

const MAX_STATS_DAYS = 365;

/**
 * Registers all moderation commands with the bot.
 *
 * Commands registered for chat admins:
 * - /trust, /untrust - Exempt a member from flood detection, or undo it
 * - /unban - Lift a running restriction, keeping the violation count
 * - /pardon - Clear a member's violations and restriction
 * - /trusted - List trusted members
 *
 * Commands open to every member:
 * - /status - Your own record; admins may look up anyone
 * - /top - Members with the most violations
 * - /banstats [days] - Restriction statistics
 *
 * Members are targeted by replying to one of their messages, or by user ID.
 *
 * @example
 * ```typescript
 * registerModerationCommands(bot, { engine, gateway, adminIds: config.adminIds });
 * ```
 */
export function registerModerationCommands(
	bot: Telegraf<Context>,
	deps: ModerationCommandDeps,
): void {
	const { engine, gateway, adminIds } = deps;
	const chatAdmin = requireChatAdmin(adminIds);

	const targetOrUsage = async (ctx: Context, command: string): Promise<number | null> => {
		const target = resolveTarget(ctx);
		if (target === null) {
			await ctx.reply(
				fmt`⚠️ ${bold("Usage:")}
• Reply to a member: ${code(`/${command}`)}
• Direct: ${code(`/${command} <userId>`)}`,
			);
		}
		return target;
	};

	/**
	 * Command: /trust
	 *
	 * @example
	 * Admin: (reply) /trust
	 * Bot: 123456 is now trusted and skips flood checks.
	 */
	bot.command("trust", groupOnly, chatAdmin, async (ctx) => {
		const userId = await targetOrUsage(ctx, "trust");
		if (userId === null) return;

		await engine.grantExemption(userId, ctx.message.chat.id, ctx.message.from.id);
		await ctx.reply(fmt`✅ ${code(String(userId))} is now trusted and skips flood checks.`);
	});

	bot.command("untrust", groupOnly, chatAdmin, async (ctx) => {
		const userId = await targetOrUsage(ctx, "untrust");
		if (userId === null) return;

		const revoked = await engine.revokeExemption(userId, ctx.message.chat.id);
		await ctx.reply(
			revoked
				? fmt`${code(String(userId))} is no longer trusted.`
				: fmt`${code(String(userId))} was not trusted.`,
		);
	});

	/**
	 * Command: /unban
	 * Lifts the restriction both in the tracker and in Telegram. The
	 * violation count stays, so the next offense escalates further.
	 */
	bot.command("unban", groupOnly, chatAdmin, async (ctx) => {
		const userId = await targetOrUsage(ctx, "unban");
		if (userId === null) return;

		const lifted = await engine.liftRestriction(userId, ctx.message.chat.id);
		if (!lifted) {
			await ctx.reply(nothingToLiftMessage(userId));
			return;
		}

		await restoreMember(gateway, ctx.message.chat.id, userId);
		await ctx.reply(liftedMessage(userId));
	});

	/**
	 * Command: /pardon
	 * Resets the member to a clean record: no violations, no restriction,
	 * no recorded activity.
	 */
	bot.command("pardon", groupOnly, chatAdmin, async (ctx) => {
		const userId = await targetOrUsage(ctx, "pardon");
		if (userId === null) return;

		const pardoned = await engine.pardon(userId, ctx.message.chat.id);
		if (!pardoned) {
			await ctx.reply(nothingToPardonMessage(userId));
			return;
		}

		await restoreMember(gateway, ctx.message.chat.id, userId);
		await ctx.reply(pardonedMessage(userId));
	});

	/**
	 * Command: /status
	 * Without a target, shows the sender's own record. Looking up someone
	 * else needs admin rights.
	 */
	bot.command("status", groupOnly, async (ctx) => {
		const senderId = ctx.message.from.id;
		const chatId = ctx.message.chat.id;
		const userId = resolveTarget(ctx) ?? senderId;

		if (userId !== senderId) {
			const admin = await isPlatformAdmin(
				(chat, user) => ctx.telegram.getChatMember(chat, user),
				chatId,
				senderId,
				adminIds,
			);
			if (!admin) {
				await ctx.reply("Only chat admins can look up other members.");
				return;
			}
		}

		const status = await engine.getStatus(userId, chatId);
		await ctx.reply(statusMessage(userId, status));
	});

	bot.command("top", groupOnly, async (ctx) => {
		const offenders = await engine.topOffenders(ctx.message.chat.id, 10);
		await ctx.reply(topOffendersMessage(offenders));
	});

	/**
	 * Command: /banstats [days]
	 *
	 * @example
	 * Member: /banstats 30
	 * Bot: Restrictions, last 30 days
	 *      Total: 4 (1d 6h in total)
	 */
	bot.command("banstats", groupOnly, async (ctx) => {
		const [rawDays] = getCommandArgs(ctx);
		const days = rawDays === undefined ? 7 : parseInt(rawDays, 10);
		if (Number.isNaN(days) || days < 1 || days > MAX_STATS_DAYS) {
			await ctx.reply(`⚠️ Days must be a number between 1 and ${MAX_STATS_DAYS}.`);
			return;
		}

		const stats = await engine.restrictionStats(ctx.message.chat.id, days);
		await ctx.reply(statsMessage(stats));
	});

	bot.command("trusted", groupOnly, chatAdmin, async (ctx) => {
		const exemptions = await engine.listExemptions(ctx.message.chat.id);
		await ctx.reply(exemptionsMessage(exemptions));
	});
}
