/**
 * Flood limit configuration commands.
 * Lets chat admins view and change the per-chat thresholds and windows.
 *
 * @module commands/settings
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt } from "telegraf/format";
import { ValidationError } from "../errors";
import { groupOnly, requireChatAdmin } from "../middleware/index";
import type { ModerationEngine } from "../services/moderationEngine";
import { getCommandArgs, parseSettingArgs } from "../utils/commandHelper";
import { policyMessage } from "../utils/format";

const SETLIMIT_USAGE = fmt`⚠️ ${bold("Usage:")} ${code("/setlimit <category> <threshold|window> <value>")}
Categories: sticker, animation, text, photo, video
Threshold: 1-20 messages. Window: seconds.`;

/**
 * Registers the settings commands with the bot.
 *
 * Commands registered (chat admins only):
 * - /settings - Show the chat's flood limits
 * - /setlimit <category> <threshold|window> <value> - Change one limit
 * - /warnings on|off - Toggle the warning sent one message before a restriction
 * - /resetsettings - Go back to the default limits
 */
export function registerSettingsCommands(
	bot: Telegraf<Context>,
	engine: ModerationEngine,
	adminIds: readonly number[],
): void {
	const chatAdmin = requireChatAdmin(adminIds);

	bot.command("settings", groupOnly, chatAdmin, async (ctx) => {
		const policy = await engine.getPolicy(ctx.message.chat.id);
		await ctx.reply(policyMessage(policy));
	});

	/**
	 * Command: /setlimit
	 * Stickers and GIFs share one set of limits, so setting either changes both.
	 *
	 * @example
	 * Admin: /setlimit text threshold 5
	 * Bot: Flood limits
	 *      Stickers & GIFs: 3 in 30s
	 *      Text: 5 in 20s
	 *      ...
	 */
	bot.command("setlimit", groupOnly, chatAdmin, async (ctx) => {
		const parsed = parseSettingArgs(getCommandArgs(ctx));
		if (!parsed.ok) {
			await ctx.reply(fmt`${parsed.error}

${SETLIMIT_USAGE}`);
			return;
		}

		const { category, field, value } = parsed.setting;
		try {
			const policy = await engine.setPolicy(ctx.message.chat.id, category, field, value);
			await ctx.reply(policyMessage(policy));
		} catch (error) {
			if (error instanceof ValidationError) {
				await ctx.reply(`⚠️ ${error.message}`);
				return;
			}
			throw error;
		}
	});

	bot.command("warnings", groupOnly, chatAdmin, async (ctx) => {
		const [mode] = getCommandArgs(ctx);
		if (mode !== "on" && mode !== "off") {
			await ctx.reply(fmt`⚠️ ${bold("Usage:")} ${code("/warnings on|off")}`);
			return;
		}

		const policy = await engine.setWarnings(ctx.message.chat.id, mode === "on");
		await ctx.reply(`Warnings are now ${policy.warnEnabled ? "on" : "off"}.`);
	});

	bot.command("resetsettings", groupOnly, chatAdmin, async (ctx) => {
		const reset = await engine.resetPolicy(ctx.message.chat.id);
		await ctx.reply(
			reset
				? "Flood limits reset to the defaults."
				: "This chat already uses the default limits.",
		);
	});
}
