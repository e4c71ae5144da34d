/**
 * Help command handler.
 * Explains what the flood warden watches and lists the admin commands.
 *
 * @module commands/help
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, type FmtString, fmt, join } from "telegraf/format";
import type { EscalationPolicy } from "../services/escalationPolicy";
import { formatDuration } from "../utils/format";

/**
 * Builds the help text, including the restriction ladder in effect.
 */
export function helpMessage(escalation: EscalationPolicy): FmtString {
	const { steps, defaultMinutes } = escalation.ladder();
	const ladder = [
		...steps.map((minutes, index) => `#${index + 1}: ${formatDuration(minutes)}`),
		`#${steps.length + 1}+: ${formatDuration(defaultMinutes)}`,
	];

	return fmt`${bold("Flood Warden")}
I watch for bursts of stickers, GIFs and repeated text, photos or videos. One message before the limit I warn; at the limit the message is deleted and the sender loses media rights for a while.

${bold("Restriction ladder")}
${join(ladder, "\n")}

${bold("Everyone")}
${code("/status")} - your violations and restriction
${code("/top")} - members with the most violations
${code("/banstats [days]")} - restriction statistics

${bold("Admin commands")}
${code("/trust")}, ${code("/untrust")} - exempt a member from checks
${code("/unban")} - lift a restriction (violations are kept)
${code("/pardon")} - clear violations and restriction
${code("/status <userId>")} - show another member's record
${code("/trusted")} - list trusted members
${code("/settings")} - show flood limits
${code("/setlimit <category> <threshold|window> <value>")} - change a limit
${code("/warnings on|off")} - toggle warnings
${code("/resetsettings")} - back to default limits

Target a member by replying to their message or by user ID. Restriction notices carry Unban, Pardon and Info buttons for admins.`;
}

/**
 * Registers the help command with the bot.
 *
 * @example
 * ```typescript
 * registerHelpCommand(bot, escalation);
 * ```
 */
export function registerHelpCommand(
	bot: Telegraf<Context>,
	escalation: EscalationPolicy,
): void {
	const text = helpMessage(escalation);

	bot.command("help", async (ctx) => {
		await ctx.reply(text);
	});
}
