/**
 * Inline keyboards attached to moderation messages.
 * Callback data is `<action>_<userId>`, matched by MODERATION_ACTION.
 *
 * @module utils/keyboards
 */

import { Markup } from "telegraf";
import type { InlineKeyboardMarkup } from "telegraf/types";

export const MODERATION_ACTION = /^(unban|pardon|userinfo|trust|untrust)_(\d+)$/;

/**
 * Buttons under every restriction announcement
 */
export const banActions = (userId: number): InlineKeyboardMarkup =>
	Markup.inlineKeyboard([
		Markup.button.callback("🔓 Unban", `unban_${userId}`),
		Markup.button.callback("🕊 Pardon", `pardon_${userId}`),
		Markup.button.callback("ℹ️ Info", `userinfo_${userId}`),
	]).reply_markup;

/**
 * Buttons under a member's record; trust or untrust depending on the
 * current exemption
 */
export const memberActions = (userId: number, isExempt: boolean): InlineKeyboardMarkup =>
	Markup.inlineKeyboard([
		[
			isExempt
				? Markup.button.callback("Untrust", `untrust_${userId}`)
				: Markup.button.callback("✅ Trust", `trust_${userId}`),
		],
		[
			Markup.button.callback("🔓 Unban", `unban_${userId}`),
			Markup.button.callback("🕊 Pardon", `pardon_${userId}`),
		],
	]).reply_markup;
