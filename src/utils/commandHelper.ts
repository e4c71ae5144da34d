/** Command parsing utilities for extracting targets and arguments */

import type { Context } from "telegraf";
import { isContentCategory, type ContentCategory, type PolicyField } from "../types";

/**
 * Command arguments after the command itself, split on whitespace.
 */
export function getCommandArgs(ctx: Context): string[] {
	if (!ctx.message || !("text" in ctx.message)) {
		return [];
	}
	return ctx.message.text.split(/\s+/).slice(1).filter((arg) => arg.length > 0);
}

/**
 * Extract target user ID from command
 * Supports: reply-to-message, or a numeric ID as the first argument.
 * Inside a forum topic every message replies to the topic's opening message,
 * which is not a target.
 */
export function resolveTarget(ctx: Context): number | null {
	const message = ctx.message;
	if (message && "reply_to_message" in message && message.reply_to_message) {
		const repliedMessage = message.reply_to_message;
		const topicOpener =
			message.is_topic_message === true && "forum_topic_created" in repliedMessage;
		if (!topicOpener && repliedMessage.from) {
			return repliedMessage.from.id;
		}
	}

	const [first] = getCommandArgs(ctx);
	if (first !== undefined && /^-?\d+$/.test(first)) {
		return parseInt(first, 10);
	}
	return null;
}

export interface SettingArgs {
	category: ContentCategory;
	field: PolicyField;
	value: number;
}

const FIELD_ALIASES = new Map<string, PolicyField>([
	["threshold", "threshold"],
	["limit", "threshold"],
	["window", "windowSeconds"],
	["windowseconds", "windowSeconds"],
]);

/**
 * Parses `/setlimit <category> <threshold|window> <value>`.
 * Range checks are left to the policy store.
 *
 * @returns The parsed setting, or an error message for the usage reply
 *
 * @example
 * ```typescript
 * parseSettingArgs(['text', 'threshold', '5']);
 * // { ok: true, setting: { category: 'text', field: 'threshold', value: 5 } }
 * ```
 */
export function parseSettingArgs(
	args: string[],
): { ok: true; setting: SettingArgs } | { ok: false; error: string } {
	const [rawCategory, rawField, rawValue] = args;
	if (rawCategory === undefined || rawField === undefined || rawValue === undefined) {
		return { ok: false, error: "Expected a category, a field and a value" };
	}

	const category = rawCategory.toLowerCase();
	if (!isContentCategory(category)) {
		return { ok: false, error: `Unknown category: ${rawCategory}` };
	}

	const field = FIELD_ALIASES.get(rawField.toLowerCase());
	if (field === undefined) {
		return { ok: false, error: `Unknown field: ${rawField}` };
	}

	if (!/^-?\d+$/.test(rawValue)) {
		return { ok: false, error: `Not a whole number: ${rawValue}` };
	}

	return { ok: true, setting: { category, field, value: parseInt(rawValue, 10) } };
}
