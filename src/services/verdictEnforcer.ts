/**
 * Verdict enforcement module.
 * Applies engine verdicts to a Telegram chat: warning replies, message
 * deletion and media restrictions.
 *
 * The violation record is written before anything here runs. When Telegram
 * refuses an action the record stands and the outcome says the restriction
 * was recorded but not enforced.
 *
 * @module services/verdictEnforcer
 */

import type { Telegram } from "telegraf";
import type { FmtString } from "telegraf/format";
import type { InlineKeyboardMarkup } from "telegraf/types";
import type { ContentCategory, Verdict } from "../types";
import { restrictionMessage, warningMessage } from "../utils/format";
import { banActions } from "../utils/keyboards";
import { logger, StructuredLogger } from "../utils/logger";

export interface SendOptions {
	/** Message to reply to */
	replyTo?: number;
	keyboard?: InlineKeyboardMarkup;
}

/** Chat actions enforcement needs, kept narrow so tests can fake them */
export interface ChatGateway {
	deleteMessage(chatId: number, messageId: number): Promise<void>;
	/** @param untilDate - Unix seconds */
	restrictMember(chatId: number, userId: number, untilDate: number): Promise<void>;
	liftMember(chatId: number, userId: number): Promise<void>;
	sendMessage(chatId: number, text: string | FmtString, options?: SendOptions): Promise<void>;
}

/** Restricted members keep text but lose every kind of media */
export const RESTRICTED_PERMISSIONS = {
	can_send_messages: true,
	can_send_audios: false,
	can_send_documents: false,
	can_send_photos: false,
	can_send_videos: false,
	can_send_video_notes: false,
	can_send_voice_notes: false,
	can_send_polls: false,
	can_send_other_messages: false,
	can_add_web_page_previews: false,
};

export const FULL_PERMISSIONS = {
	can_send_messages: true,
	can_send_audios: true,
	can_send_documents: true,
	can_send_photos: true,
	can_send_videos: true,
	can_send_video_notes: true,
	can_send_voice_notes: true,
	can_send_polls: true,
	can_send_other_messages: true,
	can_add_web_page_previews: true,
};

/**
 * Gateway backed by the Telegram Bot API.
 *
 * @example
 * ```typescript
 * const enforcer = new VerdictEnforcer(telegramGateway(bot.telegram));
 * ```
 */
export const telegramGateway = (telegram: Telegram): ChatGateway => ({
	async deleteMessage(chatId, messageId) {
		await telegram.deleteMessage(chatId, messageId);
	},
	async restrictMember(chatId, userId, untilDate) {
		await telegram.restrictChatMember(chatId, userId, {
			permissions: RESTRICTED_PERMISSIONS,
			until_date: untilDate,
		});
	},
	async liftMember(chatId, userId) {
		await telegram.restrictChatMember(chatId, userId, {
			permissions: FULL_PERMISSIONS,
		});
	},
	async sendMessage(chatId, text, options = {}) {
		await telegram.sendMessage(chatId, text, {
			reply_parameters:
				options.replyTo === undefined ? undefined : { message_id: options.replyTo },
			reply_markup: options.keyboard,
		});
	},
});

export interface EnforcementTarget {
	chatId: number;
	userId: number;
	messageId: number;
	/** Display name used in announcements */
	name: string;
	category: ContentCategory;
}

export type EnforcementOutcome =
	| "allowed"
	| "warned"
	| "deleted"
	| "restricted"
	| "recorded_not_enforced";

export class VerdictEnforcer {
	constructor(private readonly gateway: ChatGateway) {}

	async enforce(target: EnforcementTarget, verdict: Verdict): Promise<EnforcementOutcome> {
		switch (verdict.kind) {
			case "allow":
				return "allowed";

			case "warn":
				await this.attempt("send_warning", target, () =>
					this.gateway.sendMessage(
						target.chatId,
						warningMessage(target.name, target.category, verdict),
						{ replyTo: target.messageId },
					),
				);
				return "warned";

			case "already_restricted": {
				const deleted = await this.attempt("delete_message", target, () =>
					this.gateway.deleteMessage(target.chatId, target.messageId),
				);
				return deleted ? "deleted" : "recorded_not_enforced";
			}

			case "restrict": {
				const deleted = await this.attempt("delete_message", target, () =>
					this.gateway.deleteMessage(target.chatId, target.messageId),
				);
				const restricted = await this.attempt("restrict_member", target, () =>
					this.gateway.restrictMember(
						target.chatId,
						target.userId,
						Math.ceil(verdict.restrictedUntil / 1000),
					),
				);
				const enforced = deleted && restricted;

				await this.attempt("announce_restriction", target, () =>
					this.gateway.sendMessage(
						target.chatId,
						restrictionMessage(target.name, target.category, verdict, enforced),
						{ keyboard: banActions(target.userId) },
					),
				);

				if (!enforced) {
					StructuredLogger.logSecurityEvent("Restriction recorded but not enforced", {
						userId: target.userId,
						chatId: target.chatId,
						category: target.category,
						operation: "enforce",
						ordinal: verdict.ordinal,
					});
					return "recorded_not_enforced";
				}
				return "restricted";
			}
		}
	}

	/**
	 * Runs one chat action.
	 *
	 * @returns False if Telegram rejected it
	 */
	private async attempt(
		operation: string,
		target: EnforcementTarget,
		action: () => Promise<void>,
	): Promise<boolean> {
		try {
			await action();
			return true;
		} catch (error) {
			logger.warn("Chat action failed", {
				userId: target.userId,
				chatId: target.chatId,
				operation,
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}
}

/**
 * Gives a member their permissions back after an unban or pardon. The
 * tracker has already been updated, so a Telegram refusal is only logged.
 *
 * @returns False if Telegram rejected it
 */
export async function restoreMember(
	gateway: ChatGateway,
	chatId: number,
	userId: number,
): Promise<boolean> {
	try {
		await gateway.liftMember(chatId, userId);
		return true;
	} catch (error) {
		logger.warn("Failed to restore member permissions", {
			userId,
			chatId,
			error: error instanceof Error ? error.message : String(error),
		});
		return false;
	}
}
