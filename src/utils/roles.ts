/** Decides who counts as a platform administrator in a chat */

import { logger } from "./logger";

/** Looks up a member's status, as `telegram.getChatMember` does */
export type ChatMemberLookup = (
	chatId: number,
	userId: number,
) => Promise<{ status: string }>;

const ADMIN_STATUSES = new Set(["creator", "administrator"]);

/**
 * Whether a member is above moderation: listed in ADMIN_IDS, or the chat's
 * creator or one of its administrators. A failed lookup counts as not an
 * admin, so the member is still checked.
 *
 * @example
 * ```typescript
 * const admin = await isPlatformAdmin(
 *   (chat, user) => ctx.telegram.getChatMember(chat, user),
 *   ctx.chat.id, ctx.from.id, config.adminIds,
 * );
 * ```
 */
export async function isPlatformAdmin(
	lookup: ChatMemberLookup,
	chatId: number,
	userId: number,
	adminIds: readonly number[],
): Promise<boolean> {
	if (adminIds.includes(userId)) {
		return true;
	}

	try {
		const member = await lookup(chatId, userId);
		return ADMIN_STATUSES.has(member.status);
	} catch (error) {
		logger.warn("Chat member lookup failed, treating member as non-admin", {
			userId,
			chatId,
			error: error instanceof Error ? error.message : String(error),
		});
		return false;
	}
}
