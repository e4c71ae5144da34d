/**
 * @module middleware/floodGuard
 * @description Flood detection middleware. Triages every group message into a
 * content event, asks the moderation engine for a verdict and enforces it.
 * Platform administrators (ADMIN_IDS, chat creator and administrators) are
 * never evaluated.
 */

import type { Context, MiddlewareFn } from "telegraf";
import type { ModerationEngine } from "../services/moderationEngine";
import type { VerdictEnforcer } from "../services/verdictEnforcer";
import { triageMessage } from "../utils/contentTriage";
import { StructuredLogger } from "../utils/logger";
import { isPlatformAdmin } from "../utils/roles";

export interface FloodGuardOptions {
	engine: ModerationEngine;
	enforcer: VerdictEnforcer;
	adminIds: readonly number[];
}

const displayName = (from: { first_name: string; username?: string }): string =>
	from.username ? `@${from.username}` : from.first_name;

/**
 * Creates the flood guard. Messages it deleted stop here; everything else,
 * warned messages included, continues down the chain.
 *
 * @example
 * ```typescript
 * bot.use(createFloodGuardMiddleware({ engine, enforcer, adminIds: config.adminIds }));
 * ```
 */
export function createFloodGuardMiddleware(
	options: FloodGuardOptions,
): MiddlewareFn<Context> {
	const { engine, enforcer, adminIds } = options;

	return async (ctx, next) => {
		const message = ctx.message;
		const chat = ctx.chat;
		const from = ctx.from;
		if (!message || !from || !chat || (chat.type !== "group" && chat.type !== "supergroup")) {
			return next();
		}

		const event = triageMessage(message);
		if (!event) {
			return next();
		}

		try {
			const admin = await isPlatformAdmin(
				(chatId, userId) => ctx.telegram.getChatMember(chatId, userId),
				chat.id,
				from.id,
				adminIds,
			);
			if (admin) {
				return next();
			}

			const verdict = await engine.evaluate(
				from.id,
				chat.id,
				event.category,
				event.fingerprint,
			);
			const outcome = await enforcer.enforce(
				{
					chatId: chat.id,
					userId: from.id,
					messageId: message.message_id,
					name: displayName(from),
					category: event.category,
				},
				verdict,
			);

			StructuredLogger.logDebug("Flood check", {
				userId: from.id,
				chatId: chat.id,
				category: event.category,
				verdict: verdict.kind,
				outcome,
			});

			if (outcome === "deleted" || outcome === "restricted") {
				return;
			}
		} catch (error) {
			StructuredLogger.logError(error, {
				userId: from.id,
				chatId: chat.id,
				category: event.category,
				operation: "flood_check",
			});
		}

		return next();
	};
}
