/**
 * Activity ledger service module.
 * Append-only store of inbound content events with trailing-window counting
 * and retention pruning.
 *
 * @module services/activityLedger
 */

import type Database from "better-sqlite3";
import { execute, get, withStore } from "../database";
import type { ContentCategory } from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { KeyedMutex } from "../utils/keyedMutex";
import { logger } from "../utils/logger";

/**
 * Service recording content events and counting them over a trailing window.
 * Counts are scoped to (member, chat, category) and, when a fingerprint is
 * given, narrowed to events carrying that exact fingerprint.
 */
export class ActivityLedger {
	private readonly mutex = new KeyedMutex();

	constructor(
		private readonly db: Database.Database,
		private readonly clock: Clock = systemClock,
	) {}

	/**
	 * Appends an event and returns how many matching events fall inside the
	 * window, the new one included.
	 *
	 * Append and count run as one transaction: a failure leaves neither
	 * behind, so a caller may retry only after an error from this call.
	 *
	 * @param userId - Telegram user ID
	 * @param chatId - Telegram chat ID
	 * @param category - Content category
	 * @param windowSeconds - Trailing window; events at exactly now - window still count
	 * @param fingerprint - Content key narrowing the count to identical content
	 * @returns Number of events in the window
	 * @throws {TransientStoreError} If the database is unavailable
	 *
	 * @example
	 * ```typescript
	 * const count = await ledger.recordAndCount(123, -100456, 'text', 20, hash);
	 * ```
	 */
	async recordAndCount(
		userId: number,
		chatId: number,
		category: ContentCategory,
		windowSeconds: number,
		fingerprint?: string,
	): Promise<number> {
		return this.mutex.runExclusive(`${chatId}:${userId}:${category}`, () =>
			withStore(this.db, "recordAndCount", () =>
				this.db.transaction(() => {
					const now = this.clock.now();
					execute(
						this.db,
						`INSERT INTO activity_events (user_id, chat_id, category, fingerprint, timestamp)
             VALUES (?, ?, ?, ?, ?)`,
						[userId, chatId, category, fingerprint ?? null, now],
					);
					return this.countSince(
						userId,
						chatId,
						category,
						now - windowSeconds * 1000,
						fingerprint,
					);
				})(),
			),
		);
	}

	/**
	 * Deletes events strictly older than the retention horizon.
	 * Events inside the horizon are never touched, so concurrent counts over
	 * windows no longer than the horizon are unaffected.
	 *
	 * @param retentionSeconds - Age beyond which events are dropped
	 * @returns Number of deleted events
	 */
	async prune(retentionSeconds: number): Promise<number> {
		const cutoff = this.clock.now() - retentionSeconds * 1000;
		const deleted = withStore(
			this.db,
			"prune",
			() =>
				execute(this.db, "DELETE FROM activity_events WHERE timestamp < ?", [
					cutoff,
				]).changes,
		);

		logger.info("Pruned activity ledger", { deleted, retentionSeconds });
		return deleted;
	}

	/**
	 * Removes every recorded event of a member in a chat.
	 *
	 * @returns Number of deleted events
	 */
	async clear(userId: number, chatId: number): Promise<number> {
		return withStore(
			this.db,
			"clear",
			() =>
				execute(
					this.db,
					"DELETE FROM activity_events WHERE user_id = ? AND chat_id = ?",
					[userId, chatId],
				).changes,
		);
	}

	private countSince(
		userId: number,
		chatId: number,
		category: ContentCategory,
		since: number,
		fingerprint?: string,
	): number {
		const row =
			fingerprint === undefined
				? get<{ count: number }>(
						this.db,
						`SELECT COUNT(*) AS count FROM activity_events
             WHERE user_id = ? AND chat_id = ? AND category = ? AND timestamp >= ?`,
						[userId, chatId, category, since],
					)
				: get<{ count: number }>(
						this.db,
						`SELECT COUNT(*) AS count FROM activity_events
             WHERE user_id = ? AND chat_id = ? AND category = ? AND timestamp >= ? AND fingerprint = ?`,
						[userId, chatId, category, since, fingerprint],
					);
		return row?.count ?? 0;
	}
}
