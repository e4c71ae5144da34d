/** Restriction history and per-chat statistics */

import type Database from "better-sqlite3";
import { execute, get, query, withStore } from "../database";
import {
	type ContentCategory,
	isContentCategory,
	type NewRestrictionEvent,
	type RestrictionEvent,
	type RestrictionEventRow,
	type RestrictionStats,
} from "../types";
import { type Clock, systemClock } from "../utils/clock";

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_USERS_LIMIT = 5;

const toEvent = (row: RestrictionEventRow): RestrictionEvent | undefined => {
	if (!isContentCategory(row.category)) {
		return undefined;
	}
	return {
		id: row.id,
		userId: row.user_id,
		chatId: row.chat_id,
		category: row.category,
		ordinal: row.ordinal,
		durationMinutes: row.duration_minutes,
		reason: row.reason ?? undefined,
		timestamp: row.timestamp,
	};
};

export class RestrictionLog {
	constructor(
		private readonly db: Database.Database,
		private readonly clock: Clock = systemClock,
	) {}

	/** Appends a restriction to the history, stamped with the current time */
	async record(event: NewRestrictionEvent): Promise<RestrictionEvent> {
		const timestamp = this.clock.now();
		const { lastInsertRowid } = withStore(this.db, "recordRestriction", () =>
			execute(
				this.db,
				`INSERT INTO restriction_events (user_id, chat_id, category, ordinal, duration_minutes, reason, timestamp)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
				[
					event.userId,
					event.chatId,
					event.category,
					event.ordinal,
					event.durationMinutes,
					event.reason ?? null,
					timestamp,
				],
			),
		);
		return { ...event, id: Number(lastInsertRowid), timestamp };
	}

	/**
	 * Summarizes the restrictions of a chat over the last `days` days.
	 *
	 * @example
	 * ```typescript
	 * const stats = await log.stats(-100123, 7);
	 * console.log(stats.totalRestrictions, stats.byCategory.sticker);
	 * ```
	 */
	async stats(chatId: number, days = 7): Promise<RestrictionStats> {
		const since = this.clock.now() - days * DAY_MS;

		return withStore(this.db, "restrictionStats", () => {
			const totals = get<{ total: number; minutes: number | null }>(
				this.db,
				`SELECT COUNT(*) AS total, SUM(duration_minutes) AS minutes
         FROM restriction_events WHERE chat_id = ? AND timestamp >= ?`,
				[chatId, since],
			);

			const byCategory: Partial<Record<ContentCategory, number>> = {};
			for (const row of query<{ category: string; total: number }>(
				this.db,
				`SELECT category, COUNT(*) AS total FROM restriction_events
         WHERE chat_id = ? AND timestamp >= ?
         GROUP BY category`,
				[chatId, since],
			)) {
				if (isContentCategory(row.category)) {
					byCategory[row.category] = row.total;
				}
			}

			const topUsers = query<{ user_id: number; total: number }>(
				this.db,
				`SELECT user_id, COUNT(*) AS total FROM restriction_events
         WHERE chat_id = ? AND timestamp >= ?
         GROUP BY user_id
         ORDER BY total DESC, MIN(id) ASC
         LIMIT ?`,
				[chatId, since, TOP_USERS_LIMIT],
			).map((row) => ({ userId: row.user_id, violationCount: row.total }));

			return {
				totalRestrictions: totals?.total ?? 0,
				byCategory,
				topUsers,
				totalMinutes: totals?.minutes ?? 0,
				periodDays: days,
			};
		});
	}

	/** Most recent restrictions of a member in a chat, newest first */
	async history(
		userId: number,
		chatId: number,
		limit = 10,
	): Promise<RestrictionEvent[]> {
		const rows = withStore(this.db, "restrictionHistory", () =>
			query<RestrictionEventRow>(
				this.db,
				`SELECT * FROM restriction_events WHERE user_id = ? AND chat_id = ?
         ORDER BY timestamp DESC, id DESC LIMIT ?`,
				[userId, chatId, limit],
			),
		);
		return rows.flatMap((row) => toEvent(row) ?? []);
	}
}
