/** Per-chat exemptions from flood detection ("trusted" members) */

import type Database from "better-sqlite3";
import { execute, get, query, withStore } from "../database";
import type { Exemption, ExemptionRow } from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { StructuredLogger } from "../utils/logger";

const toExemption = (row: ExemptionRow): Exemption => ({
	userId: row.user_id,
	chatId: row.chat_id,
	grantedBy: row.granted_by ?? undefined,
	grantedAt: row.granted_at,
});

export class ExemptionRegistry {
	constructor(
		private readonly db: Database.Database,
		private readonly clock: Clock = systemClock,
	) {}

	/** Whether the member bypasses detection in this chat */
	async isExempt(userId: number, chatId: number): Promise<boolean> {
		return withStore(
			this.db,
			"isExempt",
			() =>
				get<{ found: number }>(
					this.db,
					"SELECT 1 AS found FROM exemptions WHERE user_id = ? AND chat_id = ?",
					[userId, chatId],
				) !== undefined,
		);
	}

	/**
	 * Exempts a member in a chat. Granting twice keeps the first grant.
	 *
	 * @param grantedBy - Admin who granted the exemption
	 */
	async grant(userId: number, chatId: number, grantedBy?: number): Promise<void> {
		const { changes } = withStore(this.db, "grantExemption", () =>
			execute(
				this.db,
				`INSERT INTO exemptions (user_id, chat_id, granted_by, granted_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id, chat_id) DO NOTHING`,
				[userId, chatId, grantedBy ?? null, this.clock.now()],
			),
		);

		if (changes > 0) {
			StructuredLogger.logUserAction("Exemption granted", {
				userId,
				chatId,
				grantedBy,
				operation: "grant_exemption",
			});
		}
	}

	/**
	 * Removes an exemption.
	 *
	 * @returns False if the member was not exempt
	 */
	async revoke(userId: number, chatId: number): Promise<boolean> {
		const { changes } = withStore(this.db, "revokeExemption", () =>
			execute(
				this.db,
				"DELETE FROM exemptions WHERE user_id = ? AND chat_id = ?",
				[userId, chatId],
			),
		);

		if (changes > 0) {
			StructuredLogger.logUserAction("Exemption revoked", {
				userId,
				chatId,
				operation: "revoke_exemption",
			});
		}
		return changes > 0;
	}

	/** All exemptions of a chat, oldest grant first */
	async list(chatId: number): Promise<Exemption[]> {
		return withStore(this.db, "listExemptions", () =>
			query<ExemptionRow>(
				this.db,
				"SELECT * FROM exemptions WHERE chat_id = ? ORDER BY granted_at ASC, rowid ASC",
				[chatId],
			).map(toExemption),
		);
	}
}
