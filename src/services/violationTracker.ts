/**
 * Violation tracker service module.
 * Keeps one record per member and chat: how many times the member has been
 * restricted there, and until when the current restriction runs.
 *
 * Expiry is computed against the clock, never stored: once
 * `restrictedUntil` passes, the member reads as unrestricted while the count
 * stays as it was.
 *
 * @module services/violationTracker
 */

import type Database from "better-sqlite3";
import { execute, get, query, withStore } from "../database";
import type {
	EscalationResult,
	OffenderEntry,
	ViolationInfo,
	ViolationRow,
} from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { KeyedMutex, memberKey } from "../utils/keyedMutex";
import { StructuredLogger } from "../utils/logger";
import { EscalationPolicy } from "./escalationPolicy";

const MINUTE_MS = 60 * 1000;

export class ViolationTracker {
	private readonly mutex = new KeyedMutex();

	constructor(
		private readonly db: Database.Database,
		private readonly escalation: EscalationPolicy = new EscalationPolicy(),
		private readonly clock: Clock = systemClock,
	) {}

	/** Current record of a member; a zero count when none exists */
	async info(userId: number, chatId: number): Promise<ViolationInfo> {
		const row = this.row(userId, chatId);
		return {
			violationCount: row?.violation_count ?? 0,
			restrictedUntil: row?.restricted_until ?? undefined,
			lastViolationAt: row?.last_violation_at ?? undefined,
		};
	}

	/** True while `restrictedUntil` lies strictly in the future */
	async isRestricted(userId: number, chatId: number): Promise<boolean> {
		const until = this.row(userId, chatId)?.restricted_until;
		return until !== null && until !== undefined && until > this.clock.now();
	}

	/**
	 * Whole minutes left on the running restriction, rounded down.
	 *
	 * @returns undefined when the member is not restricted
	 */
	async remainingMinutes(
		userId: number,
		chatId: number,
	): Promise<number | undefined> {
		const until = this.row(userId, chatId)?.restricted_until;
		const now = this.clock.now();
		if (until === null || until === undefined || until <= now) {
			return undefined;
		}
		return Math.floor((until - now) / MINUTE_MS);
	}

	/**
	 * Records one more violation and starts the restriction it earns.
	 * Concurrent calls for one member never see the same prior count.
	 *
	 * @example
	 * ```typescript
	 * const { ordinal, durationMinutes } = await tracker.escalate(123, -100456);
	 * // first offense: ordinal 1, 10 minutes
	 * ```
	 */
	async escalate(userId: number, chatId: number): Promise<EscalationResult> {
		const result = await this.mutex.runExclusive(memberKey(userId, chatId), () =>
			withStore(this.db, "escalate", () =>
				this.db.transaction((): EscalationResult => {
					const now = this.clock.now();
					const ordinal = (this.row(userId, chatId)?.violation_count ?? 0) + 1;
					const durationMinutes = this.escalation.durationFor(ordinal);
					const restrictedUntil = now + durationMinutes * MINUTE_MS;

					execute(
						this.db,
						`INSERT INTO violations (user_id, chat_id, violation_count, last_violation_at, restricted_until, created_at)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT(user_id, chat_id) DO UPDATE SET
               violation_count = excluded.violation_count,
               last_violation_at = excluded.last_violation_at,
               restricted_until = excluded.restricted_until`,
						[userId, chatId, ordinal, now, restrictedUntil, now],
					);
					return { ordinal, durationMinutes, restrictedUntil };
				})(),
			),
		);

		StructuredLogger.logSecurityEvent("Member restricted", {
			userId,
			chatId,
			operation: "escalate",
			ordinal: result.ordinal,
			durationMinutes: result.durationMinutes,
		});
		return result;
	}

	/**
	 * Ends the running restriction early. The count is kept, so the next
	 * offense continues the escalation ladder.
	 *
	 * @returns False if the member has no record in this chat
	 */
	async liftRestriction(userId: number, chatId: number): Promise<boolean> {
		const changes = await this.mutex.runExclusive(memberKey(userId, chatId), () =>
			withStore(
				this.db,
				"liftRestriction",
				() =>
					execute(
						this.db,
						"UPDATE violations SET restricted_until = NULL WHERE user_id = ? AND chat_id = ?",
						[userId, chatId],
					).changes,
			),
		);

		if (changes > 0) {
			StructuredLogger.logUserAction("Restriction lifted", {
				userId,
				chatId,
				operation: "lift_restriction",
			});
		}
		return changes > 0;
	}

	/**
	 * Clears the count and any running restriction.
	 *
	 * @returns False if the member has no record in this chat
	 */
	async pardon(userId: number, chatId: number): Promise<boolean> {
		const changes = await this.mutex.runExclusive(memberKey(userId, chatId), () =>
			withStore(
				this.db,
				"pardon",
				() =>
					execute(
						this.db,
						`UPDATE violations SET violation_count = 0, restricted_until = NULL
             WHERE user_id = ? AND chat_id = ?`,
						[userId, chatId],
					).changes,
			),
		);

		if (changes > 0) {
			StructuredLogger.logUserAction("Member pardoned", {
				userId,
				chatId,
				operation: "pardon",
			});
		}
		return changes > 0;
	}

	/**
	 * Members of a chat with the most violations. Equal counts keep the order
	 * in which the members were first recorded; zero counts are left out.
	 */
	async topOffenders(chatId: number, limit = 10): Promise<OffenderEntry[]> {
		return withStore(this.db, "topOffenders", () =>
			query<{ user_id: number; violation_count: number }>(
				this.db,
				`SELECT user_id, violation_count FROM violations
         WHERE chat_id = ? AND violation_count > 0
         ORDER BY violation_count DESC, rowid ASC
         LIMIT ?`,
				[chatId, Math.max(0, Math.floor(limit))],
			).map((row) => ({ userId: row.user_id, violationCount: row.violation_count })),
		);
	}

	private row(userId: number, chatId: number): ViolationRow | undefined {
		return withStore(this.db, "violationInfo", () =>
			get<ViolationRow>(
				this.db,
				"SELECT * FROM violations WHERE user_id = ? AND chat_id = ?",
				[userId, chatId],
			),
		);
	}
}
