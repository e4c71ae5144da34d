/**
 * Chat policy store module.
 * Per-chat flood limits layered over process-wide defaults. A chat without
 * a stored row, or a column left NULL, reads the default.
 *
 * @module services/chatPolicyStore
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import { execute, get, withStore } from "../database";
import { ValidationError } from "../errors";
import {
	CATEGORY_SLOT,
	type ChatPolicy,
	type ChatPolicyRow,
	type ContentCategory,
	type PolicyDefaults,
	type PolicyField,
	type PolicySlot,
	type SlotLimits,
} from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { StructuredLogger } from "../utils/logger";

export const MIN_THRESHOLD = 1;
export const MAX_THRESHOLD = 20;

/** Limits used by every chat that has not been customized */
export const DEFAULT_POLICY: PolicyDefaults = {
	slots: {
		sticker: { threshold: 3, windowSeconds: 30 },
		text: { threshold: 3, windowSeconds: 20 },
		photo: { threshold: 3, windowSeconds: 30 },
		video: { threshold: 3, windowSeconds: 30 },
	},
	warnEnabled: true,
};

/** Columns backing each slot field. Only these names are ever interpolated into SQL. */
const SLOT_COLUMNS: Record<PolicySlot, Record<PolicyField, keyof ChatPolicyRow>> = {
	sticker: { threshold: "sticker_threshold", windowSeconds: "sticker_window" },
	text: { threshold: "text_threshold", windowSeconds: "text_window" },
	photo: { threshold: "photo_threshold", windowSeconds: "photo_window" },
	video: { threshold: "video_threshold", windowSeconds: "video_window" },
};

const thresholdSchema = z
	.number({ invalid_type_error: "threshold must be a number" })
	.int("threshold must be a whole number")
	.min(MIN_THRESHOLD, `threshold must be at least ${MIN_THRESHOLD}`)
	.max(MAX_THRESHOLD, `threshold must be at most ${MAX_THRESHOLD}`);

const windowSchema = (maxWindowSeconds: number) =>
	z
		.number({ invalid_type_error: "windowSeconds must be a number" })
		.int("windowSeconds must be a whole number of seconds")
		.positive("windowSeconds must be greater than 0")
		.max(
			maxWindowSeconds,
			`windowSeconds must not exceed the ${maxWindowSeconds}s activity retention`,
		);

/** Threshold and window a category is judged by under a policy */
export const limitsFor = (
	policy: ChatPolicy,
	category: ContentCategory,
): SlotLimits => policy.slots[CATEGORY_SLOT[category]];

export interface ChatPolicyStoreOptions {
	defaults?: PolicyDefaults;
	/** Upper bound for windows; the ledger prunes anything older */
	maxWindowSeconds: number;
}

export class ChatPolicyStore {
	private readonly defaults: PolicyDefaults;
	private readonly maxWindowSeconds: number;

	constructor(
		private readonly db: Database.Database,
		options: ChatPolicyStoreOptions,
		private readonly clock: Clock = systemClock,
	) {
		this.defaults = options.defaults ?? DEFAULT_POLICY;
		this.maxWindowSeconds = options.maxWindowSeconds;
	}

	/**
	 * Returns the effective policy of a chat. Never throws for unknown chats.
	 * Reads the store on every call so updates are visible immediately.
	 */
	async get(chatId: number): Promise<ChatPolicy> {
		const row = withStore(this.db, "getPolicy", () =>
			get<ChatPolicyRow>(this.db, "SELECT * FROM chat_policies WHERE chat_id = ?", [
				chatId,
			]),
		);
		return this.merge(chatId, row);
	}

	/**
	 * Overrides one limit of the slot the category belongs to.
	 * Animation shares the sticker slot, so setting either changes both.
	 *
	 * @throws {ValidationError} If the value is out of range; nothing is written
	 *
	 * @example
	 * ```typescript
	 * await policies.set(-100123, 'text', 'threshold', 5);
	 * await policies.set(-100123, 'sticker', 'windowSeconds', 60);
	 * ```
	 */
	async set(
		chatId: number,
		category: ContentCategory,
		field: PolicyField,
		value: number,
	): Promise<ChatPolicy> {
		const schema =
			field === "threshold" ? thresholdSchema : windowSchema(this.maxWindowSeconds);
		const parsed = schema.safeParse(value);
		if (!parsed.success) {
			throw new ValidationError(
				field,
				parsed.error.issues[0]?.message ?? `invalid ${field}`,
			);
		}

		const slot = CATEGORY_SLOT[category];
		this.upsert(chatId, SLOT_COLUMNS[slot][field], parsed.data);

		StructuredLogger.logUserAction("Chat policy updated", {
			chatId,
			category,
			slot,
			field,
			value: parsed.data,
			operation: "set_policy",
		});
		return this.get(chatId);
	}

	/** Turns the one-below-threshold warning on or off */
	async setWarnEnabled(chatId: number, enabled: boolean): Promise<ChatPolicy> {
		this.upsert(chatId, "warn_enabled", enabled ? 1 : 0);

		StructuredLogger.logUserAction("Chat warnings toggled", {
			chatId,
			enabled,
			operation: "set_warnings",
		});
		return this.get(chatId);
	}

	/**
	 * Drops every override of a chat.
	 *
	 * @returns False if the chat was already on the defaults
	 */
	async reset(chatId: number): Promise<boolean> {
		const { changes } = withStore(this.db, "resetPolicy", () =>
			execute(this.db, "DELETE FROM chat_policies WHERE chat_id = ?", [chatId]),
		);
		return changes > 0;
	}

	private upsert(chatId: number, column: keyof ChatPolicyRow, value: number): void {
		withStore(this.db, "setPolicy", () =>
			execute(
				this.db,
				`INSERT INTO chat_policies (chat_id, ${column}, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(chat_id) DO UPDATE SET ${column} = excluded.${column}, updated_at = excluded.updated_at`,
				[chatId, value, this.clock.now()],
			),
		);
	}

	private merge(chatId: number, row: ChatPolicyRow | undefined): ChatPolicy {
		const slotFrom = (slot: PolicySlot): SlotLimits => {
			const fallback = this.defaults.slots[slot];
			const columns = SLOT_COLUMNS[slot];
			return {
				threshold: this.column(row, columns.threshold) ?? fallback.threshold,
				windowSeconds:
					this.column(row, columns.windowSeconds) ?? fallback.windowSeconds,
			};
		};

		const warn = row?.warn_enabled;
		return {
			chatId,
			slots: {
				sticker: slotFrom("sticker"),
				text: slotFrom("text"),
				photo: slotFrom("photo"),
				video: slotFrom("video"),
			},
			warnEnabled:
				warn === null || warn === undefined ? this.defaults.warnEnabled : warn === 1,
			customized: row !== undefined,
		};
	}

	private column(
		row: ChatPolicyRow | undefined,
		column: keyof ChatPolicyRow,
	): number | undefined {
		return row?.[column] ?? undefined;
	}
}
