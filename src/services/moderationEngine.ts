/**
 * Moderation engine module.
 * Turns one inbound content event into a verdict and exposes the
 * operations admins run against the moderation state.
 *
 * @module services/moderationEngine
 */

import { TransientStoreError } from "../errors";
import {
	type ChatPolicy,
	type ContentCategory,
	type Exemption,
	FINGERPRINTED_CATEGORIES,
	type MemberStatus,
	type OffenderEntry,
	type PolicyField,
	type RestrictionEvent,
	type RestrictionStats,
	type Verdict,
} from "../types";
import { KeyedMutex, memberKey } from "../utils/keyedMutex";
import { logger, StructuredLogger } from "../utils/logger";
import type { ActivityLedger } from "./activityLedger";
import { type ChatPolicyStore, limitsFor } from "./chatPolicyStore";
import type { ExemptionRegistry } from "./exemptionRegistry";
import type { RestrictionLog } from "./restrictionLog";
import type { ViolationTracker } from "./violationTracker";

export interface ModerationEngineDeps {
	ledger: ActivityLedger;
	exemptions: ExemptionRegistry;
	policies: ChatPolicyStore;
	tracker: ViolationTracker;
	restrictionLog: RestrictionLog;
}

export class ModerationEngine {
	private readonly ledger: ActivityLedger;
	private readonly exemptions: ExemptionRegistry;
	private readonly policies: ChatPolicyStore;
	private readonly tracker: ViolationTracker;
	private readonly restrictionLog: RestrictionLog;
	private readonly mutex = new KeyedMutex();

	constructor(deps: ModerationEngineDeps) {
		this.ledger = deps.ledger;
		this.exemptions = deps.exemptions;
		this.policies = deps.policies;
		this.tracker = deps.tracker;
		this.restrictionLog = deps.restrictionLog;
	}

	/**
	 * Judges one content event.
	 *
	 * Every non-exempt event is recorded, whatever the verdict. When the
	 * store is unavailable the event is allowed and the verdict is marked
	 * `degraded`; moderation never blocks the message pipeline.
	 *
	 * @param fingerprint - Content key; ignored for stickers and animations,
	 *   which count regardless of which one was sent
	 *
	 * @example
	 * ```typescript
	 * const verdict = await engine.evaluate(123, -100456, 'text', fingerprintText(text));
	 * if (verdict.kind === 'restrict') {
	 *   console.log(`Restricted for ${verdict.durationMinutes} minutes`);
	 * }
	 * ```
	 */
	async evaluate(
		userId: number,
		chatId: number,
		category: ContentCategory,
		fingerprint?: string,
	): Promise<Verdict> {
		try {
			return await this.judge(userId, chatId, category, fingerprint);
		} catch (error) {
			if (error instanceof TransientStoreError) {
				logger.warn("Flood check degraded, allowing message", {
					userId,
					chatId,
					category,
					operation: error.operation,
					error: error.message,
				});
				return { kind: "allow", degraded: true };
			}
			throw error;
		}
	}

	private async judge(
		userId: number,
		chatId: number,
		category: ContentCategory,
		fingerprint?: string,
	): Promise<Verdict> {
		if (await this.exemptions.isExempt(userId, chatId)) {
			return { kind: "allow" };
		}

		const policy = await this.policies.get(chatId);
		const { threshold, windowSeconds } = limitsFor(policy, category);
		const count = await this.ledger.recordAndCount(
			userId,
			chatId,
			category,
			windowSeconds,
			FINGERPRINTED_CATEGORIES.has(category) ? fingerprint : undefined,
		);

		if (count >= threshold) {
			// Check and escalate as one step so simultaneous offenses escalate once
			return this.mutex.runExclusive(memberKey(userId, chatId), async (): Promise<Verdict> => {
				if (await this.tracker.isRestricted(userId, chatId)) {
					return { kind: "already_restricted", count, threshold };
				}

				const { ordinal, durationMinutes, restrictedUntil } =
					await this.tracker.escalate(userId, chatId);
				await this.logRestriction(userId, chatId, category, ordinal, durationMinutes, count);
				return {
					kind: "restrict",
					ordinal,
					durationMinutes,
					count,
					threshold,
					restrictedUntil,
				};
			});
		}

		if (policy.warnEnabled && count === threshold - 1) {
			return { kind: "warn", count, threshold };
		}
		return { kind: "allow" };
	}

	// The escalation already stands; a history failure only costs statistics
	private async logRestriction(
		userId: number,
		chatId: number,
		category: ContentCategory,
		ordinal: number,
		durationMinutes: number,
		count: number,
	): Promise<void> {
		try {
			await this.restrictionLog.record({
				userId,
				chatId,
				category,
				ordinal,
				durationMinutes,
				reason: `${count} ${category} messages in window`,
			});
		} catch (error) {
			StructuredLogger.logError(error, {
				userId,
				chatId,
				category,
				operation: "record_restriction",
			});
		}
	}

	/**
	 * Clears a member's violations, running restriction and recorded activity.
	 *
	 * @returns False if the member had no violation record
	 */
	async pardon(userId: number, chatId: number): Promise<boolean> {
		const pardoned = await this.tracker.pardon(userId, chatId);
		await this.ledger.clear(userId, chatId);
		return pardoned;
	}

	/** Ends a running restriction, keeping the violation count */
	async liftRestriction(userId: number, chatId: number): Promise<boolean> {
		return this.tracker.liftRestriction(userId, chatId);
	}

	async grantExemption(userId: number, chatId: number, grantedBy?: number): Promise<void> {
		await this.exemptions.grant(userId, chatId, grantedBy);
	}

	async revokeExemption(userId: number, chatId: number): Promise<boolean> {
		return this.exemptions.revoke(userId, chatId);
	}

	async listExemptions(chatId: number): Promise<Exemption[]> {
		return this.exemptions.list(chatId);
	}

	async getStatus(userId: number, chatId: number): Promise<MemberStatus> {
		const { violationCount } = await this.tracker.info(userId, chatId);
		const remainingMinutes = await this.tracker.remainingMinutes(userId, chatId);
		return {
			violationCount,
			isRestricted: remainingMinutes !== undefined,
			remainingMinutes,
			isExempt: await this.exemptions.isExempt(userId, chatId),
		};
	}

	async topOffenders(chatId: number, limit = 10): Promise<OffenderEntry[]> {
		return this.tracker.topOffenders(chatId, limit);
	}

	/** @throws {ValidationError} If the value is out of range */
	async setPolicy(
		chatId: number,
		category: ContentCategory,
		field: PolicyField,
		value: number,
	): Promise<ChatPolicy> {
		return this.policies.set(chatId, category, field, value);
	}

	async getPolicy(chatId: number): Promise<ChatPolicy> {
		return this.policies.get(chatId);
	}

	async setWarnings(chatId: number, enabled: boolean): Promise<ChatPolicy> {
		return this.policies.setWarnEnabled(chatId, enabled);
	}

	async resetPolicy(chatId: number): Promise<boolean> {
		return this.policies.reset(chatId);
	}

	async restrictionStats(chatId: number, days = 7): Promise<RestrictionStats> {
		return this.restrictionLog.stats(chatId, days);
	}

	/** A member's most recent restrictions in a chat, newest first */
	async restrictionHistory(userId: number, chatId: number, limit = 5): Promise<RestrictionEvent[]> {
		return this.restrictionLog.history(userId, chatId, limit);
	}
}
