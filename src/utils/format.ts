/**
 * Bot message builders.
 * All replies go through Telegraf's Format module (entity based, no escaping).
 *
 * @module utils/format
 */

import { bold, code, type FmtString, fmt, join } from "telegraf/format";
import type {
	ChatPolicy,
	ContentCategory,
	Exemption,
	MemberStatus,
	OffenderEntry,
	PolicySlot,
	RestrictionEvent,
	RestrictionStats,
	Verdict,
} from "../types";

const CATEGORY_LABELS: Record<ContentCategory, string> = {
	sticker: "stickers",
	animation: "GIFs",
	text: "identical messages",
	photo: "identical photos",
	video: "identical videos",
};

const SLOT_LABELS: Record<PolicySlot, string> = {
	sticker: "Stickers & GIFs",
	text: "Text",
	photo: "Photos",
	video: "Videos",
};

export const categoryLabel = (category: ContentCategory): string =>
	CATEGORY_LABELS[category];

/**
 * Formats a duration given in minutes.
 *
 * @example
 * ```typescript
 * formatDuration(45);   // "45 min"
 * formatDuration(90);   // "1h 30min"
 * formatDuration(1500); // "1d 1h"
 * ```
 */
export function formatDuration(minutes: number): string {
	if (minutes < 60) {
		return `${minutes} min`;
	}
	const hours = Math.floor(minutes / 60);
	const mins = minutes % 60;
	if (hours >= 24) {
		const days = Math.floor(hours / 24);
		const restHours = hours % 24;
		return restHours === 0 ? `${days}d` : `${days}d ${restHours}h`;
	}
	return mins === 0 ? `${hours}h` : `${hours}h ${mins}min`;
}

type WarnVerdict = Extract<Verdict, { kind: "warn" }>;
type RestrictVerdict = Extract<Verdict, { kind: "restrict" }>;

export const warningMessage = (
	name: string,
	category: ContentCategory,
	verdict: WarnVerdict,
): FmtString =>
	fmt`⚠️ ${bold(name)}, slow down: ${verdict.count}/${verdict.threshold} ${categoryLabel(category)} in a short time. One more and you will be restricted.`;

/**
 * Announcement for a restriction. When Telegram refused to apply it the
 * violation still counts, and the message says so.
 */
export const restrictionMessage = (
	name: string,
	category: ContentCategory,
	verdict: RestrictVerdict,
	enforced: boolean,
): FmtString => {
	const headline = fmt`🚫 ${bold(name)} sent ${verdict.count} ${categoryLabel(category)} (limit ${verdict.threshold}).
Violation #${verdict.ordinal}: media restricted for ${formatDuration(verdict.durationMinutes)}.`;

	return enforced
		? headline
		: fmt`${headline}
⚠️ Recorded but not enforced: I lack the admin rights to delete messages or restrict members here.`;
};

export const statusMessage = (userId: number, status: MemberStatus): FmtString => {
	const restriction =
		status.remainingMinutes !== undefined
			? `restricted, ${formatDuration(status.remainingMinutes)} left`
			: "not restricted";
	return fmt`${bold("Status of")} ${code(String(userId))}
Violations: ${String(status.violationCount)}
Restriction: ${restriction}
Trusted: ${status.isExempt ? "yes" : "no"}`;
};

/**
 * A member's record with their most recent restrictions, for the Info button.
 */
export const memberInfoMessage = (
	userId: number,
	status: MemberStatus,
	history: RestrictionEvent[],
): FmtString => {
	if (history.length === 0) {
		return statusMessage(userId, status);
	}
	const lines = history.map(
		(event) =>
			`#${event.ordinal} ${categoryLabel(event.category)}, ${formatDuration(event.durationMinutes)}`,
	);
	return fmt`${statusMessage(userId, status)}

${bold("Recent restrictions")}
${join(lines, "\n")}`;
};

export const liftedMessage = (userId: number): FmtString =>
	fmt`🔓 Restriction lifted for ${code(String(userId))}.`;

export const nothingToLiftMessage = (userId: number): FmtString =>
	fmt`${code(String(userId))} has no violations in this chat.`;

export const pardonedMessage = (userId: number): FmtString =>
	fmt`🕊 ${code(String(userId))} has been pardoned. Violations reset to 0.`;

export const nothingToPardonMessage = (userId: number): FmtString =>
	fmt`${code(String(userId))} has nothing to pardon.`;

export const topOffendersMessage = (entries: OffenderEntry[]): FmtString => {
	if (entries.length === 0) {
		return fmt`No violations recorded in this chat.`;
	}
	const lines = entries.map(
		(entry, index) => fmt`${index + 1}. ${code(String(entry.userId))}: ${entry.violationCount}`,
	);
	return fmt`${bold("Top offenders")}
${join(lines, "\n")}`;
};

export const policyMessage = (policy: ChatPolicy): FmtString => {
	const slots: PolicySlot[] = ["sticker", "text", "photo", "video"];
	const lines = slots.map((slot) => {
		const { threshold, windowSeconds } = policy.slots[slot];
		return fmt`${SLOT_LABELS[slot]}: ${threshold} in ${windowSeconds}s`;
	});
	return fmt`${bold("Flood limits")}${policy.customized ? "" : " (defaults)"}
${join(lines, "\n")}
Warnings: ${policy.warnEnabled ? "on" : "off"}`;
};

export const statsMessage = (stats: RestrictionStats): FmtString => {
	if (stats.totalRestrictions === 0) {
		return fmt`No restrictions in the last ${stats.periodDays} days.`;
	}

	const categories = Object.entries(stats.byCategory).map(
		([category, total]) => fmt`${category}: ${String(total ?? 0)}`,
	);
	const users = stats.topUsers.map(
		(entry, index) => fmt`${index + 1}. ${code(String(entry.userId))}: ${entry.violationCount}`,
	);

	return fmt`${bold(`Restrictions, last ${stats.periodDays} days`)}
Total: ${stats.totalRestrictions} (${formatDuration(stats.totalMinutes)} in total)
${join(categories, "\n")}

${bold("Most restricted")}
${join(users, "\n")}`;
};

export const exemptionsMessage = (exemptions: Exemption[]): FmtString => {
	if (exemptions.length === 0) {
		return fmt`No trusted members in this chat.`;
	}
	const lines = exemptions.map((exemption) => fmt`• ${code(String(exemption.userId))}`);
	return fmt`${bold(`Trusted members (${exemptions.length})`)}
${join(lines, "\n")}`;
};
