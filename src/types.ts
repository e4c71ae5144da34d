/** Domain types and database entity types - snake_case row types match SQLite columns */

export const CONTENT_CATEGORIES = [
	"sticker",
	"animation",
	"text",
	"photo",
	"video",
] as const;

/** Content class being rate limited */
export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

export const POLICY_SLOTS = ["sticker", "text", "photo", "video"] as const;

/** Policy entry a category reads its threshold and window from */
export type PolicySlot = (typeof POLICY_SLOTS)[number];

/** Stickers and animations share the sticker limits */
export const CATEGORY_SLOT: Record<ContentCategory, PolicySlot> = {
	sticker: "sticker",
	animation: "sticker",
	text: "text",
	photo: "photo",
	video: "video",
};

/**
 * Categories counted per identical content. Stickers and animations count
 * regardless of which one was sent.
 */
export const FINGERPRINTED_CATEGORIES: ReadonlySet<ContentCategory> = new Set<ContentCategory>([
	"text",
	"photo",
	"video",
]);

export const isContentCategory = (value: string): value is ContentCategory =>
	CONTENT_CATEGORIES.some((category) => category === value);

export interface SlotLimits {
	/** Events in the window that trigger a restriction (1-20) */
	threshold: number;
	/** Trailing window length in seconds */
	windowSeconds: number;
}

export type PolicyField = keyof SlotLimits;

export interface ChatPolicy {
	chatId: number;
	slots: Record<PolicySlot, SlotLimits>;
	warnEnabled: boolean;
	/** False while the chat runs on the process-wide defaults */
	customized: boolean;
}

export interface PolicyDefaults {
	slots: Record<PolicySlot, SlotLimits>;
	warnEnabled: boolean;
}

export interface ViolationInfo {
	violationCount: number;
	/** Unix ms; absent when no restriction is recorded */
	restrictedUntil?: number;
	lastViolationAt?: number;
}

export interface EscalationResult {
	ordinal: number;
	durationMinutes: number;
	restrictedUntil: number;
}

export interface OffenderEntry {
	userId: number;
	violationCount: number;
}

export type Verdict =
	| { kind: "allow"; degraded?: boolean }
	| { kind: "warn"; count: number; threshold: number }
	| {
			kind: "restrict";
			ordinal: number;
			durationMinutes: number;
			count: number;
			threshold: number;
			restrictedUntil: number;
	  }
	// Over threshold while a restriction is running: delete, do not escalate
	| { kind: "already_restricted"; count: number; threshold: number };

export interface MemberStatus {
	violationCount: number;
	isRestricted: boolean;
	remainingMinutes?: number;
	isExempt: boolean;
}

export interface Exemption {
	userId: number;
	chatId: number;
	grantedBy?: number;
	grantedAt: number;
}

export interface RestrictionEvent {
	id: number;
	userId: number;
	chatId: number;
	category: ContentCategory;
	ordinal: number;
	durationMinutes: number;
	reason?: string;
	timestamp: number;
}

export type NewRestrictionEvent = Omit<RestrictionEvent, "id" | "timestamp">;

export interface RestrictionStats {
	totalRestrictions: number;
	byCategory: Partial<Record<ContentCategory, number>>;
	/** Most restricted members in the period, at most five */
	topUsers: OffenderEntry[];
	totalMinutes: number;
	periodDays: number;
}

// Row types

export interface ViolationRow {
	user_id: number;
	chat_id: number;
	violation_count: number;
	last_violation_at: number | null;
	restricted_until: number | null;
	created_at: number;
}

export interface ExemptionRow {
	user_id: number;
	chat_id: number;
	granted_by: number | null;
	granted_at: number;
}

export interface ChatPolicyRow {
	chat_id: number;
	sticker_threshold: number | null;
	sticker_window: number | null;
	text_threshold: number | null;
	text_window: number | null;
	photo_threshold: number | null;
	photo_window: number | null;
	video_threshold: number | null;
	video_window: number | null;
	warn_enabled: number | null;
	updated_at: number;
}

export interface RestrictionEventRow {
	id: number;
	user_id: number;
	chat_id: number;
	category: string;
	ordinal: number;
	duration_minutes: number;
	reason: string | null;
	timestamp: number;
}
