/** Maps inbound Telegram messages to the content events the flood check counts */

import { createHash } from "crypto";
import type { ContentCategory } from "../types";

/** The parts of a Telegram message triage looks at */
export interface TriageMessage {
	message_id: number;
	text?: string;
	entities?: ReadonlyArray<{ type: string; offset: number }>;
	sticker?: { file_unique_id: string };
	animation?: { file_unique_id: string };
	photo?: ReadonlyArray<{ file_unique_id: string }>;
	video?: { file_unique_id: string };
}

export interface ContentEvent {
	category: ContentCategory;
	fingerprint?: string;
}

/**
 * SHA-256 of the text with case and surrounding or repeated whitespace
 * ignored, so "Buy now" and "  buy   NOW " count as the same message.
 */
export const fingerprintText = (text: string): string =>
	createHash("sha256")
		.update(text.trim().replace(/\s+/g, " ").toLowerCase())
		.digest("hex");

const isCommand = (message: TriageMessage): boolean =>
	message.entities?.some(
		(entity) => entity.type === "bot_command" && entity.offset === 0,
	) ?? false;

/**
 * Classifies a message, or returns null when it is not rate limited
 * (commands, empty text, service messages, other media).
 *
 * Animations are checked before anything else: Telegram also sets
 * `document` on them, and some clients attach a caption.
 */
export function triageMessage(message: TriageMessage): ContentEvent | null {
	if (message.animation) {
		return { category: "animation" };
	}
	if (message.sticker) {
		return { category: "sticker" };
	}
	if (message.photo && message.photo.length > 0) {
		// Sizes are ordered smallest first
		const largest = message.photo[message.photo.length - 1];
		return largest
			? { category: "photo", fingerprint: largest.file_unique_id }
			: null;
	}
	if (message.video) {
		return { category: "video", fingerprint: message.video.file_unique_id };
	}
	if (message.text !== undefined && !isCommand(message)) {
		if (message.text.trim() === "") {
			return null;
		}
		return { category: "text", fingerprint: fingerprintText(message.text) };
	}
	return null;
}
