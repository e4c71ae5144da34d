/**
 * Configuration module for the flood warden bot.
 * Loads environment variables and provides a typed configuration object.
 * Validates required configuration values on startup.
 *
 * @module config
 */

import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { logger } from "./utils/logger";

// Load environment variables from .env file
dotenv.config({ path: resolve(__dirname, "../.env") });

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
export interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/** Telegram user IDs allowed to moderate in every chat (comma-separated ADMIN_IDS) */
	adminIds: number[];

	/** File path to SQLite database */
	databasePath: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;

	/** Activity ledger retention and cleanup schedule */
	activity: {
		/** Events older than this are pruned */
		retentionSeconds: number;
		/** How often the cleanup job runs */
		cleanupIntervalMs: number;
	};

	/** Restriction length per violation ordinal */
	escalation: {
		/** Minutes for ordinals 1..N */
		steps: number[];
		/** Minutes for every ordinal beyond N */
		defaultMinutes: number;
	};
}

/**
 * Parses a comma-separated list of integers, skipping anything that is not one.
 */
export function parseIntList(raw: string | undefined): number[] {
	return (raw || "")
		.split(",")
		.map((value) => parseInt(value.trim(), 10))
		.filter((value) => !Number.isNaN(value));
}

/**
 * Reads a positive integer from the environment, falling back to the default
 * when the variable is missing or malformed.
 */
export function positiveIntFromEnv(
	raw: string | undefined,
	fallback: number,
): number {
	const parsed = parseInt(raw || "", 10);
	return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

const escalationSteps = parseIntList(process.env.ESCALATION_MINUTES).filter(
	(minutes) => minutes > 0,
);

/**
 * Main configuration object populated from environment variables.
 * Falls back to default values where appropriate.
 */
export const config: Config = {
	botToken: process.env.BOT_TOKEN || "",
	adminIds: parseIntList(process.env.ADMIN_IDS),
	databasePath: process.env.DATABASE_PATH || "./data/floodwarden.db",
	logLevel: process.env.LOG_LEVEL || "info",
	activity: {
		retentionSeconds:
			positiveIntFromEnv(process.env.ACTIVITY_RETENTION_HOURS, 24) * 60 * 60,
		cleanupIntervalMs:
			positiveIntFromEnv(process.env.CLEANUP_INTERVAL_MINUTES, 60) * 60 * 1000,
	},
	escalation: {
		steps: escalationSteps.length > 0 ? escalationSteps : [10, 60, 300, 1440],
		defaultMinutes: positiveIntFromEnv(
			process.env.ESCALATION_DEFAULT_MINUTES,
			2880,
		),
	},
};

/**
 * Validates that all required configuration values are present and valid.
 * Called at bot startup before anything touches Telegram or the database.
 *
 * @throws {Error} If BOT_TOKEN is not set
 */
export function validateConfig(): void {
	if (!config.botToken) {
		throw new Error("BOT_TOKEN is required in environment variables");
	}

	if (config.adminIds.length === 0) {
		logger.warn(
			"ADMIN_IDS not set - only chat administrators will be able to moderate",
		);
	}
}
