/**
 * Main entry point for the flood warden bot.
 * Initializes the database, the moderation services and the Telegram bot,
 * registers middleware and commands, schedules ledger cleanup and handles
 * graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { registerHelpCommand } from "./commands/help";
import { registerModerationCommands } from "./commands/moderation";
import { registerSettingsCommands } from "./commands/settings";
import { config, validateConfig } from "./config";
import { initDb, openDatabase } from "./database";
import { TransientStoreError } from "./errors";
import { registerModerationActions } from "./handlers/moderationActions";
import { createFloodGuardMiddleware } from "./middleware/floodGuard";
import { ActivityLedger } from "./services/activityLedger";
import { ChatPolicyStore } from "./services/chatPolicyStore";
import { CleanupService } from "./services/cleanupService";
import { EscalationPolicy } from "./services/escalationPolicy";
import { ExemptionRegistry } from "./services/exemptionRegistry";
import { ModerationEngine } from "./services/moderationEngine";
import { RestrictionLog } from "./services/restrictionLog";
import { telegramGateway, VerdictEnforcer } from "./services/verdictEnforcer";
import { ViolationTracker } from "./services/violationTracker";
import { systemClock } from "./utils/clock";
import { logger, StructuredLogger, updateLogLevel } from "./utils/logger";

/**
 * Main initialization and startup function.
 *
 * Performs the following initialization sequence:
 * 1. Validates configuration from environment variables
 * 2. Opens the SQLite database and creates tables
 * 3. Wires the moderation services around one shared clock
 * 4. Registers the flood guard, the commands and the moderation buttons
 * 5. Starts the activity ledger cleanup
 * 6. Configures graceful shutdown handlers and launches the bot
 */
async function main(): Promise<void> {
	validateConfig();
	updateLogLevel(config.logLevel);

	const db = openDatabase(config.databasePath);
	initDb(db);

	const clock = systemClock;
	const escalation = new EscalationPolicy(config.escalation);
	const ledger = new ActivityLedger(db, clock);
	const engine = new ModerationEngine({
		ledger,
		exemptions: new ExemptionRegistry(db, clock),
		policies: new ChatPolicyStore(
			db,
			{ maxWindowSeconds: config.activity.retentionSeconds },
			clock,
		),
		tracker: new ViolationTracker(db, escalation, clock),
		restrictionLog: new RestrictionLog(db, clock),
	});
	const cleanup = new CleanupService(
		ledger,
		{
			retentionSeconds: config.activity.retentionSeconds,
			intervalMs: config.activity.cleanupIntervalMs,
		},
		clock,
	);

	const bot = new Telegraf(config.botToken);
	const gateway = telegramGateway(bot.telegram);

	bot.use(
		createFloodGuardMiddleware({
			engine,
			enforcer: new VerdictEnforcer(gateway),
			adminIds: config.adminIds,
		}),
	);

	registerHelpCommand(bot, escalation);
	registerModerationCommands(bot, { engine, gateway, adminIds: config.adminIds });
	registerSettingsCommands(bot, engine, config.adminIds);
	registerModerationActions(bot, { engine, gateway, adminIds: config.adminIds });

	bot.catch(async (error, ctx) => {
		StructuredLogger.logError(error, {
			userId: ctx.from?.id,
			chatId: ctx.chat?.id,
			operation: ctx.updateType,
		});
		if (error instanceof TransientStoreError) {
			await ctx.reply("⚠️ The moderation store is busy, please try again.").catch(
				(replyError: unknown) => {
					logger.warn("Failed to report error to chat", { replyError });
				},
			);
		}
	});

	cleanup.start();

	const shutdown = (signal: string) => {
		const { lastRunAt, lastDeleted } = cleanup.getStatus();
		logger.info("Shutting down", { signal, lastCleanupAt: lastRunAt, lastDeleted });
		cleanup.stop();
		bot.stop(signal);
		db.close();
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	logger.info("Flood warden started", {
		adminCount: config.adminIds.length,
		retentionSeconds: config.activity.retentionSeconds,
	});
	await bot.launch();
}

main().catch((error) => {
	logger.error("Failed to start bot", error);
	process.exit(1);
});
