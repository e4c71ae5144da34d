/**
 * Cleanup Service
 * Periodically prunes the activity ledger past its retention horizon
 *
 * @module services/cleanupService
 */

import { type Clock, systemClock } from "../utils/clock";
import { logger } from "../utils/logger";
import type { ActivityLedger } from "./activityLedger";

export interface CleanupOptions {
	retentionSeconds: number;
	intervalMs: number;
}

export interface CleanupStatus {
	isRunning: boolean;
	lastRunAt: number | null;
	lastDeleted: number;
	intervalMs: number;
}

export class CleanupService {
	private intervalId: NodeJS.Timeout | null = null;
	private lastRunAt: number | null = null;
	private lastDeleted = 0;

	constructor(
		private readonly ledger: ActivityLedger,
		private readonly options: CleanupOptions,
		private readonly clock: Clock = systemClock,
	) {}

	/**
	 * Start the periodic cleanup. Runs once immediately, then every
	 * `intervalMs`.
	 */
	start(): void {
		if (this.intervalId) {
			logger.warn("CleanupService already running");
			return;
		}

		this.intervalId = setInterval(() => {
			this.runNow().catch((error) => {
				logger.error("Activity cleanup failed", error);
			});
		}, this.options.intervalMs);

		this.runNow().catch((error) => {
			logger.error("Initial activity cleanup failed", error);
		});

		logger.info("CleanupService started", {
			intervalMs: this.options.intervalMs,
			retentionSeconds: this.options.retentionSeconds,
		});
	}

	/**
	 * Stop the periodic cleanup
	 */
	stop(): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
			logger.info("CleanupService stopped");
		}
	}

	/**
	 * Prune now.
	 *
	 * @returns Number of deleted events
	 * @throws {TransientStoreError} If the database is unavailable
	 */
	async runNow(): Promise<number> {
		const deleted = await this.ledger.prune(this.options.retentionSeconds);
		this.lastRunAt = this.clock.now();
		this.lastDeleted = deleted;
		return deleted;
	}

	getStatus(): CleanupStatus {
		return {
			isRunning: this.intervalId !== null,
			lastRunAt: this.lastRunAt,
			lastDeleted: this.lastDeleted,
			intervalMs: this.options.intervalMs,
		};
	}
}
