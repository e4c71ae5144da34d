/**
 * Unit tests for the periodic ledger cleanup
 */

import type Database from 'better-sqlite3';
import { ActivityLedger } from '../../src/services/activityLedger';
import { CleanupService } from '../../src/services/cleanupService';
import { FakeClock } from '../helpers/fakeClock';
import { countRows, createTestDatabase } from '../helpers/testDatabase';

const INTERVAL_MS = 60_000;

describe('CleanupService', () => {
	let db: Database.Database;
	let clock: FakeClock;
	let ledger: ActivityLedger;
	let service: CleanupService;

	beforeEach(() => {
		db = createTestDatabase();
		clock = new FakeClock();
		ledger = new ActivityLedger(db, clock);
		service = new CleanupService(ledger, { retentionSeconds: 3600, intervalMs: INTERVAL_MS }, clock);
	});

	afterEach(() => {
		service.stop();
		vi.useRealTimers();
		vi.restoreAllMocks();
		db.close();
	});

	it('should prune old events on demand', async () => {
		await ledger.recordAndCount(1, -100, 'sticker', 30);
		clock.advanceSeconds(3601);
		await ledger.recordAndCount(1, -100, 'sticker', 30);

		expect(await service.runNow()).toBe(1);
		expect(countRows(db, 'activity_events')).toBe(1);
		expect(service.getStatus().lastDeleted).toBe(1);
	});

	it('should stamp the last run with the injected clock', async () => {
		expect(service.getStatus().lastRunAt).toBeNull();
		clock.advanceMinutes(5);

		await service.runNow();

		expect(service.getStatus().lastRunAt).toBe(1_700_000_300_000);
	});

	it('should run once at start and then on every interval until stopped', async () => {
		vi.useFakeTimers();
		const prune = vi.spyOn(ledger, 'prune');

		service.start();
		expect(prune).toHaveBeenCalledTimes(1);
		expect(prune).toHaveBeenCalledWith(3600);
		expect(service.getStatus().isRunning).toBe(true);

		await vi.advanceTimersByTimeAsync(INTERVAL_MS * 2);
		expect(prune).toHaveBeenCalledTimes(3);

		service.stop();
		await vi.advanceTimersByTimeAsync(INTERVAL_MS * 2);
		expect(prune).toHaveBeenCalledTimes(3);
		expect(service.getStatus().isRunning).toBe(false);
	});

	it('should not start twice', async () => {
		vi.useFakeTimers();
		const prune = vi.spyOn(ledger, 'prune');

		service.start();
		service.start();
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		expect(prune).toHaveBeenCalledTimes(2);
	});

	it('should keep running when a prune fails', async () => {
		vi.useFakeTimers();
		const prune = vi.spyOn(ledger, 'prune').mockRejectedValue(new Error('disk I/O error'));

		service.start();
		await vi.advanceTimersByTimeAsync(INTERVAL_MS);
		expect(prune).toHaveBeenCalledTimes(2);
		expect(service.getStatus().isRunning).toBe(true);
	});
});
