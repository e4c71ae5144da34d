/**
 * Integration tests for the flood guard middleware
 *
 * Runs real Telegraf contexts through the middleware with a real engine on an
 * in-memory database. Chat actions land in a fake gateway; member lookups are
 * stubbed on the Telegram client.
 */

import type Database from 'better-sqlite3';
import { Telegram } from 'telegraf';
import type { MiddlewareFn, Context } from 'telegraf';
import type { Update } from 'telegraf/types';
import { createFloodGuardMiddleware } from '../../src/middleware/floodGuard';
import { ActivityLedger } from '../../src/services/activityLedger';
import { ChatPolicyStore } from '../../src/services/chatPolicyStore';
import { EscalationPolicy } from '../../src/services/escalationPolicy';
import { ExemptionRegistry } from '../../src/services/exemptionRegistry';
import { ModerationEngine } from '../../src/services/moderationEngine';
import { RestrictionLog } from '../../src/services/restrictionLog';
import { VerdictEnforcer } from '../../src/services/verdictEnforcer';
import { ViolationTracker } from '../../src/services/violationTracker';
import { FakeClock } from '../helpers/fakeClock';
import { FakeGateway } from '../helpers/fakeGateway';
import {
	TEST_ADMIN_ID,
	TEST_CHAT_ID,
	TEST_USER_ID,
	createContext,
	stickerUpdate,
	textUpdate,
} from '../helpers/mockContext';
import { createTestDatabase } from '../helpers/testDatabase';

const member = { id: TEST_USER_ID, is_bot: false, first_name: 'Alice' };

describe('Flood guard middleware', () => {
	let db: Database.Database;
	let clock: FakeClock;
	let gateway: FakeGateway;
	let engine: ModerationEngine;
	let telegram: Telegram;
	let guard: MiddlewareFn<Context>;

	beforeEach(() => {
		db = createTestDatabase();
		clock = new FakeClock();
		gateway = new FakeGateway();
		engine = new ModerationEngine({
			ledger: new ActivityLedger(db, clock),
			exemptions: new ExemptionRegistry(db, clock),
			policies: new ChatPolicyStore(db, { maxWindowSeconds: 86400 }, clock),
			tracker: new ViolationTracker(db, new EscalationPolicy(), clock),
			restrictionLog: new RestrictionLog(db, clock),
		});
		telegram = new Telegram('test-bot-token');
		vi.spyOn(telegram, 'getChatMember').mockResolvedValue({ status: 'member', user: member });
		guard = createFloodGuardMiddleware({
			engine,
			enforcer: new VerdictEnforcer(gateway),
			adminIds: [TEST_ADMIN_ID],
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
		if (db.open) db.close();
	});

	/** Runs one update through the guard and reports whether it passed on */
	async function deliver(update: Update): Promise<boolean> {
		const next = vi.fn(async () => undefined);
		await guard(createContext(update, telegram), next);
		return next.mock.calls.length > 0;
	}

	it('should pass, warn, then delete and restrict a sticker flood', async () => {
		expect(await deliver(stickerUpdate())).toBe(true);
		expect(gateway.sent).toEqual([]);

		expect(await deliver(stickerUpdate())).toBe(true);
		expect(gateway.sent.map((message) => message.text)).toEqual([
			'⚠️ Alice, slow down: 2/3 stickers in a short time. One more and you will be restricted.',
		]);

		expect(await deliver(stickerUpdate())).toBe(false);
		expect(gateway.deleted).toHaveLength(1);
		expect(gateway.restricted).toEqual([
			{ chatId: TEST_CHAT_ID, userId: TEST_USER_ID, untilDate: 1_700_000_600 },
		]);
		expect(gateway.sent[1]?.text).toBe('🚫 Alice sent 3 stickers (limit 3).\nViolation #1: media restricted for 10 min.');
	});

	it('should only delete further floods while the restriction lasts', async () => {
		for (let i = 0; i < 3; i++) {
			await deliver(stickerUpdate());
		}

		expect(await deliver(stickerUpdate())).toBe(false);
		expect(gateway.deleted).toHaveLength(2);
		expect(gateway.restricted).toHaveLength(1);
		expect(gateway.sent).toHaveLength(2);
	});

	it('should name members by username when they have one', async () => {
		await deliver(stickerUpdate({ username: 'alice' }));
		await deliver(stickerUpdate({ username: 'alice' }));

		expect(gateway.sent[0]?.text).toBe(
			'⚠️ @alice, slow down: 2/3 stickers in a short time. One more and you will be restricted.',
		);
	});

	it('should never evaluate configured admins', async () => {
		for (let i = 0; i < 5; i++) {
			expect(await deliver(stickerUpdate({ userId: TEST_ADMIN_ID }))).toBe(true);
		}

		expect(gateway.sent).toEqual([]);
		expect(telegram.getChatMember).not.toHaveBeenCalled();
	});

	it('should never evaluate chat administrators', async () => {
		vi.spyOn(telegram, 'getChatMember').mockResolvedValue({ status: 'creator', user: member, is_anonymous: false });

		for (let i = 0; i < 5; i++) {
			expect(await deliver(stickerUpdate())).toBe(true);
		}
		expect(gateway.restricted).toEqual([]);
	});

	it('should skip trusted members', async () => {
		await engine.grantExemption(TEST_USER_ID, TEST_CHAT_ID);

		for (let i = 0; i < 5; i++) {
			expect(await deliver(stickerUpdate())).toBe(true);
		}
		expect(gateway.sent).toEqual([]);
	});

	it('should count repeated text but ignore commands', async () => {
		for (let i = 0; i < 3; i++) {
			expect(await deliver(textUpdate('/status'))).toBe(true);
		}
		expect(gateway.sent).toEqual([]);

		await deliver(textUpdate('Buy now'));
		await deliver(textUpdate('  buy   NOW '));
		expect(gateway.sent.map((message) => message.text)).toEqual([
			'⚠️ Alice, slow down: 2/3 identical messages in a short time. One more and you will be restricted.',
		]);
	});

	it('should not count different text together', async () => {
		await deliver(textUpdate('hello'));
		await deliver(textUpdate('how are you'));
		await deliver(textUpdate('anyone here?'));

		expect(gateway.sent).toEqual([]);
	});

	it('should pass the message on when Telegram refuses the restriction', async () => {
		gateway.failing.add('restrict');
		for (let i = 0; i < 2; i++) {
			await deliver(stickerUpdate());
		}

		expect(await deliver(stickerUpdate())).toBe(true);
		expect(gateway.sent[1]?.text).toBe(
			'🚫 Alice sent 3 stickers (limit 3).\nViolation #1: media restricted for 10 min.\n' +
				'⚠️ Recorded but not enforced: I lack the admin rights to delete messages or restrict members here.',
		);
	});

	it('should allow messages when the store is unavailable', async () => {
		db.close();

		for (let i = 0; i < 4; i++) {
			expect(await deliver(stickerUpdate())).toBe(true);
		}
		expect(gateway.sent).toEqual([]);
		expect(gateway.deleted).toEqual([]);
	});
});
