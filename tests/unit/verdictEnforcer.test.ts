/**
 * Unit tests for verdict enforcement
 * Tests chat actions per verdict and the recorded-but-not-enforced outcome
 */

import { type EnforcementTarget, VerdictEnforcer, restoreMember } from '../../src/services/verdictEnforcer';
import type { Verdict } from '../../src/types';
import { FakeGateway } from '../helpers/fakeGateway';

const target: EnforcementTarget = {
	chatId: -100500,
	userId: 1001,
	messageId: 77,
	name: '@alice',
	category: 'sticker',
};

const restrict: Verdict = {
	kind: 'restrict',
	ordinal: 1,
	durationMinutes: 10,
	count: 3,
	threshold: 3,
	restrictedUntil: 1_700_000_600_000,
};

describe('VerdictEnforcer', () => {
	let gateway: FakeGateway;
	let enforcer: VerdictEnforcer;

	beforeEach(() => {
		gateway = new FakeGateway();
		enforcer = new VerdictEnforcer(gateway);
	});

	it('should do nothing for allow', async () => {
		expect(await enforcer.enforce(target, { kind: 'allow' })).toBe('allowed');
		expect(gateway.sent).toEqual([]);
		expect(gateway.deleted).toEqual([]);
	});

	it('should reply with a warning', async () => {
		expect(await enforcer.enforce(target, { kind: 'warn', count: 2, threshold: 3 })).toBe('warned');
		expect(gateway.sent).toEqual([
			{
				chatId: -100500,
				text: '⚠️ @alice, slow down: 2/3 stickers in a short time. One more and you will be restricted.',
				replyTo: 77,
			},
		]);
	});

	it('should still report warned when the reply fails', async () => {
		gateway.failing.add('send');
		expect(await enforcer.enforce(target, { kind: 'warn', count: 2, threshold: 3 })).toBe('warned');
	});

	it('should only delete while already restricted', async () => {
		expect(await enforcer.enforce(target, { kind: 'already_restricted', count: 4, threshold: 3 })).toBe(
			'deleted',
		);
		expect(gateway.deleted).toEqual([{ chatId: -100500, messageId: 77 }]);
		expect(gateway.restricted).toEqual([]);
		expect(gateway.sent).toEqual([]);
	});

	it('should delete, restrict until the expiry and announce', async () => {
		expect(await enforcer.enforce(target, restrict)).toBe('restricted');
		expect(gateway.deleted).toEqual([{ chatId: -100500, messageId: 77 }]);
		expect(gateway.restricted).toEqual([{ chatId: -100500, userId: 1001, untilDate: 1_700_000_600 }]);
		expect(gateway.sent.map((message) => message.text)).toEqual([
			'🚫 @alice sent 3 stickers (limit 3).\nViolation #1: media restricted for 10 min.',
		]);
	});

	it('should attach moderation buttons to the announcement only', async () => {
		await enforcer.enforce(target, { kind: 'warn', count: 2, threshold: 3 });
		await enforcer.enforce(target, restrict);

		expect(gateway.sent[0]?.keyboard).toBeUndefined();
		const buttons = gateway.sent[1]?.keyboard?.inline_keyboard.flat() ?? [];
		expect(buttons.map((button) => button.text)).toEqual(['🔓 Unban', '🕊 Pardon', 'ℹ️ Info']);
		expect(buttons.map((button) => ('callback_data' in button ? button.callback_data : undefined))).toEqual([
			'unban_1001',
			'pardon_1001',
			'userinfo_1001',
		]);
	});

	it('should report recorded but not enforced when Telegram refuses the restriction', async () => {
		gateway.failing.add('restrict');

		expect(await enforcer.enforce(target, restrict)).toBe('recorded_not_enforced');
		expect(gateway.sent.map((message) => message.text)).toEqual([
			'🚫 @alice sent 3 stickers (limit 3).\nViolation #1: media restricted for 10 min.\n' +
				'⚠️ Recorded but not enforced: I lack the admin rights to delete messages or restrict members here.',
		]);
	});

	it('should report recorded but not enforced when the delete fails', async () => {
		gateway.failing.add('delete');
		expect(await enforcer.enforce(target, restrict)).toBe('recorded_not_enforced');
		expect(gateway.restricted).toHaveLength(1);
	});

	describe('restoreMember', () => {
		it('should lift the member in the chat', async () => {
			expect(await restoreMember(gateway, -100500, 1001)).toBe(true);
			expect(gateway.lifted).toEqual([{ chatId: -100500, userId: 1001 }]);
		});

		it('should report a refused lift without throwing', async () => {
			gateway.failing.add('lift');
			expect(await restoreMember(gateway, -100500, 1001)).toBe(false);
		});
	});
});
