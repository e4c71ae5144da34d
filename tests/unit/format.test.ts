/**
 * Unit tests for bot message builders
 */

import { DEFAULT_POLICY } from '../../src/services/chatPolicyStore';
import {
	exemptionsMessage,
	formatDuration,
	memberInfoMessage,
	policyMessage,
	statsMessage,
	statusMessage,
	topOffendersMessage,
} from '../../src/utils/format';

describe('Message formatting', () => {
	describe('formatDuration', () => {
		it('should format every step of the default ladder', () => {
			expect([10, 60, 300, 1440, 2880].map(formatDuration)).toEqual(['10 min', '1h', '5h', '1d', '2d']);
		});

		it('should include leftover minutes and hours', () => {
			expect(formatDuration(90)).toBe('1h 30min');
			expect(formatDuration(1500)).toBe('1d 1h');
			expect(formatDuration(0)).toBe('0 min');
		});
	});

	it('should describe a member status', () => {
		expect(
			statusMessage(1001, { violationCount: 0, isRestricted: false, isExempt: true }).text,
		).toBe('Status of 1001\nViolations: 0\nRestriction: not restricted\nTrusted: yes');
	});

	it('should show the time left on a restriction', () => {
		expect(
			statusMessage(1001, { violationCount: 2, isRestricted: true, remainingMinutes: 45, isExempt: false }).text,
		).toBe('Status of 1001\nViolations: 2\nRestriction: restricted, 45 min left\nTrusted: no');
	});

	it('should add recent restrictions to the member record', () => {
		const status = { violationCount: 2, isRestricted: false, isExempt: false };

		expect(memberInfoMessage(1001, status, []).text).toBe(
			'Status of 1001\nViolations: 2\nRestriction: not restricted\nTrusted: no',
		);
		expect(
			memberInfoMessage(1001, status, [
				{ id: 2, userId: 1001, chatId: -100, category: 'text', ordinal: 2, durationMinutes: 60, timestamp: 2 },
				{ id: 1, userId: 1001, chatId: -100, category: 'animation', ordinal: 1, durationMinutes: 10, timestamp: 1 },
			]).text,
		).toBe(
			'Status of 1001\nViolations: 2\nRestriction: not restricted\nTrusted: no\n\n' +
				'Recent restrictions\n#2 identical messages, 1h\n#1 GIFs, 10 min',
		);
	});

	it('should rank offenders', () => {
		expect(
			topOffendersMessage([
				{ userId: 5, violationCount: 3 },
				{ userId: 6, violationCount: 1 },
			]).text,
		).toBe('Top offenders\n1. 5: 3\n2. 6: 1');
		expect(topOffendersMessage([]).text).toBe('No violations recorded in this chat.');
	});

	it('should list the flood limits of a chat on defaults', () => {
		expect(policyMessage({ ...DEFAULT_POLICY, chatId: -100, customized: false }).text).toBe(
			'Flood limits (defaults)\nStickers & GIFs: 3 in 30s\nText: 3 in 20s\nPhotos: 3 in 30s\nVideos: 3 in 30s\nWarnings: on',
		);
	});

	it('should summarize restriction statistics', () => {
		expect(
			statsMessage({
				totalRestrictions: 3,
				byCategory: { sticker: 2, text: 1 },
				topUsers: [{ userId: 7, violationCount: 3 }],
				totalMinutes: 80,
				periodDays: 7,
			}).text,
		).toBe('Restrictions, last 7 days\nTotal: 3 (1h 20min in total)\nsticker: 2\ntext: 1\n\nMost restricted\n1. 7: 3');
	});

	it('should mention an empty period', () => {
		expect(
			statsMessage({ totalRestrictions: 0, byCategory: {}, topUsers: [], totalMinutes: 0, periodDays: 30 }).text,
		).toBe('No restrictions in the last 30 days.');
	});

	it('should list trusted members', () => {
		expect(
			exemptionsMessage([
				{ userId: 1, chatId: -100, grantedAt: 0 },
				{ userId: 2, chatId: -100, grantedAt: 0 },
			]).text,
		).toBe('Trusted members (2)\n• 1\n• 2');
	});
});
