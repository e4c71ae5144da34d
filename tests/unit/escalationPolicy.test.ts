/**
 * Unit tests for the escalation ladder
 */

import { durationFor, EscalationPolicy, REFERENCE_ESCALATION } from '../../src/services/escalationPolicy';

describe('Escalation policy', () => {
	it('should map violations 1-6 to 10, 60, 300, 1440, 2880, 2880 minutes', () => {
		expect([1, 2, 3, 4, 5, 6].map((ordinal) => durationFor(ordinal))).toEqual([
			10, 60, 300, 1440, 2880, 2880,
		]);
	});

	it('should use the default for any ordinal past the table', () => {
		expect(durationFor(100)).toBe(2880);
	});

	it('should treat ordinals below 1 as the first violation', () => {
		expect(durationFor(0)).toBe(10);
		expect(durationFor(-3)).toBe(10);
	});

	it('should treat non-integer ordinals as the first violation', () => {
		expect(durationFor(Number.NaN)).toBe(10);
		expect(durationFor(2.5)).toBe(10);
	});

	it('should follow a custom table', () => {
		const policy = new EscalationPolicy({ steps: [1, 2], defaultMinutes: 5 });
		expect([1, 2, 3, 4].map((ordinal) => policy.durationFor(ordinal))).toEqual([1, 2, 5, 5]);
	});

	it('should expose the ladder without sharing the table', () => {
		const policy = new EscalationPolicy();
		const ladder = policy.ladder();
		expect(ladder).toEqual({ steps: [10, 60, 300, 1440], defaultMinutes: 2880 });
		expect(ladder.steps).not.toBe(REFERENCE_ESCALATION.steps);
	});
});
