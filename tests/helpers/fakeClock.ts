/**
 * Manually advanced clock for deterministic time in tests
 */

import type { Clock } from '../../src/utils/clock';

export class FakeClock implements Clock {
	constructor(private current = 1_700_000_000_000) {}

	now(): number {
		return this.current;
	}

	advanceSeconds(seconds: number): void {
		this.current += seconds * 1000;
	}

	advanceMinutes(minutes: number): void {
		this.current += minutes * 60 * 1000;
	}

	set(time: number): void {
		this.current = time;
	}
}
