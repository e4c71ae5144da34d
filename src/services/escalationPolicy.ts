/** Restriction length per violation ordinal */

export interface EscalationTable {
	/** Minutes for ordinals 1..N, in order */
	steps: readonly number[];
	/** Minutes for every ordinal past the end of `steps` */
	defaultMinutes: number;
}

export const REFERENCE_ESCALATION: EscalationTable = {
	steps: [10, 60, 300, 1440],
	defaultMinutes: 2880,
};

/**
 * Minutes a member is restricted for their `ordinal`-th violation.
 * Ordinals below 1, and anything that is not a whole number, read as 1.
 *
 * @example
 * ```typescript
 * durationFor(1); // 10
 * durationFor(5); // 2880
 * durationFor(0); // 10
 * ```
 */
export const durationFor = (
	ordinal: number,
	table: EscalationTable = REFERENCE_ESCALATION,
): number => {
	const normalized = Number.isInteger(ordinal) && ordinal >= 1 ? ordinal : 1;
	return table.steps[normalized - 1] ?? table.defaultMinutes;
};

export class EscalationPolicy {
	constructor(private readonly table: EscalationTable = REFERENCE_ESCALATION) {}

	durationFor(ordinal: number): number {
		return durationFor(ordinal, this.table);
	}

	/** Durations for ordinals 1..N followed by the default, for display */
	ladder(): { steps: readonly number[]; defaultMinutes: number } {
		return { steps: [...this.table.steps], defaultMinutes: this.table.defaultMinutes };
	}
}
