/** Time source shared by the moderation services */

export interface Clock {
	/** Current time in Unix milliseconds */
	now(): number;
}

export const systemClock: Clock = {
	now: () => Date.now(),
};
