export const CLOCK = Symbol("CLOCK");

/**
 * Time source for deal timing. Returns unix seconds and must never go
 * backwards.
 */
export interface Clock {
	now(): number;
}

export class SystemClock implements Clock {
	private last = 0;

	now(): number {
		const current = Math.floor(Date.now() / 1000);
		// clamp so wall-clock adjustments never move deal time backwards
		this.last = Math.max(this.last, current);
		return this.last;
	}
}
