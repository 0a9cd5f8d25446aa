import type { KlineEvent } from "@sigflow/core";

/** Candles further apart than this many intervals leave a gap. */
export const GAP_TOLERANCE = 1.5;

type Timed = Pick<KlineEvent, "openTime">;

/** Number of candles missing between two open times, zero when contiguous. */
export const missingKlines = (
	previousOpenTime: number | null,
	openTime: number,
	intervalMs: number
): number => {
	if (previousOpenTime === null) {
		return 0;
	}
	const distance = openTime - previousOpenTime;
	if (distance <= intervalMs * GAP_TOLERANCE) {
		return 0;
	}
	return Math.max(Math.round(distance / intervalMs) - 1, 1);
};

export const isContiguous = (openTimes: readonly number[], intervalMs: number): boolean =>
	openTimes.every(
		(openTime, index) =>
			index === 0 || missingKlines(openTimes[index - 1], openTime, intervalMs) === 0
	);

/** Longest gap-free run at the end of klines sorted by open time. */
export const contiguousTail = <T extends Timed>(klines: readonly T[], intervalMs: number): T[] => {
	let start = klines.length - 1;
	while (
		start > 0 &&
		missingKlines(klines[start - 1].openTime, klines[start].openTime, intervalMs) === 0
	) {
		start -= 1;
	}
	return klines.slice(Math.max(start, 0));
};

export const byOpenTime = (left: Timed, right: Timed): number => left.openTime - right.openTime;
