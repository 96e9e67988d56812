/**
 * METRIC ARITHMETIC
 * ==================
 *
 * The minimal capability set a metric kind must provide so the detector can
 * average it across a window and a population and measure deviation from that
 * average. Implemented as a type-class object rather than methods on values so
 * plain JSON numbers can flow through untouched.
 */

export interface MetricArithmetic<T> {
	readonly kind: string;

	/** Neutral element for addition */
	zero(): T;

	fromNumber(value: number): T;

	add(a: T, b: T): T;

	/** Division by a count of zero yields zero */
	divide(value: T, count: number): T;

	/** Absolute difference */
	distance(a: T, b: T): T;

	compare(a: T, b: T): number;

	/** Returns undefined when the raw value is not numeric-like */
	parse(raw: unknown): T | undefined;

	/** Log-safe rendering */
	format(value: T): number | string;
}

export const numericArithmetic: MetricArithmetic<number> = {
	kind: 'number',
	zero: () => 0,
	fromNumber: (value) => value,
	add: (a, b) => a + b,
	divide: (value, count) => (count === 0 ? 0 : value / count),
	distance: (a, b) => Math.abs(a - b),
	compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
	parse: (raw) => (typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined),
	format: (value) => value,
};

/**
 * Integer counters (packet or connection totals that outgrow 2^53).
 * Bounds are floored on conversion: for integer deviations d > floor(b) iff d > b.
 */
export const bigintArithmetic: MetricArithmetic<bigint> = {
	kind: 'bigint',
	zero: () => 0n,
	fromNumber: (value) => BigInt(Math.floor(value)),
	add: (a, b) => a + b,
	divide: (value, count) => (count === 0 ? 0n : value / BigInt(count)),
	distance: (a, b) => (a > b ? a - b : b - a),
	compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
	parse: (raw) => {
		if (typeof raw === 'bigint') return raw;
		if (typeof raw === 'number' && Number.isSafeInteger(raw)) return BigInt(raw);
		return undefined;
	},
	format: (value) => value.toString(),
};

export function sumValues<T>(arithmetic: MetricArithmetic<T>, values: Iterable<T>): T {
	let total = arithmetic.zero();
	for (const value of values) {
		total = arithmetic.add(total, value);
	}
	return total;
}

export function averageValues<T>(arithmetic: MetricArithmetic<T>, values: readonly T[]): T {
	return arithmetic.divide(sumValues(arithmetic, values), values.length);
}

export function formatMetrics<T>(
	arithmetic: MetricArithmetic<T>,
	metrics: ReadonlyMap<string, T>
): Record<string, number | string> {
	const formatted: Record<string, number | string> = {};
	for (const [name, value] of metrics) {
		formatted[name] = arithmetic.format(value);
	}
	return formatted;
}
