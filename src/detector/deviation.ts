import type { DeviationVerdict } from './types';
import type { MetricArithmetic } from './metric-value';

/**
 * A host is over threshold when any single thresholded metric deviates by
 * strictly more than its bound. Metrics without a computed deviation are skipped.
 */
export function compareDeviations<T>(
	deviations: ReadonlyMap<string, T>,
	thresholds: Readonly<Record<string, number>>,
	arithmetic: MetricArithmetic<T>
): DeviationVerdict<T> {
	const exceeded: string[] = [];

	for (const [metric, bound] of Object.entries(thresholds)) {
		const deviation = deviations.get(metric);
		if (deviation === undefined) continue;

		if (arithmetic.compare(deviation, arithmetic.fromNumber(bound)) > 0) {
			exceeded.push(metric);
		}
	}

	return {
		overThreshold: exceeded.length > 0,
		exceeded,
		deviations,
	};
}
