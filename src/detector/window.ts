/**
 * SAMPLE WINDOW - CIRCULAR BUFFER OF HOST SAMPLES
 * =================================================
 *
 * Fixed-capacity ring of metric samples. Pushing into a full window
 * overwrites the oldest entry, so size never exceeds maxSize.
 */

import type { HostSample, SampleWindow } from './types';
import type { MetricArithmetic } from './metric-value';

export function createWindow<T>(maxSize: number): SampleWindow<T> {
	if (!Number.isInteger(maxSize) || maxSize <= 0) {
		throw new RangeError(`Window capacity must be a positive integer, got ${maxSize}`);
	}
	return {
		entries: new Array<HostSample<T> | undefined>(maxSize).fill(undefined),
		size: 0,
		maxSize,
		head: 0,
	};
}

/**
 * Add a sample (circular, overwrites oldest)
 * @returns the evicted sample, if the window was full
 */
export function pushSample<T>(window: SampleWindow<T>, sample: HostSample<T>): HostSample<T> | undefined {
	const evicted = window.size === window.maxSize ? window.entries[window.head] : undefined;

	window.entries[window.head] = sample;
	window.head = (window.head + 1) % window.maxSize;

	if (window.size < window.maxSize) {
		window.size++;
	}

	return evicted;
}

/**
 * Samples from oldest to newest
 */
export function getSamples<T>(window: SampleWindow<T>): HostSample<T>[] {
	const result: HostSample<T>[] = [];
	const start = (window.head - window.size + window.maxSize) % window.maxSize;

	for (let i = 0; i < window.size; i++) {
		const entry = window.entries[(start + i) % window.maxSize];
		if (entry) {
			result.push(entry);
		}
	}

	return result;
}

export function getLatestSample<T>(window: SampleWindow<T>): HostSample<T> | undefined {
	if (window.size === 0) return undefined;
	return window.entries[(window.head - 1 + window.maxSize) % window.maxSize];
}

/**
 * Change capacity in place, keeping the most recent samples
 */
export function resizeWindow<T>(window: SampleWindow<T>, maxSize: number): void {
	if (maxSize === window.maxSize) return;
	if (!Number.isInteger(maxSize) || maxSize <= 0) {
		throw new RangeError(`Window capacity must be a positive integer, got ${maxSize}`);
	}

	const kept = getSamples(window).slice(-maxSize);

	window.entries = new Array<HostSample<T> | undefined>(maxSize).fill(undefined);
	kept.forEach((sample, index) => {
		window.entries[index] = sample;
	});
	window.maxSize = maxSize;
	window.size = kept.length;
	window.head = kept.length % maxSize;
}

/**
 * Mean of one metric over the retained samples. Samples missing the metric
 * count as zero; an empty window yields zero.
 */
export function getMetricAverage<T>(
	window: SampleWindow<T>,
	metric: string,
	arithmetic: MetricArithmetic<T>
): T {
	let total = arithmetic.zero();
	for (const sample of getSamples(window)) {
		const value = sample.metrics.get(metric);
		if (value !== undefined) {
			total = arithmetic.add(total, value);
		}
	}
	return arithmetic.divide(total, window.size);
}
