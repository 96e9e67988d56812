/**
 * STATISTICS ENGINE
 * ==================
 *
 * Population averages and per-host deviations, recomputed from the host
 * windows on every batch. Nothing is carried between batches here.
 */

import type { HostState } from './types';
import type { MetricArithmetic } from './metric-value';
import { getLatestSample, getMetricAverage } from './window';

export class StatisticsEngine<T> {
	constructor(private readonly arithmetic: MetricArithmetic<T>) {}

	/**
	 * A host's contribution for one metric: its own window average when
	 * normalizing (so hosts with fewer retained samples are not penalized),
	 * otherwise its latest sample.
	 */
	hostValue(state: HostState<T>, metric: string, normalize: boolean): T {
		if (normalize) {
			return getMetricAverage(state.window, metric, this.arithmetic);
		}
		return getLatestSample(state.window)?.metrics.get(metric) ?? this.arithmetic.zero();
	}

	/**
	 * Average of every metric reported by the given hosts. A host missing a
	 * metric contributes zero to it.
	 */
	computePopulationAverages(hosts: readonly HostState<T>[], normalize: boolean): Map<string, T> {
		const metrics = new Set<string>();
		for (const state of hosts) {
			const latest = getLatestSample(state.window);
			latest?.metrics.forEach((_value, name) => metrics.add(name));
		}

		const averages = new Map<string, T>();
		for (const metric of metrics) {
			let total = this.arithmetic.zero();
			for (const state of hosts) {
				total = this.arithmetic.add(total, this.hostValue(state, metric, normalize));
			}
			averages.set(metric, this.arithmetic.divide(total, hosts.length));
		}

		return averages;
	}

	/**
	 * |hostValue - populationAverage| for every averaged metric
	 */
	computeDeviations(state: HostState<T>, averages: ReadonlyMap<string, T>, normalize: boolean): Map<string, T> {
		const deviations = new Map<string, T>();
		for (const [metric, average] of averages) {
			deviations.set(metric, this.arithmetic.distance(this.hostValue(state, metric, normalize), average));
		}
		return deviations;
	}
}
