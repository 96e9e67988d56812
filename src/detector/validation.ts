/**
 * Sample batch validation
 *
 * All-or-nothing: the whole batch is checked before any host state is
 * touched, so a rejected batch leaves the detector unchanged.
 */

import type { Configuration } from '../config/types';
import { ACTIVITY_METRIC } from '../config/types';
import { ConfigurationMismatchError, InvalidSampleBatchError } from '../errors';
import type { MetricArithmetic } from './metric-value';
import type { ValidatedSample } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Map);
}

function batchEntries(batch: unknown): Array<[string, unknown]> {
	if (batch instanceof Map) {
		const entries: Array<[string, unknown]> = [];
		const seen = new Set<string>();
		for (const [hostId, metrics] of batch) {
			if (typeof hostId !== 'string' && typeof hostId !== 'number') {
				throw new InvalidSampleBatchError('host IDs must be strings or numbers');
			}
			const id = String(hostId);
			if (seen.has(id)) {
				throw new InvalidSampleBatchError('duplicate host ID', id);
			}
			seen.add(id);
			entries.push([id, metrics]);
		}
		return entries;
	}
	if (isRecord(batch)) {
		return Object.entries(batch);
	}
	throw new InvalidSampleBatchError('batch must be a mapping from host ID to metrics');
}

function parseActivity(raw: unknown): boolean | undefined {
	if (raw === 1 || raw === true) return true;
	if (raw === 0 || raw === false) return false;
	return undefined;
}

function keySignature(keys: string[]): string {
	return [...keys].sort().join('\u0000');
}

export function validateSampleBatch<T>(
	batch: unknown,
	config: Configuration,
	arithmetic: MetricArithmetic<T>
): ValidatedSample<T>[] {
	const validated: ValidatedSample<T>[] = [];
	let expectedSignature: string | undefined;

	for (const [hostId, rawMetrics] of batchEntries(batch)) {
		if (!isRecord(rawMetrics)) {
			throw new InvalidSampleBatchError('metrics must be a mapping from metric name to value', hostId);
		}

		const keys = Object.keys(rawMetrics);
		const signature = keySignature(keys);
		if (expectedSignature === undefined) {
			expectedSignature = signature;
		} else if (signature !== expectedSignature) {
			throw new InvalidSampleBatchError('metric names differ from the other hosts in the batch', hostId);
		}

		if (!(ACTIVITY_METRIC in rawMetrics)) {
			throw new InvalidSampleBatchError(`missing mandatory '${ACTIVITY_METRIC}' metric`, hostId);
		}
		const active = parseActivity(rawMetrics[ACTIVITY_METRIC]);
		if (active === undefined) {
			throw new InvalidSampleBatchError(`'${ACTIVITY_METRIC}' must be 0 or 1`, hostId);
		}

		const metrics = new Map<string, T>();
		for (const key of keys) {
			if (key === ACTIVITY_METRIC) continue;

			const value = arithmetic.parse(rawMetrics[key]);
			if (value === undefined) {
				throw new InvalidSampleBatchError(`metric '${key}' is not a ${arithmetic.kind} value`, hostId);
			}
			metrics.set(key, value);
		}

		validated.push({ hostId, sample: { active, metrics } });
	}

	if (config.mitigationEnabled) {
		for (const { hostId, sample } of validated) {
			for (const metric of sample.metrics.keys()) {
				if (!Object.hasOwn(config.thresholds, metric)) {
					throw new ConfigurationMismatchError(metric, hostId);
				}
			}
		}
	}

	return validated;
}
