import { validateSampleBatch } from '../../../src/detector/validation';
import { bigintArithmetic, numericArithmetic } from '../../../src/detector/metric-value';
import { ConfigurationMismatchError, InvalidSampleBatchError } from '../../../src/errors';
import { createTestConfiguration } from '../../helpers/fixtures';

describe('validateSampleBatch', () => {
	const config = createTestConfiguration();

	it('should split Activity from the compared metrics', () => {
		const [entry] = validateSampleBatch(
			{ '1': { Activity: 1, NrConnections: 4, NrPackets: 20 } },
			config,
			numericArithmetic
		);

		expect(entry.hostId).toBe('1');
		expect(entry.sample.active).toBe(true);
		expect([...entry.sample.metrics.entries()]).toEqual([['NrConnections', 4], ['NrPackets', 20]]);
	});

	it('should accept boolean activity flags', () => {
		const samples = validateSampleBatch(
			{ a: { Activity: true, NrConnections: 1 }, b: { Activity: false, NrConnections: 1 } },
			config,
			numericArithmetic
		);

		expect(samples.map((s) => s.sample.active)).toEqual([true, false]);
	});

	it('should accept a Map batch and stringify numeric host IDs', () => {
		const batch = new Map<number, Record<string, number>>([[7, { Activity: 0, NrConnections: 2 }]]);

		const [entry] = validateSampleBatch(batch, config, numericArithmetic);

		expect(entry.hostId).toBe('7');
		expect(entry.sample.active).toBe(false);
	});

	it('should reject a Map batch naming the same host twice', () => {
		const batch = new Map<string | number, Record<string, number>>([
			[1, { Activity: 1, NrConnections: 1 }],
			['1', { Activity: 1, NrConnections: 1 }],
		]);

		expect(() => validateSampleBatch(batch, config, numericArithmetic)).toThrow(
			"Invalid sample batch (host '1'): duplicate host ID"
		);
	});

	it('should return nothing for an empty batch', () => {
		expect(validateSampleBatch({}, config, numericArithmetic)).toEqual([]);
	});

	it('should reject a batch that is not a mapping', () => {
		expect(() => validateSampleBatch([1, 2], config, numericArithmetic)).toThrow(
			'Invalid sample batch: batch must be a mapping from host ID to metrics'
		);
		expect(() => validateSampleBatch(null, config, numericArithmetic)).toThrow(InvalidSampleBatchError);
	});

	it('should reject metrics that are not a mapping', () => {
		expect(() => validateSampleBatch({ h: 5 }, config, numericArithmetic)).toThrow(
			"Invalid sample batch (host 'h'): metrics must be a mapping from metric name to value"
		);
	});

	it('should reject a missing Activity metric', () => {
		expect(() => validateSampleBatch({ h: { NrConnections: 1 } }, config, numericArithmetic)).toThrow(
			"Invalid sample batch (host 'h'): missing mandatory 'Activity' metric"
		);
	});

	it('should reject an Activity value other than 0 or 1', () => {
		expect(() => validateSampleBatch({ h: { Activity: 2, NrConnections: 1 } }, config, numericArithmetic)).toThrow(
			"Invalid sample batch (host 'h'): 'Activity' must be 0 or 1"
		);
	});

	it('should reject hosts reporting different metric names', () => {
		const batch = {
			a: { Activity: 1, NrConnections: 1 },
			b: { Activity: 1, NrPackets: 1 },
		};

		expect(() => validateSampleBatch(batch, config, numericArithmetic)).toThrow(
			"Invalid sample batch (host 'b'): metric names differ from the other hosts in the batch"
		);
	});

	it('should accept the same metric names in a different order', () => {
		const batch = {
			a: { Activity: 1, NrConnections: 1, NrPackets: 2 },
			b: { NrPackets: 2, NrConnections: 1, Activity: 1 },
		};

		expect(validateSampleBatch(batch, config, numericArithmetic)).toHaveLength(2);
	});

	it('should reject non-numeric metric values', () => {
		expect(() => validateSampleBatch({ h: { Activity: 1, NrConnections: '3' } }, config, numericArithmetic)).toThrow(
			"Invalid sample batch (host 'h'): metric 'NrConnections' is not a number value"
		);
		expect(() => validateSampleBatch({ h: { Activity: 1, NrConnections: 0.5 } }, config, bigintArithmetic)).toThrow(
			"Invalid sample batch (host 'h'): metric 'NrConnections' is not a bigint value"
		);
	});

	it('should reject a metric with no configured threshold', () => {
		const batch = { h: { Activity: 1, NrConnections: 1, MyCustomMetric: 3 } };

		expect(() => validateSampleBatch(batch, config, numericArithmetic)).toThrow(ConfigurationMismatchError);
		expect(() => validateSampleBatch(batch, config, numericArithmetic)).toThrow(
			"Metric 'MyCustomMetric' reported by host 'h' has no configured threshold"
		);
	});

	it('should not resolve thresholds through the prototype chain', () => {
		const batch = { h: { Activity: 1, toString: 1 } };

		expect(() => validateSampleBatch(batch, config, numericArithmetic)).toThrow(ConfigurationMismatchError);
	});

	it('should allow unthresholded metrics when mitigation is disabled', () => {
		const disabled = createTestConfiguration({ mitigationEnabled: false });
		const batch = { h: { Activity: 1, MyCustomMetric: 3 } };

		expect(validateSampleBatch(batch, disabled, numericArithmetic)).toHaveLength(1);
	});
});
