/**
 * Test Fixtures for the Co-Residency Detector
 * ============================================
 *
 * Reusable factory functions for configuration documents, snapshots and batches.
 *
 * Usage:
 *   const config = createTestConfiguration({ flagsBeforeActivation: 3 });
 *   detector.onSampleBatch(createBatch({ '1': 5, '2': 1 }));
 */

import { parseConfiguration } from '../../src/config/parser';
import type { Configuration, LogicalEventName } from '../../src/config/types';
import type { EventBus } from '../../src/events/event-bus';
import { createLogger, type Logger } from '../../src/logging/logger';

export interface TestConfigurationOverrides {
	version?: string | number;
	mitigationEnabled?: boolean;
	flagsBeforeActivation?: number;
	deflagsBeforeDeactivation?: number;
	thresholds?: Record<string, number>;
	samplesBeforeInclusion?: number;
	samplesBeforeExclusion?: number;
	normalizeSamples?: boolean;
	maxSamples?: number;
	excludeMitigatedFromAverage?: boolean;
	eventNames?: Partial<Record<LogicalEventName, string>>;
}

export type ConfigurationDocument = Record<string, unknown>;

export const DEFAULT_TEST_THRESHOLDS: Record<string, number> = {
	NrConnections: 1.0,
	NrPackets: 100,
	PacketSize: 50,
};

/**
 * Build a configuration document in the on-disk JSON shape
 */
export const createConfigurationDocument = (
	overrides: TestConfigurationOverrides = {}
): ConfigurationDocument => {
	const thresholds: Record<string, unknown> = {
		Description: 'Maximum deviation from the population average.',
	};
	for (const [metric, value] of Object.entries(overrides.thresholds ?? DEFAULT_TEST_THRESHOLDS)) {
		thresholds[metric] = { Value: value, Description: `${metric} bound` };
	}

	const document: ConfigurationDocument = {
		Version: { Value: overrides.version ?? '1.0' },
		EnableMitigation: { Value: overrides.mitigationEnabled ?? true },
		MitigationConfiguration: {
			FlagsBeforeActivation: { Value: overrides.flagsBeforeActivation ?? 3 },
			DeflagsBeforeDeactivation: { Value: overrides.deflagsBeforeDeactivation ?? 2 },
		},
		Thresholds: thresholds,
		Performance: {
			SamplesBeforeInclusion: { Value: overrides.samplesBeforeInclusion ?? 1 },
			SamplesBeforeExclusion: { Value: overrides.samplesBeforeExclusion ?? 1 },
			NormalizeSamples: { Value: overrides.normalizeSamples ?? false },
			MaxSamples: { Value: overrides.maxSamples ?? 5 },
			ExcludeMitigatedFromAverage: { Value: overrides.excludeMitigatedFromAverage ?? false },
		},
	};

	if (overrides.eventNames) {
		const eventNames: Record<string, unknown> = {};
		for (const [name, wireName] of Object.entries(overrides.eventNames)) {
			eventNames[name] = { Value: wireName };
		}
		document.EventNames = eventNames;
	}

	return document;
};

export const createTestConfiguration = (overrides: TestConfigurationOverrides = {}): Configuration =>
	parseConfiguration(createConfigurationDocument(overrides));

export const createTestLogger = (): Logger => createLogger({ silent: true });

/**
 * Active hosts reporting NrConnections only, keyed by host ID
 */
export const createBatch = (
	connections: Record<string, number>,
	activity: 0 | 1 = 1
): Record<string, Record<string, number>> => {
	const batch: Record<string, Record<string, number>> = {};
	for (const [hostId, value] of Object.entries(connections)) {
		batch[hostId] = { Activity: activity, NrConnections: value };
	}
	return batch;
};

export interface RecordedEvent {
	event: string;
	payload: unknown;
}

/**
 * Subscribe to the given wire names and collect every emission in order
 */
export const recordEvents = (bus: EventBus, eventNames: string[]): RecordedEvent[] => {
	const recorded: RecordedEvent[] = [];
	for (const event of eventNames) {
		bus.subscribe(event, (payload) => recorded.push({ event, payload }));
	}
	return recorded;
};

export const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll until the condition holds, failing after timeoutMs
 */
export const waitFor = async (condition: () => boolean, timeoutMs = 2000): Promise<void> => {
	const deadline = Date.now() + timeoutMs;
	while (!condition()) {
		if (Date.now() > deadline) {
			throw new Error(`Condition not met within ${timeoutMs}ms`);
		}
		await delay(10);
	}
};
