/**
 * CONFIGURATION - TYPE DEFINITIONS
 * =================================
 *
 * Immutable snapshot handed to the detector as a whole-object replacement.
 */

/** Reserved metric carrying the 0/1 activity flag; never thresholded */
export const ACTIVITY_METRIC = 'Activity';

/** Run-length value meaning "the whole window" */
export const FULL_WINDOW = -1;

export const LOGICAL_EVENT_NAMES = [
	'SampleEvent',
	'StartMitigation',
	'StopMitigation',
	'ConfigurationReloaded',
] as const;

export type LogicalEventName = typeof LOGICAL_EVENT_NAMES[number];

export type EventNames = Readonly<Record<LogicalEventName, string>>;

export const DEFAULT_EVENT_NAMES: EventNames = Object.freeze({
	SampleEvent: 'MetricsSampled',
	StartMitigation: 'MitigationStart',
	StopMitigation: 'MitigationStop',
	ConfigurationReloaded: 'ConfigurationReloaded',
});

export interface Configuration {
	readonly version: string;
	readonly mitigationEnabled: boolean;
	readonly flagsBeforeActivation: number;
	readonly deflagsBeforeDeactivation: number;
	readonly thresholds: Readonly<Record<string, number>>;
	/** -1 requires a full window of active samples */
	readonly samplesBeforeInclusion: number;
	/** -1 requires a full window of inactive samples */
	readonly samplesBeforeExclusion: number;
	readonly normalizeSamples: boolean;
	readonly maxSamples: number;
	readonly excludeMitigatedFromAverage: boolean;
	readonly eventNames: EventNames;
}
