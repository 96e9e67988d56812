/**
 * Co-residency detector
 * Population-relative anomaly flagging with hysteresis and hot-reloadable configuration
 */

// Detection
export { CoResidencyDetector } from './detector';
export type { CoResidencyDetectorOptions } from './detector';
export type {
	DeviationVerdict,
	HostPhase,
	HostSample,
	HostState,
	HostStateSnapshot,
	InclusionChange,
	MitigationDecision,
	SampleWindow,
	ValidatedSample,
} from './detector/types';
export { StatisticsEngine } from './detector/statistics';
export { HysteresisEngine } from './detector/hysteresis';
export { compareDeviations } from './detector/deviation';
export { validateSampleBatch } from './detector/validation';
export {
	averageValues,
	bigintArithmetic,
	numericArithmetic,
	sumValues,
} from './detector/metric-value';
export type { MetricArithmetic } from './detector/metric-value';

// Configuration
export {
	ACTIVITY_METRIC,
	ConfigurationManager,
	DEFAULT_EVENT_NAMES,
	FULL_WINDOW,
	LOGICAL_EVENT_NAMES,
	isConfiguration,
	loadConfigurationFile,
	loadDotenv,
	loadEnvironmentSettings,
	parseConfiguration,
} from './config';
export type {
	Configuration,
	ConfigurationChangeEvent,
	ConfigurationManagerOptions,
	EnvironmentSettings,
	EventNames,
	LogicalEventName,
} from './config';

// Events
export { EventManager } from './events/event-bus';
export type { EventBus, EventHandler } from './events/event-bus';

// Errors
export { ConfigurationMismatchError, InvalidSampleBatchError, MalformedConfigurationError } from './errors';

// Logging
export { createLogger, logger } from './logging/logger';
export type { Logger, LoggerOptions, LogFormat } from './logging/logger';
export { LogComponents } from './logging/components';

// Runtime
export { startControlPlane, startControlPlaneFromEnv } from './runtime';
export type { ControlPlane, ControlPlaneOptions } from './runtime';
