/**
 * Configuration Module
 * ====================
 *
 * Snapshot parsing, file loading and hot-reload distribution
 */

// Configuration manager (file watching and reload publishing)
export { ConfigurationManager } from './manager';
export type { ConfigurationChangeEvent, ConfigurationManagerOptions } from './manager';

export { isConfiguration, loadConfigurationFile, parseConfiguration, parseJsonDocument } from './parser';
export { loadDotenv, loadEnvironmentSettings } from './environment';
export type { EnvironmentSettings } from './environment';

export {
	ACTIVITY_METRIC,
	DEFAULT_EVENT_NAMES,
	FULL_WINDOW,
	LOGICAL_EVENT_NAMES,
} from './types';
export type { Configuration, EventNames, LogicalEventName } from './types';
