/**
 * Logging Component Names
 *
 * Usage:
 *   logger.info('Configuration reloaded', { component: LogComponents.CONFIGURATION });
 */

export const LogComponents = {
	DETECTOR: 'CoResidencyDetector',
	CONFIGURATION: 'ConfigurationManager',
	EVENT_BUS: 'EventManager',
	CONTROL_PLANE: 'ControlPlane',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
