/**
 * Control plane runtime
 *
 * Wires the event bus, the configuration manager and the detector together.
 */

import { ConfigurationManager, loadDotenv, loadEnvironmentSettings } from './config';
import { CoResidencyDetector } from './detector';
import { numericArithmetic, type MetricArithmetic } from './detector/metric-value';
import { EventManager, type EventBus } from './events/event-bus';
import { createLogger, type Logger } from './logging/logger';
import { LogComponents } from './logging/components';

export interface ControlPlaneOptions<T> {
	configPath: string;
	arithmetic: MetricArithmetic<T>;
	eventBus?: EventBus;
	logger?: Logger;
	reloadDebounceMs?: number;
	/** Watch the configuration file for changes (default true) */
	watch?: boolean;
}

export interface ControlPlane<T> {
	eventBus: EventBus;
	configurationManager: ConfigurationManager;
	detector: CoResidencyDetector<T>;
	stop(): void;
}

export function startControlPlane<T>(options: ControlPlaneOptions<T>): ControlPlane<T> {
	const logger = options.logger ?? createLogger();
	const eventBus = options.eventBus ?? new EventManager({ logger });

	const configurationManager = new ConfigurationManager({
		configPath: options.configPath,
		eventBus,
		logger,
		reloadDebounceMs: options.reloadDebounceMs,
	});
	const configuration = configurationManager.load();

	const detector = new CoResidencyDetector<T>({
		configuration,
		eventBus,
		arithmetic: options.arithmetic,
		logger,
	});
	detector.start();

	if (options.watch ?? true) {
		configurationManager.start();
	}

	logger.info('Control plane started', {
		component: LogComponents.CONTROL_PLANE,
		configPath: configurationManager.getConfigPath(),
		sampleEvent: configuration.eventNames.SampleEvent,
	});

	let stopped = false;

	return {
		eventBus,
		configurationManager,
		detector,
		stop: () => {
			if (stopped) return;
			stopped = true;
			configurationManager.stop();
			detector.stop();
			logger.info('Control plane stopped', {
				component: LogComponents.CONTROL_PLANE,
			});
		},
	};
}

/**
 * Start with settings taken from the environment (and an optional .env file)
 */
export function startControlPlaneFromEnv(): ControlPlane<number> {
	loadDotenv();
	const settings = loadEnvironmentSettings();

	return startControlPlane({
		configPath: settings.configPath,
		arithmetic: numericArithmetic,
		reloadDebounceMs: settings.reloadDebounceMs,
		logger: createLogger({
			level: settings.logLevel,
			format: settings.logFormat,
			logDir: settings.logDir,
		}),
	});
}
