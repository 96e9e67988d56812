/**
 * Configuration Manager
 *
 * Owns the active Configuration snapshot. Watches the configuration file,
 * validates every change and publishes accepted snapshots on the event bus.
 * Consumers never see a
 * partially-valid configuration: a failed reload leaves the previous snapshot
 * in place.
 *
 * Local events:
 * - 'config:changed'  { configuration, previous, timestamp }
 * - 'config:invalid'  Error describing the rejected reload
 */

import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import type { EventBus } from '../events/event-bus';
import defaultLogger, { type Logger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { loadConfigurationFile, parseConfiguration } from './parser';
import type { Configuration } from './types';

export interface ConfigurationManagerOptions {
	configPath?: string;
	eventBus: EventBus;
	logger?: Logger;
	/** Quiet period after the last file event before re-reading */
	reloadDebounceMs?: number;
}

export interface ConfigurationChangeEvent {
	configuration: Configuration;
	previous: Configuration;
	timestamp: Date;
}

export class ConfigurationManager extends EventEmitter {
	private readonly configPath: string;
	private readonly eventBus: EventBus;
	private readonly logger: Logger;
	private readonly reloadDebounceMs: number;
	private configuration?: Configuration;
	private watcher?: fs.FSWatcher;
	private reloadTimer?: NodeJS.Timeout;

	constructor(options: ConfigurationManagerOptions) {
		super();
		this.configPath = path.resolve(options.configPath ?? 'configuration.json');
		this.eventBus = options.eventBus;
		this.logger = options.logger ?? defaultLogger;
		this.reloadDebounceMs = options.reloadDebounceMs ?? 100;
	}

	getConfigPath(): string {
		return this.configPath;
	}

	/**
	 * Initial load. Throws when the file is unreadable or invalid, since there
	 * is no previous snapshot to fall back on.
	 */
	load(): Configuration {
		const configuration = loadConfigurationFile(this.configPath);
		this.configuration = configuration;

		this.logger.info('Loaded configuration', {
			component: LogComponents.CONFIGURATION,
			configPath: this.configPath,
			version: configuration.version,
		});

		return configuration;
	}

	getConfiguration(): Configuration {
		if (!this.configuration) {
			throw new Error('Configuration has not been loaded');
		}
		return this.configuration;
	}

	/**
	 * Re-read the configuration file
	 * @returns true when a new snapshot was published
	 */
	reload(): boolean {
		let configuration: Configuration;
		try {
			configuration = loadConfigurationFile(this.configPath);
		} catch (error) {
			this.reportInvalid(error);
			return false;
		}
		return this.publish(configuration);
	}

	/**
	 * Apply an in-memory configuration document with the same policy as reload()
	 */
	update(document: unknown): boolean {
		let configuration: Configuration;
		try {
			configuration = parseConfiguration(document);
		} catch (error) {
			this.reportInvalid(error);
			return false;
		}
		return this.publish(configuration);
	}

	/**
	 * Load (if needed) and start watching the configuration file
	 */
	start(): void {
		if (!this.configuration) {
			this.load();
		}
		if (this.watcher) return;

		const watchDir = path.dirname(this.configPath);
		const fileName = path.basename(this.configPath);

		this.watcher = fs.watch(watchDir, { persistent: false }, (_eventType, changed) => {
			if (changed !== null && changed.toString() !== fileName) return;
			this.scheduleReload();
		});

		this.watcher.on('error', (error) => {
			this.logger.error('Configuration watcher failed', {
				component: LogComponents.CONFIGURATION,
				configPath: this.configPath,
				error: error.message,
			});
		});

		this.logger.info('Watching configuration file for changes', {
			component: LogComponents.CONFIGURATION,
			configPath: this.configPath,
		});
	}

	/**
	 * Stop watching. No reload is published after this returns.
	 */
	stop(): void {
		if (this.reloadTimer) {
			clearTimeout(this.reloadTimer);
			this.reloadTimer = undefined;
		}
		if (this.watcher) {
			this.watcher.close();
			this.watcher = undefined;
			this.logger.info('Stopped watching configuration file', {
				component: LogComponents.CONFIGURATION,
				configPath: this.configPath,
			});
		}
	}

	isWatching(): boolean {
		return this.watcher !== undefined;
	}

	private scheduleReload(): void {
		if (this.reloadTimer) {
			clearTimeout(this.reloadTimer);
		}
		this.reloadTimer = setTimeout(() => {
			this.reloadTimer = undefined;
			if (!this.watcher) return;

			this.logger.info('Configuration file changed. Reloading...', {
				component: LogComponents.CONFIGURATION,
				configPath: this.configPath,
			});
			this.reload();
		}, this.reloadDebounceMs);
	}

	private publish(configuration: Configuration): boolean {
		const previous = this.configuration;

		if (previous && JSON.stringify(previous) === JSON.stringify(configuration)) {
			this.logger.debug('No configuration changes detected', {
				component: LogComponents.CONFIGURATION,
			});
			return false;
		}

		this.configuration = configuration;

		this.logger.info('Configuration update complete', {
			component: LogComponents.CONFIGURATION,
			previousVersion: previous?.version,
			version: configuration.version,
		});

		if (previous) {
			const event: ConfigurationChangeEvent = {
				configuration,
				previous,
				timestamp: new Date(),
			};
			this.emit('config:changed', event);
		}

		// Subscribers listen under the reload name of the snapshot they currently hold
		const eventName = previous?.eventNames.ConfigurationReloaded ?? configuration.eventNames.ConfigurationReloaded;
		this.eventBus.emit(eventName, configuration);
		return true;
	}

	private reportInvalid(error: unknown): void {
		const reason = error instanceof Error ? error : new Error(String(error));

		this.logger.error('Rejected configuration reload; keeping previous configuration', {
			component: LogComponents.CONFIGURATION,
			configPath: this.configPath,
			version: this.configuration?.version,
			error: reason.message,
		});

		this.emit('config:invalid', reason);
	}
}
