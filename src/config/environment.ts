/**
 * Process settings from environment variables
 */

import dotenv from 'dotenv';
import type { LogFormat } from '../logging/logger';

export interface EnvironmentSettings {
	configPath: string;
	reloadDebounceMs: number;
	logLevel: string;
	logFormat: LogFormat;
	logDir?: string;
}

/**
 * Read settings from the given environment (defaults to process.env).
 * Call loadDotenv() first to merge a .env file into process.env.
 */
export function loadEnvironmentSettings(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
	const debounce = parseInt(env.CONFIG_RELOAD_DEBOUNCE_MS || '100', 10);

	return {
		configPath: env.CONFIG_PATH || 'configuration.json',
		reloadDebounceMs: Number.isNaN(debounce) || debounce < 0 ? 100 : debounce,
		logLevel: env.LOG_LEVEL || 'info',
		logFormat: env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
		logDir: env.LOG_DIR || undefined,
	};
}

export function loadDotenv(envPath?: string): void {
	dotenv.config(envPath ? { path: envPath } : undefined);
}
