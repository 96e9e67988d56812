/**
 * Configuration parser
 *
 * Turns a configuration document (the parsed JSON file) into a frozen,
 * validated Configuration snapshot.
 */

import fs from 'fs';
import type { ZodIssue } from 'zod';
import { MalformedConfigurationError } from '../errors';
import { deepFreeze } from '../utils/freeze';
import { ConfigurationFileSchema } from './schema';
import type { Configuration, EventNames } from './types';
import { DEFAULT_EVENT_NAMES, LOGICAL_EVENT_NAMES } from './types';

const validatedConfigurations = new WeakSet<object>();

/**
 * True only for snapshots produced by parseConfiguration
 */
export function isConfiguration(value: unknown): value is Configuration {
	return typeof value === 'object' && value !== null && validatedConfigurations.has(value);
}

function formatIssue(issue: ZodIssue): string {
	const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
	return `${location}: ${issue.message}`;
}

export function parseConfiguration(document: unknown): Configuration {
	const result = ConfigurationFileSchema.safeParse(document);
	if (!result.success) {
		throw new MalformedConfigurationError(
			'Configuration failed validation',
			result.error.issues.map(formatIssue)
		);
	}

	const file = result.data;
	const eventNames: EventNames = {
		SampleEvent: file.EventNames?.SampleEvent ?? DEFAULT_EVENT_NAMES.SampleEvent,
		StartMitigation: file.EventNames?.StartMitigation ?? DEFAULT_EVENT_NAMES.StartMitigation,
		StopMitigation: file.EventNames?.StopMitigation ?? DEFAULT_EVENT_NAMES.StopMitigation,
		ConfigurationReloaded: file.EventNames?.ConfigurationReloaded ?? DEFAULT_EVENT_NAMES.ConfigurationReloaded,
	};

	const wireNames = LOGICAL_EVENT_NAMES.map((name) => eventNames[name]);
	const duplicates = wireNames.filter((name, index) => wireNames.indexOf(name) !== index);
	if (duplicates.length > 0) {
		throw new MalformedConfigurationError(
			'Configuration failed validation',
			[`EventNames: wire names must be distinct (duplicated: ${[...new Set(duplicates)].join(', ')})`]
		);
	}

	const configuration: Configuration = {
		version: file.Version,
		mitigationEnabled: file.EnableMitigation,
		flagsBeforeActivation: file.MitigationConfiguration.FlagsBeforeActivation,
		deflagsBeforeDeactivation: file.MitigationConfiguration.DeflagsBeforeDeactivation,
		thresholds: { ...file.Thresholds },
		samplesBeforeInclusion: file.Performance.SamplesBeforeInclusion,
		samplesBeforeExclusion: file.Performance.SamplesBeforeExclusion,
		normalizeSamples: file.Performance.NormalizeSamples,
		maxSamples: file.Performance.MaxSamples,
		excludeMitigatedFromAverage: file.Performance.ExcludeMitigatedFromAverage ?? false,
		eventNames,
	};

	deepFreeze(configuration);
	validatedConfigurations.add(configuration);
	return configuration;
}

/**
 * Read and parse a configuration file.
 * File system errors propagate unchanged; content errors become MalformedConfigurationError.
 */
export function loadConfigurationFile(configPath: string): Configuration {
	const stats = fs.statSync(configPath);
	if (!stats.isFile()) {
		throw new MalformedConfigurationError(`Configuration path is not a regular file: ${configPath}`);
	}

	const content = fs.readFileSync(configPath, 'utf-8');
	return parseConfiguration(parseJsonDocument(content, configPath));
}

export function parseJsonDocument(content: string, source: string): unknown {
	try {
		return JSON.parse(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new MalformedConfigurationError(`Invalid JSON in ${source}`, [reason]);
	}
}
