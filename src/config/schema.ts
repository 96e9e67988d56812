import { z } from 'zod';
import { ACTIVITY_METRIC, FULL_WINDOW } from './types';

/**
 * Configuration file schema
 *
 * Every leaf lives under a `Value` key. Sibling `Description` keys are
 * documentation only; z.object strips them, and the open Thresholds map
 * drops its free-text `Description` entry before validation.
 */

const booleanValue = z.object({ Value: z.boolean() }).transform((node) => node.Value);

const positiveIntValue = z
	.object({ Value: z.number().int().positive() })
	.transform((node) => node.Value);

const runLengthValue = z
	.object({
		Value: z.number().int().refine((value) => value === FULL_WINDOW || value > 0, {
			message: `must be ${FULL_WINDOW} or a positive integer`,
		}),
	})
	.transform((node) => node.Value);

const thresholdValue = z
	.object({ Value: z.number().finite().nonnegative() })
	.transform((node) => node.Value);

const eventNameValue = z
	.object({ Value: z.string().min(1) })
	.transform((node) => node.Value);

const versionValue = z
	.object({ Value: z.union([z.string().min(1), z.number()]) })
	.transform((node) => String(node.Value));

function withoutDescription(raw: unknown): unknown {
	if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
		return raw;
	}
	return Object.fromEntries(
		Object.entries(raw).filter(([key, value]) => !(key === 'Description' && typeof value === 'string'))
	);
}

export const ThresholdsSchema = z
	.preprocess(withoutDescription, z.record(z.string(), thresholdValue))
	.refine((thresholds) => !(ACTIVITY_METRIC in thresholds), {
		message: `'${ACTIVITY_METRIC}' is reserved and cannot carry a threshold`,
	});

export const EventNamesSchema = z.object({
	SampleEvent: eventNameValue.optional(),
	StartMitigation: eventNameValue.optional(),
	StopMitigation: eventNameValue.optional(),
	ConfigurationReloaded: eventNameValue.optional(),
});

export const ConfigurationFileSchema = z.object({
	Version: versionValue,
	EnableMitigation: booleanValue,
	MitigationConfiguration: z.object({
		FlagsBeforeActivation: positiveIntValue,
		DeflagsBeforeDeactivation: positiveIntValue,
	}),
	Thresholds: ThresholdsSchema,
	Performance: z.object({
		SamplesBeforeInclusion: runLengthValue,
		SamplesBeforeExclusion: runLengthValue,
		NormalizeSamples: booleanValue,
		MaxSamples: positiveIntValue,
		ExcludeMitigatedFromAverage: booleanValue.optional(),
	}),
	EventNames: EventNamesSchema.optional(),
});

export type ConfigurationFile = z.infer<typeof ConfigurationFileSchema>;
