/**
 * Detection errors
 */

/**
 * A sample reported a metric that has no configured threshold
 * while mitigation is enabled.
 */
export class ConfigurationMismatchError extends Error {
	constructor(
		public readonly metric: string,
		public readonly hostId: string
	) {
		super(`Metric '${metric}' reported by host '${hostId}' has no configured threshold`);
		this.name = 'ConfigurationMismatchError';
	}
}

export class MalformedConfigurationError extends Error {
	constructor(message: string, public readonly issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'MalformedConfigurationError';
	}
}

/**
 * Raised before any host state is touched, so a rejected batch leaves
 * the detector exactly as it was.
 */
export class InvalidSampleBatchError extends Error {
	constructor(
		public readonly reason: string,
		public readonly hostId?: string
	) {
		super(hostId !== undefined ? `Invalid sample batch (host '${hostId}'): ${reason}` : `Invalid sample batch: ${reason}`);
		this.name = 'InvalidSampleBatchError';
	}
}
