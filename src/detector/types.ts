/**
 * CO-RESIDENCY DETECTION - TYPE DEFINITIONS
 * ===========================================
 */

/**
 * One validated observation of a host. The Activity flag is kept apart
 * from the compared metrics.
 */
export interface HostSample<T> {
	readonly active: boolean;
	readonly metrics: ReadonlyMap<string, T>;
}

/**
 * Circular window of samples, oldest evicted on overflow
 */
export interface SampleWindow<T> {
	entries: Array<HostSample<T> | undefined>;
	size: number;                    // Current size (≤ maxSize)
	maxSize: number;                 // Capacity
	head: number;                    // Index of next insertion
}

export interface HostState<T> {
	readonly hostId: string;
	readonly window: SampleWindow<T>;
	consecutiveActive: number;
	consecutiveInactive: number;
	included: boolean;
	flagCount: number;
	deflagCount: number;
	mitigating: boolean;
}

/**
 * Excluded hosts do not take part in averaging or comparison.
 * 'excluded-mitigating' is a host that left the population while its
 * mitigation was still active; it stays mitigating until included and deflagged.
 */
export type HostPhase = 'excluded' | 'excluded-mitigating' | 'normal' | 'mitigating';

export interface HostStateSnapshot {
	hostId: string;
	phase: HostPhase;
	included: boolean;
	mitigating: boolean;
	flagCount: number;
	deflagCount: number;
	consecutiveActive: number;
	consecutiveInactive: number;
	windowSize: number;
	maxSamples: number;
}

/**
 * A batch entry after validation, ready to be recorded
 */
export interface ValidatedSample<T> {
	readonly hostId: string;
	readonly sample: HostSample<T>;
}

export type InclusionChange = 'included' | 'excluded';

export type MitigationDecision = 'start' | 'stop';

export interface DeviationVerdict<T> {
	overThreshold: boolean;
	/** Metrics whose deviation exceeded their threshold, in threshold order */
	exceeded: string[];
	deviations: ReadonlyMap<string, T>;
}
