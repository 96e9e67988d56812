/**
 * CO-RESIDENCY DETECTOR - MAIN ORCHESTRATOR
 * ==========================================
 *
 * Consumes sample batches from the event bus, keeps a window per host,
 * compares every included host against the population average and emits
 * one start/stop event per mitigation transition.
 *
 * The active Configuration is an immutable snapshot. A batch reads the
 * reference once and uses that snapshot throughout; a reload only swaps the
 * reference, so a batch never mixes thresholds from one snapshot with
 * hysteresis counts from another.
 */

import type { Configuration, LogicalEventName } from '../config/types';
import { isConfiguration } from '../config/parser';
import type { EventBus } from '../events/event-bus';
import defaultLogger, { type Logger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { formatMetrics, type MetricArithmetic } from './metric-value';
import type { HostState, HostStateSnapshot, MitigationDecision, ValidatedSample } from './types';
import { applyWindowCapacity, createHostState, recordHostSample, snapshotHostState } from './host-state';
import { StatisticsEngine } from './statistics';
import { compareDeviations } from './deviation';
import { HysteresisEngine } from './hysteresis';
import { validateSampleBatch } from './validation';

export interface CoResidencyDetectorOptions<T> {
	configuration: Configuration;
	eventBus: EventBus;
	arithmetic: MetricArithmetic<T>;
	logger?: Logger;
}

type SubscribedEvent = Extract<LogicalEventName, 'SampleEvent' | 'ConfigurationReloaded'>;

export class CoResidencyDetector<T = number> {
	private configuration: Configuration;
	private readonly eventBus: EventBus;
	private readonly arithmetic: MetricArithmetic<T>;
	private readonly logger: Logger;
	private readonly statistics: StatisticsEngine<T>;
	private readonly hysteresis = new HysteresisEngine();
	private readonly hosts = new Map<string, HostState<T>>();
	private populationAverages: ReadonlyMap<string, T> = new Map();
	private subscriptions = new Map<SubscribedEvent, { eventName: string; unsubscribe: () => void }>();
	private batchesProcessed = 0;
	private stopped = false;

	constructor(options: CoResidencyDetectorOptions<T>) {
		this.configuration = options.configuration;
		this.eventBus = options.eventBus;
		this.arithmetic = options.arithmetic;
		this.logger = options.logger ?? defaultLogger;
		this.statistics = new StatisticsEngine(options.arithmetic);

		this.logger.info('Initialized co-residency detector', {
			component: LogComponents.DETECTOR,
			version: this.configuration.version,
			mitigationEnabled: this.configuration.mitigationEnabled,
			metrics: Object.keys(this.configuration.thresholds),
			arithmetic: this.arithmetic.kind,
		});
	}

	/**
	 * Subscribe to the sample and reload events named by the active configuration
	 */
	start(): void {
		if (this.stopped) {
			throw new Error('Detector has been stopped and cannot be restarted');
		}
		this.bindSubscriptions(this.configuration);
	}

	/**
	 * Unsubscribe from the bus. No event is emitted after this returns.
	 */
	stop(): void {
		if (this.stopped) return;
		this.stopped = true;

		for (const { unsubscribe } of this.subscriptions.values()) {
			unsubscribe();
		}
		this.subscriptions.clear();

		this.logger.info('Stopped co-residency detector', {
			component: LogComponents.DETECTOR,
			batchesProcessed: this.batchesProcessed,
			hostsTracked: this.hosts.size,
		});
	}

	/**
	 * Process one batch of samples (host ID to metric map).
	 * Throws InvalidSampleBatchError or ConfigurationMismatchError before
	 * touching any host state when the batch is rejected.
	 */
	onSampleBatch(batch: unknown): void {
		if (this.stopped) {
			this.logger.debug('Ignoring sample batch received after stop', {
				component: LogComponents.DETECTOR,
			});
			return;
		}

		const config = this.configuration;

		const samples = this.validateBatch(batch, config);
		if (samples.length === 0) {
			return;
		}

		for (const state of this.hosts.values()) {
			applyWindowCapacity(state, config.maxSamples);
		}

		for (const { hostId, sample } of samples) {
			let state = this.hosts.get(hostId);
			if (!state) {
				state = createHostState<T>(hostId, config.maxSamples);
				this.hosts.set(hostId, state);
				this.logger.debug('Tracking new host', {
					component: LogComponents.DETECTOR,
					hostId,
				});
			}
			recordHostSample(state, sample);
		}

		for (const state of this.hosts.values()) {
			const change = this.hysteresis.updateInclusion(state, config);
			if (change) {
				this.logger.debug(`Host ${change} ${change === 'included' ? 'in' : 'from'} population statistics`, {
					component: LogComponents.DETECTOR,
					hostId: state.hostId,
					mitigating: state.mitigating,
				});
			}
		}

		const included = [...this.hosts.values()].filter((state) => state.included);
		const population = this.selectPopulation(included, config);

		const averages = this.statistics.computePopulationAverages(population, config.normalizeSamples);
		this.populationAverages = averages;

		for (const state of included) {
			const deviations = this.statistics.computeDeviations(state, averages, config.normalizeSamples);
			const verdict = compareDeviations(deviations, config.thresholds, this.arithmetic);

			if (verdict.overThreshold) {
				this.logger.debug('Host flagged for exceeding thresholds', {
					component: LogComponents.DETECTOR,
					hostId: state.hostId,
					exceeded: verdict.exceeded,
					deviations: formatMetrics(this.arithmetic, verdict.deviations),
				});
			}

			const decision = this.hysteresis.evaluate(state, verdict.overThreshold, config);
			if (decision) {
				this.emitDecision(state.hostId, decision, config);
			}
		}

		this.batchesProcessed++;
	}

	/**
	 * Swap in a new configuration snapshot for the next batch
	 */
	onConfigurationReloaded(configuration: Configuration): void {
		const previous = this.configuration;
		this.configuration = configuration;

		this.logger.info('Configuration reloaded', {
			component: LogComponents.DETECTOR,
			previousVersion: previous.version,
			version: configuration.version,
			mitigationEnabled: configuration.mitigationEnabled,
			maxSamples: configuration.maxSamples,
		});

		if (this.subscriptions.size > 0 && !this.stopped) {
			this.bindSubscriptions(configuration);
		}
	}

	getConfiguration(): Configuration {
		return this.configuration;
	}

	getHostSnapshot(hostId: string): HostStateSnapshot | undefined {
		const state = this.hosts.get(hostId);
		return state ? snapshotHostState(state) : undefined;
	}

	getHostSnapshots(): HostStateSnapshot[] {
		return [...this.hosts.values()].map((state) => snapshotHostState(state));
	}

	/**
	 * Averages computed by the most recent batch
	 */
	getPopulationAverages(): ReadonlyMap<string, T> {
		return this.populationAverages;
	}

	getMitigatedHosts(): string[] {
		return [...this.hosts.values()]
			.filter((state) => state.mitigating)
			.map((state) => state.hostId);
	}

	getStats() {
		const states = [...this.hosts.values()];
		return {
			running: this.subscriptions.size > 0,
			stopped: this.stopped,
			batchesProcessed: this.batchesProcessed,
			hostsTracked: states.length,
			hostsIncluded: states.filter((state) => state.included).length,
			hostsMitigating: states.filter((state) => state.mitigating).length,
			configurationVersion: this.configuration.version,
		};
	}

	/**
	 * Hosts whose samples form the baseline. When leaving mitigating hosts out
	 * would empty it, every included host is used instead.
	 */
	private selectPopulation(included: HostState<T>[], config: Configuration): HostState<T>[] {
		if (!config.excludeMitigatedFromAverage) {
			return included;
		}
		const unmitigated = included.filter((state) => !state.mitigating);
		return unmitigated.length > 0 ? unmitigated : included;
	}

	private validateBatch(batch: unknown, config: Configuration): ValidatedSample<T>[] {
		try {
			return validateSampleBatch(batch, config, this.arithmetic);
		} catch (error) {
			this.logger.warn('Rejected sample batch', {
				component: LogComponents.DETECTOR,
				error: error instanceof Error ? error.message : String(error),
			});
			throw error;
		}
	}

	private emitDecision(hostId: string, decision: MitigationDecision, config: Configuration): void {
		const eventName = decision === 'start'
			? config.eventNames.StartMitigation
			: config.eventNames.StopMitigation;

		this.logger.info(decision === 'start' ? 'Initiating mitigation on host' : 'Stopping mitigation on host', {
			component: LogComponents.DETECTOR,
			hostId,
			eventName,
		});

		this.eventBus.emit(eventName, hostId);
	}

	/**
	 * (Re)subscribe under the wire names of the given configuration,
	 * leaving unchanged subscriptions in place
	 */
	private bindSubscriptions(config: Configuration): void {
		this.bind('SampleEvent', config.eventNames.SampleEvent, (payload) => this.onSampleBatch(payload));
		this.bind('ConfigurationReloaded', config.eventNames.ConfigurationReloaded, (payload) => {
			if (!isConfiguration(payload)) {
				this.logger.warn('Ignoring reload event without a validated configuration', {
					component: LogComponents.DETECTOR,
				});
				return;
			}
			this.onConfigurationReloaded(payload);
		});
	}

	private bind(event: SubscribedEvent, eventName: string, handler: (payload: unknown) => void): void {
		const existing = this.subscriptions.get(event);
		if (existing?.eventName === eventName) return;

		existing?.unsubscribe();
		this.subscriptions.set(event, {
			eventName,
			unsubscribe: this.eventBus.subscribe(eventName, handler),
		});

		if (existing) {
			this.logger.info(`Re-bound ${event} subscription`, {
				component: LogComponents.DETECTOR,
				from: existing.eventName,
				to: eventName,
			});
		}
	}
}
