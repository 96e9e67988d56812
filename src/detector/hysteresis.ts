/**
 * HYSTERESIS ENGINE
 * ==================
 *
 * Per-host state machine:
 *
 *   Excluded ──(active run ≥ inclusion)──▶ Included/Normal
 *   Included ──(inactive run ≥ exclusion)──▶ Excluded
 *   Normal ──(flags ≥ flagsBeforeActivation)──▶ Mitigating   emits start
 *   Mitigating ──(deflags ≥ deflagsBeforeDeactivation)──▶ Normal   emits stop
 *
 * Counters only move on their own trigger condition; they never decay.
 * Exclusion does not end mitigation: a host keeps mitigating until it is
 * deflagged while included.
 */

import type { Configuration } from '../config/types';
import { FULL_WINDOW } from '../config/types';
import type { HostState, InclusionChange, MitigationDecision } from './types';

export class HysteresisEngine {
	/**
	 * Apply the inclusion/exclusion run-length rules.
	 * Inclusion is tracked even when mitigation is disabled.
	 */
	updateInclusion<T>(state: HostState<T>, config: Configuration): InclusionChange | undefined {
		if (!state.included) {
			const required = config.samplesBeforeInclusion === FULL_WINDOW
				? config.maxSamples
				: config.samplesBeforeInclusion;

			if (state.consecutiveActive >= required) {
				state.included = true;
				return 'included';
			}
			return undefined;
		}

		const required = config.samplesBeforeExclusion === FULL_WINDOW
			? config.maxSamples
			: config.samplesBeforeExclusion;

		if (state.consecutiveInactive >= required) {
			state.included = false;
			return 'excluded';
		}
		return undefined;
	}

	/**
	 * Feed one batch's verdict for an included host
	 */
	evaluate<T>(state: HostState<T>, overThreshold: boolean, config: Configuration): MitigationDecision | undefined {
		if (!config.mitigationEnabled) {
			return undefined;
		}

		if (!state.mitigating) {
			if (!overThreshold) {
				return undefined;
			}

			state.flagCount++;
			state.deflagCount = 0;

			if (state.flagCount >= config.flagsBeforeActivation) {
				state.mitigating = true;
				this.resetCounters(state);
				return 'start';
			}
			return undefined;
		}

		if (overThreshold) {
			state.deflagCount = 0;
			return undefined;
		}

		state.deflagCount++;

		if (state.deflagCount >= config.deflagsBeforeDeactivation) {
			state.mitigating = false;
			this.resetCounters(state);
			return 'stop';
		}
		return undefined;
	}

	private resetCounters<T>(state: HostState<T>): void {
		state.flagCount = 0;
		state.deflagCount = 0;
	}
}
