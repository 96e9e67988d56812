/**
 * Per-host record: sample window, activity run-lengths and hysteresis counters.
 * Created on first observation and kept for the lifetime of the detector.
 */

import type { HostPhase, HostSample, HostState, HostStateSnapshot } from './types';
import { createWindow, pushSample, resizeWindow } from './window';

export function createHostState<T>(hostId: string, maxSamples: number): HostState<T> {
	return {
		hostId,
		window: createWindow<T>(maxSamples),
		consecutiveActive: 0,
		consecutiveInactive: 0,
		included: false,
		flagCount: 0,
		deflagCount: 0,
		mitigating: false,
	};
}

/**
 * Push a sample and advance the activity run-lengths
 */
export function recordHostSample<T>(state: HostState<T>, sample: HostSample<T>): void {
	pushSample(state.window, sample);

	if (sample.active) {
		state.consecutiveActive++;
		state.consecutiveInactive = 0;
	} else {
		state.consecutiveInactive++;
		state.consecutiveActive = 0;
	}
}

export function applyWindowCapacity<T>(state: HostState<T>, maxSamples: number): void {
	resizeWindow(state.window, maxSamples);
}

export function getHostPhase<T>(state: HostState<T>): HostPhase {
	if (!state.included) return state.mitigating ? 'excluded-mitigating' : 'excluded';
	return state.mitigating ? 'mitigating' : 'normal';
}

export function snapshotHostState<T>(state: HostState<T>): HostStateSnapshot {
	return {
		hostId: state.hostId,
		phase: getHostPhase(state),
		included: state.included,
		mitigating: state.mitigating,
		flagCount: state.flagCount,
		deflagCount: state.deflagCount,
		consecutiveActive: state.consecutiveActive,
		consecutiveInactive: state.consecutiveInactive,
		windowSize: state.window.size,
		maxSamples: state.window.maxSize,
	};
}
