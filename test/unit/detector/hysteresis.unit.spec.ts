import { HysteresisEngine } from '../../../src/detector/hysteresis';
import { createHostState } from '../../../src/detector/host-state';
import { createTestConfiguration } from '../../helpers/fixtures';

describe('HysteresisEngine', () => {
	const engine = new HysteresisEngine();

	describe('updateInclusion', () => {
		it('should include a host after the configured active run', () => {
			const config = createTestConfiguration({ samplesBeforeInclusion: 3 });
			const state = createHostState<number>('h', 5);

			state.consecutiveActive = 2;
			expect(engine.updateInclusion(state, config)).toBeUndefined();
			expect(state.included).toBe(false);

			state.consecutiveActive = 3;
			expect(engine.updateInclusion(state, config)).toBe('included');
			expect(state.included).toBe(true);
		});

		it('should require a full window when inclusion is -1', () => {
			const config = createTestConfiguration({ samplesBeforeInclusion: -1, maxSamples: 5 });
			const state = createHostState<number>('h', 5);

			state.consecutiveActive = 4;
			expect(engine.updateInclusion(state, config)).toBeUndefined();

			state.consecutiveActive = 5;
			expect(engine.updateInclusion(state, config)).toBe('included');
		});

		it('should exclude an included host after the configured inactive run', () => {
			const config = createTestConfiguration({ samplesBeforeExclusion: 2 });
			const state = createHostState<number>('h', 5);
			state.included = true;

			state.consecutiveInactive = 1;
			expect(engine.updateInclusion(state, config)).toBeUndefined();

			state.consecutiveInactive = 2;
			expect(engine.updateInclusion(state, config)).toBe('excluded');
			expect(state.included).toBe(false);
		});

		it('should require a full window of inactivity when exclusion is -1', () => {
			const config = createTestConfiguration({ samplesBeforeExclusion: -1, maxSamples: 5 });
			const state = createHostState<number>('h', 5);
			state.included = true;

			state.consecutiveInactive = 4;
			expect(engine.updateInclusion(state, config)).toBeUndefined();
			expect(state.included).toBe(true);

			state.consecutiveInactive = 5;
			expect(engine.updateInclusion(state, config)).toBe('excluded');
			expect(state.included).toBe(false);
		});

		it('should keep mitigation running across exclusion', () => {
			const config = createTestConfiguration({ samplesBeforeExclusion: 1 });
			const state = createHostState<number>('h', 5);
			state.included = true;
			state.mitigating = true;
			state.consecutiveInactive = 1;

			engine.updateInclusion(state, config);

			expect(state.included).toBe(false);
			expect(state.mitigating).toBe(true);
		});

		it('should track inclusion with mitigation disabled', () => {
			const config = createTestConfiguration({ mitigationEnabled: false, samplesBeforeInclusion: 1 });
			const state = createHostState<number>('h', 5);
			state.consecutiveActive = 1;

			expect(engine.updateInclusion(state, config)).toBe('included');
		});
	});

	describe('evaluate', () => {
		it('should start mitigation once the flag count is reached', () => {
			const config = createTestConfiguration({ flagsBeforeActivation: 3 });
			const state = createHostState<number>('h', 5);
			state.included = true;

			expect(engine.evaluate(state, true, config)).toBeUndefined();
			expect(engine.evaluate(state, true, config)).toBeUndefined();
			expect(state.flagCount).toBe(2);

			expect(engine.evaluate(state, true, config)).toBe('start');
			expect(state.mitigating).toBe(true);
			expect(state.flagCount).toBe(0);
			expect(state.deflagCount).toBe(0);
		});

		it('should not decay flags on within-threshold batches', () => {
			const config = createTestConfiguration({ flagsBeforeActivation: 3 });
			const state = createHostState<number>('h', 5);

			engine.evaluate(state, true, config);
			engine.evaluate(state, false, config);
			engine.evaluate(state, true, config);
			expect(state.flagCount).toBe(2);

			expect(engine.evaluate(state, true, config)).toBe('start');
		});

		it('should stop mitigation once the deflag count is reached', () => {
			const config = createTestConfiguration({ deflagsBeforeDeactivation: 2 });
			const state = createHostState<number>('h', 5);
			state.mitigating = true;

			expect(engine.evaluate(state, false, config)).toBeUndefined();
			expect(state.deflagCount).toBe(1);

			expect(engine.evaluate(state, false, config)).toBe('stop');
			expect(state.mitigating).toBe(false);
			expect(state.deflagCount).toBe(0);
		});

		it('should reset deflags when a mitigating host exceeds again', () => {
			const config = createTestConfiguration({ deflagsBeforeDeactivation: 2 });
			const state = createHostState<number>('h', 5);
			state.mitigating = true;

			engine.evaluate(state, false, config);
			expect(engine.evaluate(state, true, config)).toBeUndefined();
			expect(state.deflagCount).toBe(0);

			expect(engine.evaluate(state, false, config)).toBeUndefined();
			expect(engine.evaluate(state, false, config)).toBe('stop');
		});

		it('should decide nothing with mitigation disabled', () => {
			const config = createTestConfiguration({ mitigationEnabled: false, flagsBeforeActivation: 1 });
			const state = createHostState<number>('h', 5);

			expect(engine.evaluate(state, true, config)).toBeUndefined();
			expect(state.flagCount).toBe(0);
			expect(state.mitigating).toBe(false);
		});
	});
});
