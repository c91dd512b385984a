/**
 * 🧪 ChanModelEngine Unit Tests
 *
 * Test Coverage:
 * 1. Sample layout (cycles × samples, time offsets)
 * 2. Branch tracking and reversal points
 * 3. State carried across cycles
 * 4. Gapped / ungapped equivalence at zero gap
 * 5. Parameter and waveform validation
 * 6. Numeric divergence
 */

import { describe, test, expect, vi, afterEach } from 'vitest';
import { ChanModelEngine } from '../../../src/core/simulation/chan_model_engine';
import { ChanModel } from '../../../src/core/model/chan_model';
import { withDefaults } from '../../../src/core/model/default_parameters';
import { createExcitationWaveform } from '../../../src/core/waveform/excitation';
import { InvalidParameterError, NumericDivergenceError } from '../../../src/core/errors/index';
import { LoopValidator } from '../../utils/LoopValidator';
import type { ExcitationWaveform } from '../../../src/types/index';

const params = withDefaults();           // Bs 1.5, Br 0.3, Hc 50, sine 100 A/m, 200 點, 10 周期
const waveform = createExcitationWaveform(params);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ChanModelEngine - Sample Layout', () => {
  test('should emit one sample per waveform point per cycle', () => {
    const samples = new ChanModelEngine().simulate(params, waveform);

    expect(samples).toHaveLength(10 * 200);
    expect(samples[0]!.cycle).toBe(0);
    expect(samples[199]!.phaseIndex).toBe(199);
    expect(samples[200]!.cycle).toBe(1);
    expect(samples[200]!.phaseIndex).toBe(0);
    expect(samples[200]!.time).toBeCloseTo(0.02, 15);
    expect(samples[1999]!.cycle).toBe(9);
  });
});

describe('ChanModelEngine - Branch Tracking', () => {
  const samples = new ChanModelEngine().simulate(params, waveform);

  test('should start demagnetised on the initial curve', () => {
    expect(samples[0]!.branch).toBe('initial');
    expect(samples[0]!.B).toBeCloseTo(0, 15);
    expect(samples[50]!.branch).toBe('initial');
    expect(samples[50]!.H).toBe(100);
    expect(samples[50]!.B).toBeCloseTo(0.4714285714, 9);
  });

  test('should switch branch when the field derivative changes sign', () => {
    expect(samples[51]!.branch).toBe('descending');
    expect(samples[150]!.branch).toBe('descending');
    expect(samples[151]!.branch).toBe('ascending');
    expect(samples[251]!.branch).toBe('descending');
  });

  test('should carry branch state into the next cycle', () => {
    // 周期 1 起點在上升分支: Blo(0) + δ = -0.3 + 0.1714285714
    expect(samples[200]!.branch).toBe('ascending');
    expect(samples[200]!.B).toBeCloseTo(-0.1285714286, 9);
  });

  test('should repeat the same loop once the transient has passed', () => {
    const reference = LoopValidator.cycle(samples, 1);
    for (let cycle = 2; cycle < 10; cycle++) {
      LoopValidator.cycle(samples, cycle).forEach((sample, i) => {
        expect(sample.B).toBeCloseTo(reference[i]!.B, 12);
      });
    }
  });

  test('should stay below saturation', () => {
    expect(LoopValidator.peakFluxDensity(samples)).toBeLessThanOrEqual(params.saturationFluxDensity);
  });
});

describe('ChanModelEngine - Air Gap', () => {
  test('zero gap gives identical output regardless of path length', () => {
    const engine = new ChanModelEngine();
    const reference = engine.simulate(params, waveform);
    const other = engine.simulate(withDefaults({ gapLength: 0, magneticPathLength: 0.5 }), waveform);

    expect(other).toEqual(reference);
  });

  test('zero gap output equals the ungapped branch values sample by sample', () => {
    const samples = new ChanModelEngine().simulate(params, waveform);
    const model = ChanModel.fromParameters(params);

    // 初始分支無偏移，可直接與未修正的曲線比較
    for (const sample of samples.filter(s => s.branch === 'initial')) {
      expect(sample.B).toBe(model.initialCurve(sample.H).value);
    }
  });

  test('a vanishing gap converges to the ungapped loop', () => {
    const engine = new ChanModelEngine();
    const ungapped = engine.simulate(params, waveform);
    const tiny = engine.simulate(withDefaults({ gapLength: 1e-12 }), waveform);

    tiny.forEach((sample, i) => {
      expect(Math.abs(sample.B - ungapped[i]!.B)).toBeLessThan(1e-6);
    });
  });

  test('a gapped core shears the loop to lower flux density', () => {
    const engine = new ChanModelEngine();
    const ungapped = engine.simulate(params, waveform);
    const gapped = engine.simulate(withDefaults({ gapLength: 1e-3 }), waveform);

    expect(LoopValidator.peakFluxDensity(gapped)).toBeLessThan(LoopValidator.peakFluxDensity(ungapped));
    expect(Math.abs(gapped[200]!.B)).toBeLessThan(Math.abs(ungapped[200]!.B));
  });
});

describe('ChanModelEngine - Validation', () => {
  test('should reject negative gap before any simulation work', () => {
    const spy = vi.spyOn(ChanModel, 'fromParameters');
    const engine = new ChanModelEngine();

    expect(() => engine.simulate(withDefaults({ gapLength: -1e-3 }), waveform)).toThrow(InvalidParameterError);
    expect(spy).not.toHaveBeenCalled();
  });

  test('should reject zero frequency', () => {
    expect(() => new ChanModelEngine().simulate(withDefaults({ excitationFrequency: 0 }), waveform))
      .toThrow(InvalidParameterError);
  });

  test('should reject remanence not below saturation', () => {
    expect(() => new ChanModelEngine().simulate(withDefaults({ remanence: 1.5 }), waveform))
      .toThrow('饱和磁通密度 Bs 必须大于剩磁 Br');
  });

  test('should reject non-positive saturation', () => {
    expect(() => new ChanModelEngine().simulate(withDefaults({ saturationFluxDensity: 0 }), waveform))
      .toThrow(InvalidParameterError);
  });

  test('should reject waveforms without strictly increasing time stamps', () => {
    const broken: ExcitationWaveform = {
      ...waveform,
      time: [0, 0.005, 0.005, 0.015],
      field: [0, 100, 0, -100],
    };
    expect(() => new ChanModelEngine().simulate(params, broken)).toThrow('时间戳必须严格递增');
  });

  test('should report the offending parameter', () => {
    try {
      new ChanModelEngine().simulate(withDefaults({ cycles: 0 }), waveform);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      expect(error).toMatchObject({ parameter: 'cycles', kind: 'invalid_parameter' });
    }
  });
});

describe('ChanModelEngine - Numeric Divergence', () => {
  test('should abort without partial output when the model overflows', () => {
    const huge = withDefaults({ excitationAmplitude: Number.MAX_VALUE });
    const engine = new ChanModelEngine();

    expect(() => engine.simulate(huge, createExcitationWaveform(huge))).toThrow(NumericDivergenceError);
  });
});

describe('ChanModelEngine - Logging', () => {
  test('should log progress only when verbose logging is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ChanModelEngine().simulate(params, waveform);
    expect(log).not.toHaveBeenCalled();

    new ChanModelEngine({ verboseLogging: true }).simulate(params, waveform);
    expect(log).toHaveBeenCalledTimes(1 + params.cycles);
  });
});
