/**
 * 🧪 NumericalSafety / ParameterValidation Unit Tests
 */

import { describe, test, expect } from 'vitest';
import { NumericalSafety, ParameterValidation } from '../../../src/math/numerical/safety';
import { withDefaults } from '../../../src/core/model/default_parameters';
import { createExcitationWaveform } from '../../../src/core/waveform/excitation';
import { InvalidParameterError, NumericDivergenceError } from '../../../src/core/errors/index';

describe('NumericalSafety', () => {
  test('should classify finite numbers', () => {
    expect(NumericalSafety.isValidNumber(1.5)).toBe(true);
    expect(NumericalSafety.isValidNumber(NaN)).toBe(false);
    expect(NumericalSafety.isValidNumber(-Infinity)).toBe(false);
  });

  test('requireFinite passes values through and rejects overflow', () => {
    expect(NumericalSafety.requireFinite(0.25, 'B')).toBe(0.25);
    expect(() => NumericalSafety.requireFinite(Infinity, 'B')).toThrow(NumericDivergenceError);
    expect(() => NumericalSafety.requireFinite(NaN, '上升分支')).toThrow('上升分支 产生无效数值: NaN');
  });

  test('direction returns the sign of a field change', () => {
    expect(NumericalSafety.direction(3)).toBe(1);
    expect(NumericalSafety.direction(-0.1)).toBe(-1);
    expect(NumericalSafety.direction(0)).toBe(0);
  });
});

describe('ParameterValidation - Model Parameters', () => {
  test('should accept the defaults', () => {
    expect(() => ParameterValidation.validateModelParameters(withDefaults())).not.toThrow();
  });

  test.each([
    ['gapLength', { gapLength: -1e-4 }],
    ['remanence', { remanence: 0 }],
    ['coerciveField', { coerciveField: -5 }],
    ['coreCrossSection', { coreCrossSection: 0 }],
    ['turns', { turns: 2.5 }],
    ['samplesPerCycle', { samplesPerCycle: 3 }],
    ['discardCycles', { discardCycles: -1 }],
  ] as const)('should name %s when it is out of range', (parameter, overrides) => {
    try {
      ParameterValidation.validateModelParameters(withDefaults(overrides));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      expect(error).toMatchObject({ parameter });
    }
  });

  test('should report integers below their minimum', () => {
    expect(() => ParameterValidation.validateInteger(0, 'cycles', '仿真周期数', 1))
      .toThrow('仿真周期数 不能小于 1: 0');
  });
});

describe('ParameterValidation - Waveform', () => {
  const waveform = createExcitationWaveform(withDefaults({ samplesPerCycle: 4 }));

  test('should accept a generated waveform', () => {
    expect(() => ParameterValidation.validateWaveform(waveform)).not.toThrow();
  });

  test('should reject empty and mismatched waveforms', () => {
    expect(() => ParameterValidation.validateWaveform({ ...waveform, time: [], field: [] }))
      .toThrow('激励波形不能为空');
    expect(() => ParameterValidation.validateWaveform({ ...waveform, field: [0, 1] }))
      .toThrow(InvalidParameterError);
  });

  test('should reject time stamps beyond one period', () => {
    expect(() => ParameterValidation.validateWaveform({ ...waveform, time: [0, 0.005, 0.01, 0.02] }))
      .toThrow('激励波形时间戳超出一个周期');
  });
});
