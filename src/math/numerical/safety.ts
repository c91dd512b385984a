/**
 * 🔢 数值稳定性与参数验证工具
 *
 * 提供数值计算中的稳定性检查，以及模型参数的约束检查
 */

import type { ExcitationWaveform, ModelParameters } from '../../types/index';
import { InvalidParameterError, NumericDivergenceError } from '../../core/errors/index';

/**
 * 🔍 数值有效性检查
 */
export namespace NumericalSafety {

  /**
   * 检查数值是否有效（非 NaN 且有限）
   */
  export function isValidNumber(value: number): boolean {
    return isFinite(value) && !isNaN(value);
  }

  /**
   * 要求数值有限，否则视为模型发散
   */
  export function requireFinite(value: number, context: string): number {
    if (!isValidNumber(value)) {
      throw new NumericDivergenceError(`${context} 产生无效数值: ${value}`);
    }
    return value;
  }

  /**
   * 数值符号 (0 保持为 0)
   */
  export function direction(delta: number): -1 | 0 | 1 {
    if (delta > 0) return 1;
    if (delta < 0) return -1;
    return 0;
  }
}

/**
 * 🎯 模型参数验证工具
 */
export namespace ParameterValidation {

  export function validatePositive(value: number, parameter: string, label: string): void {
    if (!NumericalSafety.isValidNumber(value)) {
      throw new InvalidParameterError(parameter, `${label} 必须为有效数值: ${value}`);
    }
    if (value <= 0) {
      throw new InvalidParameterError(parameter, `${label} 必须为正数: ${value}`);
    }
  }

  export function validateNonNegative(value: number, parameter: string, label: string): void {
    if (!NumericalSafety.isValidNumber(value)) {
      throw new InvalidParameterError(parameter, `${label} 必须为有效数值: ${value}`);
    }
    if (value < 0) {
      throw new InvalidParameterError(parameter, `${label} 不能为负数: ${value}`);
    }
  }

  export function validateInteger(value: number, parameter: string, label: string, minValue: number): void {
    if (!Number.isInteger(value)) {
      throw new InvalidParameterError(parameter, `${label} 必须为整数: ${value}`);
    }
    if (value < minValue) {
      throw new InvalidParameterError(parameter, `${label} 不能小于 ${minValue}: ${value}`);
    }
  }

  /**
   * 验证完整参数集，任何违反约束的字段都会抛出 InvalidParameterError
   */
  export function validateModelParameters(params: ModelParameters): void {
    // 气隙最先检查：负气隙必须在任何计算开始前被拒绝
    validateNonNegative(params.gapLength, 'gapLength', '气隙长度');

    validatePositive(params.saturationFluxDensity, 'saturationFluxDensity', '饱和磁通密度 Bs');
    validatePositive(params.remanence, 'remanence', '剩磁 Br');
    if (params.saturationFluxDensity <= params.remanence) {
      throw new InvalidParameterError(
        'remanence',
        `饱和磁通密度 Bs 必须大于剩磁 Br: Bs=${params.saturationFluxDensity}, Br=${params.remanence}`
      );
    }
    validatePositive(params.coerciveField, 'coerciveField', '矫顽力 Hc');
    validatePositive(params.magneticPathLength, 'magneticPathLength', '磁路长度');
    validatePositive(params.coreCrossSection, 'coreCrossSection', '磁芯截面积');
    validateInteger(params.turns, 'turns', '匝数', 1);

    validatePositive(params.excitationAmplitude, 'excitationAmplitude', '激励幅值 Hmax');
    validatePositive(params.excitationFrequency, 'excitationFrequency', '激励频率');
    if (params.waveformShape !== 'sine' && params.waveformShape !== 'triangle') {
      throw new InvalidParameterError('waveformShape', `不支持的波形形状: ${String(params.waveformShape)}`);
    }
    validateInteger(params.samplesPerCycle, 'samplesPerCycle', '每周期采样点数', 4);
    validateInteger(params.cycles, 'cycles', '仿真周期数', 1);
    validateInteger(params.discardCycles, 'discardCycles', '丢弃周期数', 0);
  }

  /**
   * 验证波形：时间戳必须有限且严格递增，磁场值必须有限
   */
  export function validateWaveform(waveform: ExcitationWaveform): void {
    const { time, field } = waveform;

    if (time.length === 0) {
      throw new InvalidParameterError('waveform', '激励波形不能为空');
    }
    if (time.length !== field.length) {
      throw new InvalidParameterError(
        'waveform',
        `激励波形时间与磁场长度不一致: ${time.length} != ${field.length}`
      );
    }
    validatePositive(waveform.period, 'waveform', '波形周期');

    for (let i = 0; i < time.length; i++) {
      const t = time[i]!;
      const h = field[i]!;
      if (!NumericalSafety.isValidNumber(t) || !NumericalSafety.isValidNumber(h)) {
        throw new InvalidParameterError('waveform', `激励波形第 ${i} 点数值无效: t=${t}, H=${h}`);
      }
      if (i > 0 && t <= time[i - 1]!) {
        throw new InvalidParameterError('waveform', `激励波形时间戳必须严格递增: 第 ${i} 点 t=${t}`);
      }
    }

    if (time[time.length - 1]! >= waveform.period) {
      throw new InvalidParameterError('waveform', `激励波形时间戳超出一个周期: ${time[time.length - 1]}`);
    }
  }
}
