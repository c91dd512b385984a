/**
 * 📈 激励波形生成
 *
 * 由幅值 / 频率 / 形状确定性地生成一个周期的外加磁场采样
 *   t_k = k * T / N,  k = 0..N-1
 */

import numeric from 'numeric';
import type { ExcitationWaveform, FieldStrength, Frequency, ModelParameters, WaveformShape } from '../../types/index';
import { ParameterValidation } from '../../math/numerical/safety';
import { InvalidParameterError } from '../errors/index';

export interface WaveformSpec {
  readonly shape: WaveformShape;
  readonly amplitude: FieldStrength;
  readonly frequency: Frequency;
  readonly samplesPerCycle: number;
}

/**
 * 归一化波形 (相位 0..1 → -1..1)
 */
const SHAPES: Record<WaveformShape, (phase: number) => number> = {
  sine: phase => Math.sin(2 * Math.PI * phase),
  // 三角波：0 → +1 (T/4) → -1 (3T/4) → 0
  triangle: phase => {
    if (phase < 0.25) return 4 * phase;
    if (phase < 0.75) return 2 - 4 * phase;
    return 4 * phase - 4;
  },
};

export function createWaveform(spec: WaveformSpec): ExcitationWaveform {
  ParameterValidation.validatePositive(spec.amplitude, 'excitationAmplitude', '激励幅值 Hmax');
  ParameterValidation.validatePositive(spec.frequency, 'excitationFrequency', '激励频率');
  ParameterValidation.validateInteger(spec.samplesPerCycle, 'samplesPerCycle', '每周期采样点数', 4);

  const shapeFn = SHAPES[spec.shape];
  if (shapeFn === undefined) {
    throw new InvalidParameterError('waveformShape', `不支持的波形形状: ${String(spec.shape)}`);
  }

  const N = spec.samplesPerCycle;
  const period = 1 / spec.frequency;
  // linspace 包含终点 T，去掉后得到 N 个半开区间采样
  const phases: number[] = numeric.linspace(0, 1, N + 1).slice(0, N);

  return {
    shape: spec.shape,
    amplitude: spec.amplitude,
    frequency: spec.frequency,
    period,
    time: phases.map(phase => phase * period),
    field: phases.map(phase => spec.amplitude * shapeFn(phase)),
  };
}

/**
 * 从模型参数生成激励波形
 */
export function createExcitationWaveform(params: ModelParameters): ExcitationWaveform {
  return createWaveform({
    shape: params.waveformShape,
    amplitude: params.excitationAmplitude,
    frequency: params.excitationFrequency,
    samplesPerCycle: params.samplesPerCycle,
  });
}
