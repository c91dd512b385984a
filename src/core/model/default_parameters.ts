import type { ModelParameters } from '../../types/index';

/**
 * 首次运行 (无运行日志) 时使用的内置默认参数
 */
export const DEFAULT_MODEL_PARAMETERS: ModelParameters = {
  saturationFluxDensity: 1.5,
  remanence: 0.3,
  coerciveField: 50,
  gapLength: 0,
  magneticPathLength: 0.1,
  coreCrossSection: 1e-4,
  turns: 100,
  excitationAmplitude: 100,
  excitationFrequency: 50,
  waveformShape: 'sine',
  samplesPerCycle: 200,
  cycles: 10,
  discardCycles: 8,
};

export function withDefaults(overrides: Partial<ModelParameters> = {}): ModelParameters {
  return { ...DEFAULT_MODEL_PARAMETERS, ...overrides };
}
