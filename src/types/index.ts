/**
 * 🎯 磁滞回线生成器核心类型定义
 *
 * 基于 Chan 模型的 B-H 回线类型系统
 */

// 基础物理量类型
export type Time = number;
export type FieldStrength = number;   // H, A/m
export type FluxDensity = number;     // B, T
export type Length = number;          // m
export type Area = number;            // m²
export type Frequency = number;       // Hz

/**
 * 激励波形形状
 */
export type WaveformShape = 'sine' | 'triangle';

/**
 * 当前所在的磁化分支
 */
export type BranchKind = 'initial' | 'ascending' | 'descending';

/**
 * 🧲 模型参数 (材料 + 几何 + 激励)
 *
 * 一次仿真过程中保持不变
 */
export interface ModelParameters {
  /** 饱和磁通密度 Bs (T) */
  readonly saturationFluxDensity: FluxDensity;
  /** 剩磁 Br (T)，必须小于 Bs */
  readonly remanence: FluxDensity;
  /** 矫顽力 Hc (A/m) */
  readonly coerciveField: FieldStrength;
  /** 气隙长度 (m)，0 表示无气隙磁芯 */
  readonly gapLength: Length;
  /** 磁路长度 (m) */
  readonly magneticPathLength: Length;
  /** 磁芯截面积 (m²) */
  readonly coreCrossSection: Area;
  /** 绕组匝数 */
  readonly turns: number;
  /** 激励磁场幅值 Hmax (A/m) */
  readonly excitationAmplitude: FieldStrength;
  /** 激励频率 (Hz) */
  readonly excitationFrequency: Frequency;
  readonly waveformShape: WaveformShape;
  /** 每周期采样点数 */
  readonly samplesPerCycle: number;
  /** 仿真周期数 */
  readonly cycles: number;
  /** 平均前丢弃的暂态周期数 */
  readonly discardCycles: number;
}

/**
 * 📈 激励波形 (一个周期)
 */
export interface ExcitationWaveform {
  readonly shape: WaveformShape;
  readonly amplitude: FieldStrength;
  readonly frequency: Frequency;
  readonly period: Time;
  /** 严格递增的时间戳，从 0 开始 */
  readonly time: readonly Time[];
  /** 外加磁场 */
  readonly field: readonly FieldStrength[];
}

/**
 * 单个 B-H 采样点
 */
export interface LoopSample {
  readonly cycle: number;
  /** 周期内的相位索引 (对应波形采样位置) */
  readonly phaseIndex: number;
  readonly time: Time;
  readonly H: FieldStrength;
  readonly B: FluxDensity;
  readonly branch: BranchKind;
}

export interface BHPoint {
  readonly H: FieldStrength;
  readonly B: FluxDensity;
}

/**
 * 📊 稳态平均回线
 */
export interface AveragedLoop {
  /** 闭合回线：最后一个点与第一个点相同 */
  readonly points: readonly BHPoint[];
  readonly cyclesAveraged: number;
  readonly discardedCycles: number;
  readonly samplesPerCycle: number;
  /** 保留周期与平均值之间的最大偏差 (T) */
  readonly cycleSpread: number;
}

/**
 * 静态主回线扫描结果 (上/下分支及中线)
 */
export interface BranchSweep {
  readonly H: readonly FieldStrength[];
  readonly upper: readonly FluxDensity[];
  readonly lower: readonly FluxDensity[];
  readonly middle: readonly FluxDensity[];
}
