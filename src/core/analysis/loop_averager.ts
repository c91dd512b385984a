/**
 * 📊 稳态回线平均器
 *
 * 丢弃前 discardCycles 个暂态周期，将其余周期按相位索引对齐后取平均，
 * 得到一条闭合的代表性回线
 */

import type { AveragedLoop, BHPoint, LoopSample } from '../../types/index';
import { ParameterValidation } from '../../math/numerical/safety';
import { InsufficientDataError } from '../errors/index';

export interface AveragerConfig {
  /** 保留周期之间允许的最大偏差 (T)，超过时给出警告 */
  readonly steadyStateTolerance: number;
  readonly verboseLogging: boolean;
}

/** 平均时最少需要保留的周期数 */
export const MIN_RETAINED_CYCLES = 2;

export class LoopAverager {
  private readonly _config: AveragerConfig;

  constructor(config: Partial<AveragerConfig> = {}) {
    this._config = {
      steadyStateTolerance: 1e-6,
      verboseLogging: false,
      ...config,
    };
  }

  average(samples: readonly LoopSample[], discardCycles: number): AveragedLoop {
    ParameterValidation.validateInteger(discardCycles, 'discardCycles', '丢弃周期数', 0);

    // 按周期编号排序后丢弃最前面的 discardCycles 个，与起始编号无关
    const cycles = [...groupByCycle(samples).entries()].sort(([a], [b]) => a - b);
    const retained = cycles.slice(discardCycles);

    if (retained.length < MIN_RETAINED_CYCLES) {
      throw new InsufficientDataError(
        `至少需要保留 ${MIN_RETAINED_CYCLES} 个周期才能平均: 共 ${cycles.length} 个周期, 丢弃 ${discardCycles} 个`
      );
    }

    const rows = alignPhases(retained);

    const fields = rows.map(cycle => cycle.map(sample => sample.H));
    const fluxes = rows.map(cycle => cycle.map(sample => sample.B));
    const count = rows.length;

    const meanH = columnMean(fields);
    const meanB = columnMean(fluxes);

    // 各保留周期相对平均回线的最大偏差
    const cycleSpread = Math.max(
      ...fluxes.map(row => row.reduce((max, B, i) => Math.max(max, Math.abs(B - meanB[i]!)), 0))
    );
    if (cycleSpread > this._config.steadyStateTolerance) {
      console.warn(
        `⚠️ 保留周期尚未达到稳态: 最大偏差 ${cycleSpread.toExponential(3)}T > ${this._config.steadyStateTolerance}T，` +
        `可增加丢弃周期数`
      );
    }

    const points: BHPoint[] = meanH.map((H, i) => ({ H, B: meanB[i]! }));
    points.push({ ...points[0]! });

    if (this._config.verboseLogging) {
      console.log(`📊 平均回线: ${count} 个周期 × ${meanH.length} 点, 丢弃 ${discardCycles} 个周期`);
    }

    return {
      points,
      cyclesAveraged: count,
      discardedCycles: discardCycles,
      samplesPerCycle: meanH.length,
      cycleSpread,
    };
  }
}

/**
 * 逐列平均 (同一相位索引跨周期平均)
 */
function columnMean(rows: readonly number[][]): number[] {
  const width = rows[0]?.length ?? 0;
  const mean = new Array<number>(width).fill(0);
  for (const row of rows) {
    for (let i = 0; i < width; i++) {
      mean[i] = (mean[i] ?? 0) + row[i]!;
    }
  }
  return mean.map(sum => sum / rows.length);
}

function groupByCycle(samples: readonly LoopSample[]): Map<number, LoopSample[]> {
  const cycles = new Map<number, LoopSample[]>();
  for (const sample of samples) {
    const bucket = cycles.get(sample.cycle);
    if (bucket) {
      bucket.push(sample);
    } else {
      cycles.set(sample.cycle, [sample]);
    }
  }
  return cycles;
}

/**
 * 按相位索引排序保留周期，并检查相位索引完整且一一对应
 */
function alignPhases(retained: ReadonlyArray<[number, LoopSample[]]>): LoopSample[][] {
  let expectedLength: number | undefined;
  for (const [cycle, bucket] of retained) {
    bucket.sort((a, b) => a.phaseIndex - b.phaseIndex);
    expectedLength ??= bucket.length;
    if (bucket.length !== expectedLength) {
      throw new InsufficientDataError(
        `周期 ${cycle} 的采样数 ${bucket.length} 与其他周期 (${expectedLength}) 不一致，无法按相位对齐`
      );
    }
    bucket.forEach((sample, index) => {
      if (sample.phaseIndex !== index) {
        throw new InsufficientDataError(`周期 ${cycle} 缺少相位索引 ${index}`);
      }
    });
  }

  return retained.map(([, bucket]) => bucket);
}
