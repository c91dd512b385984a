/**
 * 🚀 Chan 模型仿真引擎
 *
 * 逐点积分激励波形，显式跟踪当前磁化分支 (初始 / 上升 / 下降)。
 * 外加磁场导数变号时在反转点切换分支；周期之间状态连续传递，
 * 使后续周期收敛到稳态磁滞回线。
 *
 * 有气隙与无气隙共用同一路径：气隙只体现为磁阻比 k，k = 0 时修正项消失。
 */

import type { ExcitationWaveform, FieldStrength, FluxDensity, LoopSample, ModelParameters } from '../../types/index';
import { NumericalSafety, ParameterValidation } from '../../math/numerical/safety';
import { ChanModel, DEFAULT_GAP_SOLVER_OPTIONS, gapRatio } from '../model/chan_model';
import type { BranchState, GapSolverOptions } from '../model/chan_model';

/**
 * 引擎配置
 */
export interface EngineConfig {
  readonly gapSolver: GapSolverOptions;
  readonly verboseLogging: boolean;
}

/**
 * 积分过程中携带的状态
 */
interface IntegrationState {
  branch: BranchState;
  appliedField: FieldStrength;
  fluxDensity: FluxDensity;
  direction: -1 | 0 | 1;
}

export class ChanModelEngine {
  private readonly _config: EngineConfig;

  constructor(config: Partial<EngineConfig> = {}) {
    this._config = {
      gapSolver: DEFAULT_GAP_SOLVER_OPTIONS,
      verboseLogging: false,
      ...config,
    };
  }

  /**
   * 🎯 仿真 params.cycles 个周期，每个波形采样输出一个 LoopSample
   *
   * 参数与波形在任何计算之前完成验证；数值发散时直接抛出，不返回部分结果
   */
  simulate(params: ModelParameters, waveform: ExcitationWaveform): LoopSample[] {
    ParameterValidation.validateModelParameters(params);
    ParameterValidation.validateWaveform(waveform);

    const model = ChanModel.fromParameters(params);
    const k = gapRatio(params);
    const samples: LoopSample[] = [];
    let state: IntegrationState | undefined;
    let reversals = 0;

    if (this._config.verboseLogging) {
      console.log(
        `🧲 Chan 模型仿真: Bs=${params.saturationFluxDensity}T, Br=${params.remanence}T, ` +
        `Hc=${params.coerciveField}A/m, 气隙比 k=${k.toExponential(3)}, ` +
        `${params.cycles} 周期 × ${waveform.field.length} 点`
      );
    }

    for (let cycle = 0; cycle < params.cycles; cycle++) {
      const timeOffset = cycle * waveform.period;

      for (let phaseIndex = 0; phaseIndex < waveform.field.length; phaseIndex++) {
        const H = waveform.field[phaseIndex]!;

        if (state === undefined) {
          // 从退磁状态出发，沿初始磁化曲线
          const branch: BranchState = { kind: 'initial', shift: 0 };
          state = {
            branch,
            appliedField: H,
            fluxDensity: model.solve(branch, H, k, this._config.gapSolver),
            direction: 0,
          };
        } else {
          const next = this._advance(model, state, H, k);
          if (next.branch !== state.branch) {
            reversals++;
          }
          state = next;
        }

        samples.push({
          cycle,
          phaseIndex,
          time: timeOffset + waveform.time[phaseIndex]!,
          H,
          B: state.fluxDensity,
          branch: state.branch.kind,
        });
      }

      if (this._config.verboseLogging) {
        const last = samples[samples.length - 1];
        console.log(`  ✅ 周期 ${cycle} 完成: 分支切换 ${reversals} 次, 末点 B=${last?.B.toFixed(6)}T`);
      }
    }

    return samples;
  }

  /**
   * 前进一个采样点：检测导数变号，必要时在上一个点处反转分支
   */
  private _advance(
    model: ChanModel,
    state: IntegrationState,
    H: FieldStrength,
    k: number
  ): IntegrationState {
    const direction = NumericalSafety.direction(H - state.appliedField);
    let branch = state.branch;

    if (direction !== 0 && state.direction !== 0 && direction !== state.direction) {
      // 反转点处的磁芯磁场 Hcore = Ha - k*B
      const coreField = state.appliedField - k * state.fluxDensity;
      branch = model.reverseAt(direction > 0 ? 'ascending' : 'descending', coreField, state.fluxDensity);
    }

    return {
      branch,
      appliedField: H,
      fluxDensity: model.solve(branch, H, k, this._config.gapSolver),
      direction: direction === 0 ? state.direction : direction,
    };
  }
}
