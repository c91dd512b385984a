/**
 * 🧲 Chan 磁滞模型
 *
 * 参考: Chan, Vlach, Wang, "Nonlinear transformer model for circuit
 * simulators", IEEE Trans. CAD, 1991.
 *
 * 饱和函数:
 *   F(x) = Bs * x / (|x| + Hc * (Bs/Br - 1))
 *
 * 主回线:
 *   上分支 (下降) Bup(H) = F(H + Hc)   → Bup(0) = +Br
 *   下分支 (上升) Blo(H) = F(H - Hc)   → Blo(0) = -Br
 *   初始磁化曲线 Bmid(H) = (Bup + Blo) / 2
 *
 * 气隙修正 (线性磁阻串联):
 *   Hcore = Ha - k * B,  k = lg / (μ0 * lc)
 */

// numeric 的函数挂在 exports 别名上，ESM 中只能经默认导入取得
import numeric from 'numeric';
import type { BranchKind, BranchSweep, FieldStrength, FluxDensity, ModelParameters } from '../../types/index';
import { NumericalSafety } from '../../math/numerical/safety';
import { InvalidParameterError, NumericDivergenceError } from '../errors/index';

/** 真空磁导率 (H/m) */
export const MU_0 = 4e-7 * Math.PI;

/**
 * 分支求值结果：数值及对 H 的斜率 dB/dH
 */
export interface BranchEvaluation {
  readonly value: FluxDensity;
  readonly slope: number;
}

/**
 * 当前分支的状态：分支类型及垂直偏移
 */
export interface BranchState {
  readonly kind: BranchKind;
  /** 次回线垂直偏移 δ (T)，主回线为 0 */
  readonly shift: FluxDensity;
}

export interface GapSolverOptions {
  readonly maxIterations: number;
  readonly tolerance: number;
}

export const DEFAULT_GAP_SOLVER_OPTIONS: GapSolverOptions = {
  maxIterations: 100,
  tolerance: 1e-12,
};

/**
 * ⚡ Chan 模型材料曲线
 */
export class ChanModel {
  /** 饱和函数分母中的常数项 Hc * (Bs/Br - 1) */
  private readonly _knee: number;

  constructor(
    private readonly _saturation: FluxDensity,
    remanence: FluxDensity,
    private readonly _coercivity: FieldStrength
  ) {
    this._knee = _coercivity * (_saturation / remanence - 1);
    if (!NumericalSafety.isValidNumber(this._knee) || this._knee <= 0) {
      throw new NumericDivergenceError(
        `饱和函数分母常数无效: Hc*(Bs/Br-1) = ${this._knee}`
      );
    }
  }

  static fromParameters(params: ModelParameters): ChanModel {
    return new ChanModel(params.saturationFluxDensity, params.remanence, params.coerciveField);
  }

  /**
   * 饱和函数 F(x) 及其导数 F'(x) = Bs * knee / (|x| + knee)^2
   */
  saturationFunction(x: number): BranchEvaluation {
    const denominator = Math.abs(x) + this._knee;
    if (!(denominator > 0)) {
      throw new NumericDivergenceError(`饱和函数分母为零或无效: x=${x}`);
    }
    const value = NumericalSafety.requireFinite(this._saturation * x / denominator, '饱和函数');
    const slope = this._saturation * this._knee / (denominator * denominator);
    return { value, slope };
  }

  upperBranch(H: FieldStrength): BranchEvaluation {
    return this.saturationFunction(H + this._coercivity);
  }

  lowerBranch(H: FieldStrength): BranchEvaluation {
    return this.saturationFunction(H - this._coercivity);
  }

  initialCurve(H: FieldStrength): BranchEvaluation {
    const up = this.upperBranch(H);
    const lo = this.lowerBranch(H);
    return { value: (up.value + lo.value) / 2, slope: (up.slope + lo.slope) / 2 };
  }

  /**
   * 按分支状态求 B(H)
   *
   * 次回线为主分支的垂直平移，并限制在主回线包络 [Blo, Bup] 之内
   */
  evaluate(state: BranchState, H: FieldStrength): BranchEvaluation {
    if (state.kind === 'initial') {
      return this.initialCurve(H);
    }

    const up = this.upperBranch(H);
    const lo = this.lowerBranch(H);

    if (state.kind === 'ascending') {
      const shifted = lo.value + state.shift;
      return shifted > up.value ? up : { value: shifted, slope: lo.slope };
    }

    const shifted = up.value - state.shift;
    return shifted < lo.value ? lo : { value: shifted, slope: up.slope };
  }

  /**
   * 在反转点 (Hr, Br') 处开始新分支，使新分支经过反转点
   */
  reverseAt(kind: 'ascending' | 'descending', H: FieldStrength, B: FluxDensity): BranchState {
    const shift = kind === 'ascending'
      ? B - this.lowerBranch(H).value
      : this.upperBranch(H).value - B;
    return { kind, shift: NumericalSafety.requireFinite(shift, '分支偏移') };
  }

  /**
   * 🔧 带气隙修正的分支求解
   *
   * 求解 B = branch(Ha - k*B)。残差 r(B) = B - branch(Ha - kB) 单调递增，
   * 根落在 (-Bs, Bs) 内。以 branch(Ha) 为初值做带区间保护的 Newton 迭代，
   * 步长越出区间时改用二分；k = 0 时初值残差恰为 0，直接返回。
   */
  solve(
    state: BranchState,
    appliedField: FieldStrength,
    gapRatio: number,
    options: GapSolverOptions = DEFAULT_GAP_SOLVER_OPTIONS
  ): FluxDensity {
    let low = -this._saturation;
    let high = this._saturation;
    let B = this.evaluate(state, appliedField).value;

    for (let iteration = 0; iteration < options.maxIterations; iteration++) {
      const branch = this.evaluate(state, appliedField - gapRatio * B);
      const residual = B - branch.value;
      if (Math.abs(residual) <= options.tolerance) {
        return B;
      }

      if (residual > 0) {
        high = Math.min(high, B);
      } else {
        low = Math.max(low, B);
      }

      const newton = B - residual / (1 + gapRatio * branch.slope);
      B = newton > low && newton < high ? newton : (low + high) / 2;
      NumericalSafety.requireFinite(B, '气隙修正迭代');
    }

    throw new NumericDivergenceError(
      `气隙修正迭代未收敛: Ha=${appliedField}, k=${gapRatio}, 迭代 ${options.maxIterations} 次`
    );
  }

  /**
   * 📊 静态回线扫描：H 从 -Hmax 线性扫到 +Hmax
   *
   * 分支做垂直调整 dB，使上下分支在 ±Hmax 处闭合 (次回线)；
   * 饱和激励时 dB 趋于 0，即为主回线
   */
  sweepBranches(amplitude: FieldStrength, points: number): BranchSweep {
    if (!Number.isInteger(points) || points < 2) {
      throw new InvalidParameterError('samplesPerCycle', `扫描点数无效: ${points}`);
    }
    const H: number[] = numeric.linspace(-amplitude, amplitude, points);
    const dB = (this.upperBranch(amplitude).value - this.lowerBranch(amplitude).value) / 2;

    const upper = H.map(h => this.upperBranch(h).value - dB);
    const lower = H.map(h => this.lowerBranch(h).value + dB);
    const middle = upper.map((bUp, i) => (bUp + lower[i]!) / 2);

    return { H, upper, lower, middle };
  }
}

/**
 * 气隙磁阻比 k = lg / (μ0 * lc)；无气隙时为 0
 */
export function gapRatio(params: ModelParameters): number {
  return params.gapLength / (MU_0 * params.magneticPathLength);
}
