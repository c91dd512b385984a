/**
 * ⚠️ 磁滞仿真错误类型
 *
 * 所有错误都以可读信息抛给调用层，不在核心内部吞掉
 */

export type HysteresisErrorKind =
  | 'invalid_parameter'
  | 'numeric_divergence'
  | 'insufficient_data'
  | 'write_error';

export abstract class HysteresisModelError extends Error {
  abstract readonly kind: HysteresisErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 输入参数错误 (可通过重新输入恢复)
 */
export class InvalidParameterError extends HysteresisModelError {
  readonly kind = 'invalid_parameter';

  constructor(
    public readonly parameter: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * 模型无法给出物理有效的回线，本次运行终止
 */
export class NumericDivergenceError extends HysteresisModelError {
  readonly kind = 'numeric_divergence';
}

/**
 * 保留周期不足，无法平均
 */
export class InsufficientDataError extends HysteresisModelError {
  readonly kind = 'insufficient_data';
}

/**
 * 输出目标不可写
 */
export class WriteError extends HysteresisModelError {
  readonly kind = 'write_error';

  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export function isHysteresisModelError(error: unknown): error is HysteresisModelError {
  return error instanceof HysteresisModelError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
