/**
 * 💾 参数存储 - 运行日志 (RunLog)
 *
 * 保存最近一次使用的模型参数，下次启动时恢复。
 * 文件为纯文本，每行 `name = value`，便于人工查看和编辑：
 *   - 未知键被忽略，缺失键回退默认值，格式可向后兼容地扩展
 *   - 兼容旧版单行格式 `Simulation parameters: Bs=1.5, Br=0.3, Hc=50, Hmax=100, N=200`
 *   - 写入采用 临时文件 + rename，中途崩溃不会破坏原有日志
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ModelParameters, WaveformShape } from '../../types/index';
import { DEFAULT_MODEL_PARAMETERS } from '../model/default_parameters';
import { WriteError, describeError } from '../errors/index';

type MutableParameters = { -readonly [K in keyof ModelParameters]: ModelParameters[K] };
type NumericField = Exclude<keyof ModelParameters, 'waveformShape'>;

interface NumericFieldSpec {
  readonly key: string;
  readonly field: NumericField;
  readonly integer: boolean;
  readonly unit: string;
  /** 旧版日志中使用的简写 */
  readonly legacyAlias?: string;
}

/**
 * 日志键 ↔ 参数字段映射，顺序即写入顺序
 */
const NUMERIC_FIELDS: readonly NumericFieldSpec[] = [
  { key: 'saturation_flux_density', field: 'saturationFluxDensity', integer: false, unit: 'T', legacyAlias: 'Bs' },
  { key: 'remanence', field: 'remanence', integer: false, unit: 'T', legacyAlias: 'Br' },
  { key: 'coercive_field', field: 'coerciveField', integer: false, unit: 'A/m', legacyAlias: 'Hc' },
  { key: 'gap_length', field: 'gapLength', integer: false, unit: 'm' },
  { key: 'magnetic_path_length', field: 'magneticPathLength', integer: false, unit: 'm' },
  { key: 'core_cross_section', field: 'coreCrossSection', integer: false, unit: 'm^2' },
  { key: 'turns', field: 'turns', integer: true, unit: '' },
  { key: 'excitation_amplitude', field: 'excitationAmplitude', integer: false, unit: 'A/m', legacyAlias: 'Hmax' },
  { key: 'excitation_frequency', field: 'excitationFrequency', integer: false, unit: 'Hz' },
  { key: 'samples_per_cycle', field: 'samplesPerCycle', integer: true, unit: '', legacyAlias: 'N' },
  { key: 'cycles', field: 'cycles', integer: true, unit: '' },
  { key: 'discard_cycles', field: 'discardCycles', integer: true, unit: '' },
];

const SHAPE_KEY = 'waveform_shape';
const WAVEFORM_SHAPES: readonly WaveformShape[] = ['sine', 'triangle'];
const LEGACY_MARKER = 'Simulation parameters:';

export interface ParameterStoreConfig {
  readonly filePath: string;
  readonly verboseLogging: boolean;
}

export const DEFAULT_RUN_LOG_PATH = 'simulation_log.log';

export class ParameterStore {
  private readonly _config: ParameterStoreConfig;

  constructor(config: Partial<ParameterStoreConfig> = {}) {
    this._config = {
      filePath: DEFAULT_RUN_LOG_PATH,
      verboseLogging: false,
      ...config,
    };
  }

  get filePath(): string {
    return this._config.filePath;
  }

  /**
   * 读取运行日志；日志不存在时返回 undefined (首次运行)
   */
  load(): ModelParameters | undefined {
    let text: string;
    try {
      text = fs.readFileSync(this._config.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        if (this._config.verboseLogging) {
          console.log(`📂 运行日志不存在，使用默认参数: ${this._config.filePath}`);
        }
        return undefined;
      }
      throw error;
    }

    const params = parseRunLog(text);
    if (this._config.verboseLogging) {
      console.log(`📂 已从运行日志加载参数: ${this._config.filePath}`);
    }
    return params;
  }

  /**
   * 原子地覆盖运行日志
   */
  save(params: ModelParameters): void {
    const target = this._config.filePath;
    const tempPath = `${target}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(path.resolve(target)), { recursive: true });
      fs.writeFileSync(tempPath, formatRunLog(params), 'utf8');
      fs.renameSync(tempPath, target);
    } catch (error) {
      removeTempFile(tempPath);
      throw new WriteError(target, `无法保存运行日志 ${target}: ${describeError(error)}`, error);
    }

    if (this._config.verboseLogging) {
      console.log(`💾 运行参数已保存: ${target}`);
    }
  }
}

/**
 * 解析运行日志文本；未知键忽略，缺失或格式错误的值回退默认值
 */
export function parseRunLog(text: string): ModelParameters {
  const values: MutableParameters = { ...DEFAULT_MODEL_PARAMETERS };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const markerIndex = line.indexOf(LEGACY_MARKER);
    if (markerIndex >= 0) {
      // 旧版格式: 一行内以逗号分隔的 name=value
      const entries = line.slice(markerIndex + LEGACY_MARKER.length).split(',');
      for (const entry of entries) {
        const [name, value] = splitAssignment(entry);
        const spec = NUMERIC_FIELDS.find(candidate => candidate.legacyAlias === name);
        if (spec) {
          assignNumeric(values, spec, value);
        }
      }
      continue;
    }

    const [name, value] = splitAssignment(line);
    if (name === SHAPE_KEY) {
      const shape = WAVEFORM_SHAPES.find(candidate => candidate === value);
      if (shape) {
        values.waveformShape = shape;
      } else {
        console.warn(`⚠️ 运行日志中 ${SHAPE_KEY} 的值无效 "${value}"，使用默认值 ${DEFAULT_MODEL_PARAMETERS.waveformShape}`);
      }
      continue;
    }

    const spec = NUMERIC_FIELDS.find(candidate => candidate.key === name);
    if (spec) {
      assignNumeric(values, spec, value);
    }
  }

  return values;
}

/**
 * 生成运行日志文本 (也用作参数摘要)
 */
export function formatRunLog(params: ModelParameters, title: string = '最近一次运行的 Chan 模型参数'): string {
  const lines = [`# ${title}`, '# 格式: name = value，以 # 开头的行为注释'];

  for (const spec of NUMERIC_FIELDS) {
    const unit = spec.unit ? `  # ${spec.unit}` : '';
    lines.push(`${spec.key} = ${params[spec.field]}${unit}`);
    if (spec.field === 'excitationFrequency') {
      lines.push(`${SHAPE_KEY} = ${params.waveformShape}`);
    }
  }

  return lines.join('\n') + '\n';
}

function splitAssignment(entry: string): [string, string] {
  const withoutComment = entry.split('#')[0] ?? '';
  const equalsIndex = withoutComment.indexOf('=');
  if (equalsIndex < 0) {
    return [withoutComment.trim(), ''];
  }
  return [withoutComment.slice(0, equalsIndex).trim(), withoutComment.slice(equalsIndex + 1).trim()];
}

function assignNumeric(values: MutableParameters, spec: NumericFieldSpec, raw: string): void {
  const parsed = Number(raw);
  const valid = raw.length > 0 && Number.isFinite(parsed) && (!spec.integer || Number.isInteger(parsed));
  if (!valid) {
    console.warn(
      `⚠️ 运行日志中 ${spec.key} 的值无效 "${raw}"，使用默认值 ${DEFAULT_MODEL_PARAMETERS[spec.field]}`
    );
    values[spec.field] = DEFAULT_MODEL_PARAMETERS[spec.field];
    return;
  }
  values[spec.field] = parsed;
}

/**
 * 清理失败写入留下的临时文件；清理失败只警告，不覆盖原始错误
 */
function removeTempFile(tempPath: string): void {
  try {
    fs.rmSync(tempPath, { force: true });
  } catch (error) {
    console.warn(`⚠️ 无法删除临时文件 ${tempPath}: ${describeError(error)}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
