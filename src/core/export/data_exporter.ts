/**
 * 📤 回线数据导出
 *
 * 输出逗号分隔的表格文本，供外部电路仿真器 (如变压器模型) 使用：
 *   raw_loop.csv          cycle_index,H,B       每个采样一行
 *   averaged_loop.csv     H,B                   闭合稳态回线
 *   parameters.txt        本次运行的参数摘要      (可选)
 *   bh_branches.csv       H,B_upper,B_lower     静态回线两分支 (可选)
 *   bh_middle_curve.csv   H,B                   两分支平均的单值曲线 (可选)
 *   winding_curve.csv     I,flux_linkage        绕组电流-磁链曲线 (可选)
 *
 * 导出是最终的非关键产物，不做原子写入；失败时保留已写部分并抛出 WriteError
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AveragedLoop, BranchSweep, LoopSample, ModelParameters } from '../../types/index';
import { formatRunLog } from '../persistence/parameter_store';
import { WriteError, describeError } from '../errors/index';

export const OUTPUT_FILES = {
  raw: 'raw_loop.csv',
  averaged: 'averaged_loop.csv',
  summary: 'parameters.txt',
  branches: 'bh_branches.csv',
  middleCurve: 'bh_middle_curve.csv',
  winding: 'winding_curve.csv',
} as const;

/**
 * 可选输出所需的附加数据
 */
export interface ExportExtras {
  /** 提供时写出参数摘要和绕组曲线 */
  readonly parameters?: ModelParameters;
  /** 提供时写出静态回线两分支及中线 */
  readonly branches?: BranchSweep;
}

export interface ExporterConfig {
  readonly writeSummary: boolean;
  readonly writeBranches: boolean;
  readonly writeWindingCurve: boolean;
  readonly verboseLogging: boolean;
}

export interface ExportReport {
  readonly directory: string;
  /** 已写出的文件 (绝对路径) */
  readonly files: readonly string[];
}

export class DataExporter {
  private readonly _config: ExporterConfig;

  constructor(config: Partial<ExporterConfig> = {}) {
    this._config = {
      writeSummary: true,
      writeBranches: true,
      writeWindingCurve: true,
      verboseLogging: false,
      ...config,
    };
  }

  export(
    samples: readonly LoopSample[],
    averagedLoop: AveragedLoop,
    destination: string,
    extras: ExportExtras = {}
  ): ExportReport {
    const directory = path.resolve(destination);
    try {
      fs.mkdirSync(directory, { recursive: true });
    } catch (error) {
      throw new WriteError(directory, `无法创建输出目录 ${directory}: ${describeError(error)}`, error);
    }

    const files: string[] = [];
    const write = (name: string, content: string): void => {
      const file = path.join(directory, name);
      try {
        fs.writeFileSync(file, content, 'utf8');
      } catch (error) {
        throw new WriteError(file, `无法写入 ${file}: ${describeError(error)}`, error);
      }
      files.push(file);
      if (this._config.verboseLogging) {
        console.log(`📤 已写出 ${file}`);
      }
    };

    write(OUTPUT_FILES.raw, formatRawLoop(samples));
    write(OUTPUT_FILES.averaged, formatAveragedLoop(averagedLoop));

    const { parameters, branches } = extras;
    if (parameters && this._config.writeSummary) {
      write(OUTPUT_FILES.summary, formatRunLog(parameters, 'Chan 模型仿真参数摘要'));
    }
    if (branches && this._config.writeBranches) {
      write(OUTPUT_FILES.branches, formatBranches(branches));
      write(OUTPUT_FILES.middleCurve, formatTable(['H', 'B'], branches.H.map((H, i) => [H, branches.middle[i]!])));
    }
    if (parameters && this._config.writeWindingCurve) {
      write(OUTPUT_FILES.winding, formatWindingCurve(averagedLoop, parameters));
    }

    return { directory, files };
  }
}

export function formatRawLoop(samples: readonly LoopSample[]): string {
  return formatTable(['cycle_index', 'H', 'B'], samples.map(s => [s.cycle, s.H, s.B]));
}

export function formatAveragedLoop(loop: AveragedLoop): string {
  return formatTable(['H', 'B'], loop.points.map(p => [p.H, p.B]));
}

export function formatBranches(sweep: BranchSweep): string {
  return formatTable(
    ['H', 'B_upper', 'B_lower'],
    sweep.H.map((H, i) => [H, sweep.upper[i]!, sweep.lower[i]!])
  );
}

/**
 * 绕组电流 I = H * lc / N，磁链 λ = N * Ac * B
 */
export function formatWindingCurve(loop: AveragedLoop, params: ModelParameters): string {
  const { magneticPathLength, coreCrossSection, turns } = params;
  return formatTable(
    ['I', 'flux_linkage'],
    loop.points.map(p => [p.H * magneticPathLength / turns, turns * coreCrossSection * p.B])
  );
}

function formatTable(header: readonly string[], rows: readonly (readonly number[])[]): string {
  const lines = [header.join(',')];
  for (const row of rows) {
    lines.push(row.map(String).join(','));
  }
  return lines.join('\n') + '\n';
}
