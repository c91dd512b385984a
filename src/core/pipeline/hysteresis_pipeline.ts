/**
 * 🔄 磁滞回线生成流水线
 *
 *   参数加载 → 仿真 → 稳态平均 → 导出 → 参数保存
 *
 * 同步单线程执行，各阶段只消费上一阶段的完整输出。
 * 仿真与平均都成功后才导出；导出成功后才保存参数。
 */

import type { AveragedLoop, BranchSweep, ExcitationWaveform, LoopSample, ModelParameters } from '../../types/index';
import { ParameterValidation } from '../../math/numerical/safety';
import { ChanModel } from '../model/chan_model';
import { withDefaults } from '../model/default_parameters';
import { createExcitationWaveform } from '../waveform/excitation';
import { ChanModelEngine } from '../simulation/chan_model_engine';
import type { EngineConfig } from '../simulation/chan_model_engine';
import { LoopAverager } from '../analysis/loop_averager';
import type { AveragerConfig } from '../analysis/loop_averager';
import { ParameterStore } from '../persistence/parameter_store';
import type { ParameterStoreConfig } from '../persistence/parameter_store';
import { DataExporter } from '../export/data_exporter';
import type { ExportReport, ExporterConfig } from '../export/data_exporter';

export interface PipelineConfig {
  /** 导出目录 */
  readonly outputDirectory: string;
  readonly engine: Partial<EngineConfig>;
  readonly averager: Partial<AveragerConfig>;
  readonly store: Partial<ParameterStoreConfig>;
  readonly exporter: Partial<ExporterConfig>;
  readonly verboseLogging: boolean;
}

export interface PipelineResult {
  readonly parameters: ModelParameters;
  readonly waveform: ExcitationWaveform;
  readonly samples: readonly LoopSample[];
  readonly averagedLoop: AveragedLoop;
  readonly branches: BranchSweep;
  readonly exportReport: ExportReport;
  /** 本次参数来源 */
  readonly parameterSource: 'run_log' | 'defaults';
}

export class HysteresisPipeline {
  private readonly _config: PipelineConfig;
  private readonly _engine: ChanModelEngine;
  private readonly _averager: LoopAverager;
  private readonly _store: ParameterStore;
  private readonly _exporter: DataExporter;

  constructor(config: Partial<PipelineConfig> = {}) {
    this._config = {
      outputDirectory: 'output',
      engine: {},
      averager: {},
      store: {},
      exporter: {},
      verboseLogging: false,
      ...config,
    };

    const verboseLogging = this._config.verboseLogging;
    this._engine = new ChanModelEngine({ verboseLogging, ...this._config.engine });
    this._averager = new LoopAverager({ verboseLogging, ...this._config.averager });
    this._store = new ParameterStore({ verboseLogging, ...this._config.store });
    this._exporter = new DataExporter({ verboseLogging, ...this._config.exporter });
  }

  /**
   * 读取初始参数：优先运行日志，否则内置默认值
   */
  loadParameters(): { parameters: ModelParameters; source: 'run_log' | 'defaults' } {
    const stored = this._store.load();
    return stored
      ? { parameters: stored, source: 'run_log' }
      : { parameters: withDefaults(), source: 'defaults' };
  }

  /**
   * 🚀 执行完整流水线；overrides 覆盖已加载的参数 (相当于用户编辑)
   */
  run(overrides: Partial<ModelParameters> = {}): PipelineResult {
    const { parameters: loaded, source } = this.loadParameters();
    const parameters: ModelParameters = { ...loaded, ...overrides };

    ParameterValidation.validateModelParameters(parameters);

    const waveform = createExcitationWaveform(parameters);
    const samples = this._engine.simulate(parameters, waveform);
    const averagedLoop = this._averager.average(samples, parameters.discardCycles);
    const branches = ChanModel.fromParameters(parameters)
      .sweepBranches(parameters.excitationAmplitude, parameters.samplesPerCycle);

    const exportReport = this._exporter.export(samples, averagedLoop, this._config.outputDirectory, {
      parameters,
      branches,
    });

    this._store.save(parameters);

    if (this._config.verboseLogging) {
      console.log(
        `✅ 流水线完成: ${samples.length} 个采样, 平均 ${averagedLoop.cyclesAveraged} 个周期, ` +
        `输出 ${exportReport.files.length} 个文件至 ${exportReport.directory}`
      );
    }

    return { parameters, waveform, samples, averagedLoop, branches, exportReport, parameterSource: source };
  }
}
