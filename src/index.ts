/**
 * 🧲 Chan 模型磁滞回线生成器 - 公共入口
 */

export type * from './types/index';

export * from './core/errors/index';
export { NumericalSafety, ParameterValidation } from './math/numerical/safety';

export { ChanModel, MU_0, gapRatio, DEFAULT_GAP_SOLVER_OPTIONS } from './core/model/chan_model';
export type { BranchEvaluation, BranchState, GapSolverOptions } from './core/model/chan_model';
export { DEFAULT_MODEL_PARAMETERS, withDefaults } from './core/model/default_parameters';

export { createWaveform, createExcitationWaveform } from './core/waveform/excitation';
export type { WaveformSpec } from './core/waveform/excitation';

export { ChanModelEngine } from './core/simulation/chan_model_engine';
export type { EngineConfig } from './core/simulation/chan_model_engine';

export { LoopAverager, MIN_RETAINED_CYCLES } from './core/analysis/loop_averager';
export type { AveragerConfig } from './core/analysis/loop_averager';

export { ParameterStore, DEFAULT_RUN_LOG_PATH, parseRunLog, formatRunLog } from './core/persistence/parameter_store';
export type { ParameterStoreConfig } from './core/persistence/parameter_store';

export {
  DataExporter,
  OUTPUT_FILES,
  formatRawLoop,
  formatAveragedLoop,
  formatBranches,
  formatWindingCurve,
} from './core/export/data_exporter';
export type { ExportExtras, ExporterConfig, ExportReport } from './core/export/data_exporter';

export { HysteresisPipeline } from './core/pipeline/hysteresis_pipeline';
export type { PipelineConfig, PipelineResult } from './core/pipeline/hysteresis_pipeline';
