/**
 * 🧪 HysteresisPipeline Integration Tests
 *
 * 完整流程: 運行日志 → 仿真 → 平均 → 導出 → 保存參數
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { HysteresisPipeline } from '../../../src/core/pipeline/hysteresis_pipeline';
import { ParameterStore } from '../../../src/core/persistence/parameter_store';
import { OUTPUT_FILES } from '../../../src/core/export/data_exporter';
import { withDefaults } from '../../../src/core/model/default_parameters';
import { InsufficientDataError, InvalidParameterError } from '../../../src/core/errors/index';
import { LoopValidator } from '../../utils/LoopValidator';

let workDir: string;
let outputDirectory: string;
let logPath: string;

const createPipeline = (): HysteresisPipeline =>
  new HysteresisPipeline({ outputDirectory, store: { filePath: logPath } });

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bh-pipeline-'));
  outputDirectory = path.join(workDir, 'output');
  logPath = path.join(workDir, 'simulation_log.log');
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe('HysteresisPipeline - Default Run', () => {
  test('should produce a closed, symmetric, bounded loop from defaults', () => {
    const result = createPipeline().run();

    expect(result.parameterSource).toBe('defaults');
    expect(result.parameters).toEqual(withDefaults());
    expect(result.samples).toHaveLength(2000);
    expect(result.averagedLoop.cyclesAveraged).toBe(2);
    expect(result.averagedLoop.points).toHaveLength(201);

    expect(LoopValidator.closureError(result.averagedLoop)).toBeLessThan(1e-6);
    expect(LoopValidator.symmetryError(result.averagedLoop)).toBeLessThan(1e-9);
    expect(LoopValidator.peakFluxDensity(result.averagedLoop.points)).toBeLessThanOrEqual(1.5);
  });

  test('should export all files and save the run log', () => {
    const result = createPipeline().run();

    expect(fs.readdirSync(outputDirectory).sort()).toEqual(Object.values(OUTPUT_FILES).sort());
    expect(result.exportReport.files).toHaveLength(6);
    expect(new ParameterStore({ filePath: logPath }).load()).toEqual(withDefaults());
  });
});

describe('HysteresisPipeline - Parameter Persistence', () => {
  test('should restore parameters saved by the previous run', () => {
    createPipeline().run({ coerciveField: 40, samplesPerCycle: 100 });
    const second = createPipeline().run();

    expect(second.parameterSource).toBe('run_log');
    expect(second.parameters.coerciveField).toBe(40);
    expect(second.samples).toHaveLength(1000);
  });

  test('should use a run log written by hand', () => {
    fs.writeFileSync(logPath, 'excitation_amplitude = 200\ncycles = 4\ndiscard_cycles = 1\n');

    const result = createPipeline().run();

    expect(result.parameterSource).toBe('run_log');
    expect(result.parameters.excitationAmplitude).toBe(200);
    expect(result.samples).toHaveLength(4 * 200);
    expect(result.averagedLoop.cyclesAveraged).toBe(3);
  });
});

describe('HysteresisPipeline - Failures', () => {
  test('invalid parameters abort before any output', () => {
    expect(() => createPipeline().run({ gapLength: -1e-3 })).toThrow(InvalidParameterError);
    expect(fs.existsSync(outputDirectory)).toBe(false);
    expect(fs.existsSync(logPath)).toBe(false);
  });

  test('discarding every cycle aborts before export', () => {
    expect(() => createPipeline().run({ discardCycles: 10 })).toThrow(InsufficientDataError);
    expect(fs.existsSync(outputDirectory)).toBe(false);
    expect(fs.existsSync(logPath)).toBe(false);
  });
});
