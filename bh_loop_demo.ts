/**
 * 🧲 B-H 回线生成演示
 *
 * 命令行前端：从运行日志恢复上次参数，按命令行覆盖后执行完整流水线，
 * 打印稳态回线摘要并导出数据文件。
 *
 * 用法:
 *   npm run demo -- --Bs=1.5 --Br=0.3 --Hc=50 --Hmax=100 --N=200 --gap=0.0005 --out=output
 *
 * 📊 导出文件:
 *   raw_loop.csv / averaged_loop.csv / bh_branches.csv / bh_middle_curve.csv
 *   winding_curve.csv / parameters.txt
 */

import { parseArgs } from 'util';
import type { ModelParameters } from './src/types/index';
import { HysteresisPipeline } from './src/core/pipeline/hysteresis_pipeline';
import { isHysteresisModelError } from './src/core/errors/index';

type NumericOverride = Exclude<keyof ModelParameters, 'waveformShape'>;

function parseOverrides(argv: readonly string[]): {
  overrides: Partial<ModelParameters>;
  outputDirectory: string;
  runLog: string | undefined;
  verbose: boolean;
} {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      Bs: { type: 'string' },
      Br: { type: 'string' },
      Hc: { type: 'string' },
      gap: { type: 'string' },
      lc: { type: 'string' },
      Ac: { type: 'string' },
      turns: { type: 'string' },
      Hmax: { type: 'string' },
      f: { type: 'string' },
      N: { type: 'string' },
      cycles: { type: 'string' },
      discard: { type: 'string' },
      shape: { type: 'string' },
      out: { type: 'string', default: 'output' },
      log: { type: 'string' },
      verbose: { type: 'boolean', default: false },
    },
    strict: true,
  });

  // 命令行简写 → 参数字段
  const numericOptions: ReadonlyArray<[NumericOverride, string | undefined]> = [
    ['saturationFluxDensity', values.Bs],
    ['remanence', values.Br],
    ['coerciveField', values.Hc],
    ['gapLength', values.gap],
    ['magneticPathLength', values.lc],
    ['coreCrossSection', values.Ac],
    ['turns', values.turns],
    ['excitationAmplitude', values.Hmax],
    ['excitationFrequency', values.f],
    ['samplesPerCycle', values.N],
    ['cycles', values.cycles],
    ['discardCycles', values.discard],
  ];

  const overrides: { -readonly [K in keyof ModelParameters]?: ModelParameters[K] } = {};
  for (const [field, raw] of numericOptions) {
    if (raw !== undefined) {
      overrides[field] = Number(raw);
    }
  }

  const shape = values.shape;
  if (shape === 'sine' || shape === 'triangle') {
    overrides.waveformShape = shape;
  } else if (shape !== undefined) {
    throw new Error(`未知的波形形状: ${shape} (可选 sine / triangle)`);
  }

  return {
    overrides,
    outputDirectory: values.out ?? 'output',
    runLog: values.log,
    verbose: values.verbose === true,
  };
}

function runBhLoopDemo(argv: readonly string[]): void {
  console.log('🧲 ===== Chan 模型 B-H 回线生成 =====');

  try {
    const { overrides, outputDirectory, runLog, verbose } = parseOverrides(argv);
    const pipeline = new HysteresisPipeline({
      outputDirectory,
      verboseLogging: verbose,
      store: runLog === undefined ? {} : { filePath: runLog },
    });

    const result = pipeline.run(overrides);
    const { parameters, averagedLoop } = result;
    const peakB = Math.max(...averagedLoop.points.map(p => Math.abs(p.B)));

    console.log(`\n📂 参数来源: ${result.parameterSource === 'run_log' ? '运行日志' : '内置默认值'}`);
    console.log(`   Bs=${parameters.saturationFluxDensity}T, Br=${parameters.remanence}T, Hc=${parameters.coerciveField}A/m`);
    console.log(`   Hmax=${parameters.excitationAmplitude}A/m, f=${parameters.excitationFrequency}Hz, 气隙=${parameters.gapLength}m`);
    console.log('\n📊 稳态回线:');
    console.log(`   平均周期数: ${averagedLoop.cyclesAveraged} (丢弃 ${averagedLoop.discardedCycles})`);
    console.log(`   峰值 |B|: ${peakB.toFixed(4)}T`);
    console.log(`   周期间最大偏差: ${averagedLoop.cycleSpread.toExponential(3)}T`);
    console.log('\n📤 输出文件:');
    for (const file of result.exportReport.files) {
      console.log(`   ${file}`);
    }
  } catch (error) {
    if (isHysteresisModelError(error)) {
      console.error(`❌ ${error.name}: ${error.message}`);
    } else {
      console.error('❌ 演示过程中发生错误:', error);
    }
    process.exitCode = 1;
  } finally {
    console.log('\n🚀 ===== 演示结束 =====');
  }
}

runBhLoopDemo(process.argv.slice(2));
