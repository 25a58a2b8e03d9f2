#!/usr/bin/env node

import fs from 'fs-extra';
import path from 'path';
import { format } from 'date-fns';
import { createCLI, type CommandHandlers, type GlobalOptions } from './cli';
import { loadConfig, withOverrides, type AppConfig } from './config';
import { ingestCycles, runDailyAnalysis, storedDates, summarizePeriod } from './pipeline';
import { ScalerRegistry } from './analysis/normalization';
import type { AnalysisReport } from './types/detection';
import { ActivityAnalyzerError, PersistenceError, describeError, type Diagnostic } from './utils/errors';
import { setLogLevel } from './utils/logger';

async function resolveRunConfig(global: GlobalOptions): Promise<AppConfig> {
  const loaded = await loadConfig(global.config);
  const config = withOverrides(loaded, {
    logDir: global.logDir ?? loaded.logDir,
    logging: { level: global.logLevel ?? loaded.logging.level },
  });
  setLogLevel(config.logging.level);
  return config;
}

async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  try {
    await fs.ensureDir(path.dirname(path.resolve(filePath)));
    await fs.writeJSON(filePath, data, { spaces: 2 });
  } catch (error) {
    throw new PersistenceError('Could not write JSON report', filePath, error);
  }
}

const percent = (value: number): string => `${Math.round(value * 100)}%`;

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  if (diagnostics.length === 0) return;

  console.log(`⚠️  診断メッセージ: ${diagnostics.length} 件`);
  diagnostics.slice(0, 10).forEach((diagnostic, index) => {
    console.log(`   ${index + 1}. [${diagnostic.kind}] ${diagnostic.message}`);
  });
  if (diagnostics.length > 10) {
    console.log(`   ... ほか ${diagnostics.length - 10} 件`);
  }
}

function printAnalysis(report: AnalysisReport): void {
  const { metrics, daily, statistics } = report;

  if (statistics.inputRecords === 0) {
    console.log(`⚠️  ${report.date} の観察データがありません。`);
  }

  console.log(`🧹 クリーニング: ${statistics.inputRecords} → ${statistics.cleanedRecords} 行`);
  console.log(`   - 補間: ${report.cleaning.missingValuesFilled}, 外れ値: ${report.cleaning.outliersDetected}`);
  console.log(`🐛 活動サマリー:`);
  console.log(`   - 検出数: ${metrics.totalDetections}`);
  console.log(`   - 総移動距離: ${metrics.totalMovementDistance.toFixed(1)} px`);
  console.log(`   - 検出あたり移動: ${metrics.averageMovementPerDetection.toFixed(2)} px`);
  console.log(`   - ピーク時刻: ${metrics.peakActivityHour}時`);
  console.log(`   - 活動時間: ${metrics.activeDurationMinutes.toFixed(0)} 分 (活動のあった時間帯: ${daily.activeHours})`);
  console.log(`   - 平均信頼度: ${percent(metrics.detectionReliability)}`);
  console.log(`   - データ充足率: ${percent(metrics.dataCompletenessRatio)}`);
  console.log(`   - 活動スコア: ${metrics.activityScore.toFixed(3)}`);
  console.log(`   - パターン: ${metrics.movementPatterns.join(', ')}`);
  if (statistics.rejectedMovements > 0) {
    console.log(`   - 速度上限で除外した移動: ${statistics.rejectedMovements}`);
  }

  const trends = report.cleaning.columns.flatMap(column => {
    const patterns = report.features.patterns[column];
    return patterns ? [`${column}=${patterns.trend.direction}`] : [];
  });
  if (trends.length > 0) {
    console.log(`📈 傾向: ${trends.join(', ')} (集約区間: ${report.features.intervals.length})`);
  }
  printDiagnostics(report.diagnostics);
}

const handlers: CommandHandlers = {
  async ingest(input, options, global) {
    const config = await resolveRunConfig(global);
    console.log(`📥 観察サイクルを読み込み中: ${input}`);

    const report = await ingestCycles(input, config, { dryRun: options.dryRun });
    const stats = report.filterStatistics;

    console.log(`✅ ${report.cycles} サイクルを処理しました`);
    console.log(`📊 検出フィルタ結果:`);
    console.log(`   - 入力検出数: ${stats.inputDetections}`);
    console.log(`   - 不正: ${stats.invalidDetections}`);
    console.log(`   - 信頼度で除外: ${stats.confidenceFiltered}`);
    console.log(`   - サイズで除外: ${stats.sizeFiltered}`);
    console.log(`   - 重複で除外: ${stats.duplicateFiltered}`);
    console.log(`   - 採用: ${stats.keptDetections} (検出ありサイクル: ${stats.cyclesWithDetection})`);
    printDiagnostics(report.diagnostics);

    if (options.dryRun) {
      console.log('🔍 ドライランモードのため、ログは書き込みません。');
      return;
    }
    report.files.forEach(file => console.log(`💾 ${file}`));
  },

  async analyze(date, options, global) {
    const config = await resolveRunConfig(global);
    const dates = options.all ? storedDates(config) : [date ?? format(new Date(), 'yyyy-MM-dd')];

    if (dates.length === 0) {
      console.log(`⚠️  観察ログがありません: ${config.logDir}`);
      return;
    }

    const scalers =
      config.cleaning.normalization === 'none' ? undefined : new ScalerRegistry(config.cleaning.normalization);
    const reports: AnalysisReport[] = [];

    for (const target of dates) {
      console.log(`🔍 ${target} の観察データを解析中...`);
      const { report, files } = await runDailyAnalysis(target, config, { dryRun: options.dryRun, scalers });
      printAnalysis(report);
      files.forEach(file => console.log(`💾 ${file}`));
      reports.push(report);
    }

    if (options.json) {
      await writeJsonFile(options.json, reports.length === 1 ? reports[0] : reports);
      console.log(`📝 レポートを書き出しました: ${options.json}`);
    }

    if (options.dryRun) {
      console.log('🔍 ドライランモードのため、集計ファイルは書き込みません。');
    }
  },

  async report(options, global) {
    const config = await resolveRunConfig(global);
    const { statistics, diagnostics } = await summarizePeriod(config, { from: options.from, to: options.to });

    if (statistics.days === 0) {
      console.log('⚠️  日次サマリーがありません。先に analyze を実行してください。');
      return;
    }

    console.log(`📅 期間: ${statistics.startDate} 〜 ${statistics.endDate} (${statistics.days} 日)`);
    console.log(`   - 総観察数: ${statistics.totalObservations}`);
    console.log(`   - 総検出数: ${statistics.totalDetections} (検出率: ${percent(statistics.detectionRate)})`);
    console.log(`   - 検出のあった日: ${statistics.daysWithDetections}`);
    console.log(`   - 1日平均検出数: ${statistics.averageDailyDetections.toFixed(1)}`);
    console.log(`   - 総移動距離: ${statistics.totalMovementDistance.toFixed(1)} px`);
    console.log(`   - 最も活発な日: ${statistics.mostActiveDay ?? '-'}`);
    console.log(`   - 最も活発な時刻: ${statistics.mostActiveHour ?? '-'}時`);
    statistics.distribution.forEach(day => {
      console.log(`   ${day.date}: 検出 ${day.detections} / 観察 ${day.observations} (スコア ${day.activityScore.toFixed(3)})`);
    });
    printDiagnostics(diagnostics);

    if (options.json) {
      await writeJsonFile(options.json, statistics);
      console.log(`📝 期間統計を書き出しました: ${options.json}`);
    }
  },

  async config(global) {
    const config = await resolveRunConfig(global);
    console.log('✅ 設定は有効です');
    console.log(JSON.stringify(config, null, 2));
  },
};

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createCLI(handlers);

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof ActivityAnalyzerError) {
      console.error(`❌ ${error.name}: ${error.message}`);
    } else {
      console.error('❌ エラーが発生しました:', describeError(error));
    }
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
